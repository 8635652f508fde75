import { z } from 'zod';
import rawJobTitles from '../data/jobTitles.json';
import type { NameProvider } from '../providers/nameProvider';
import type { GenerationContext } from './context';
import { pickFromDistribution, weightedPick } from './distributions';
import { DEPARTMENTS } from './types';
import type { Department, OrganizationRecord, UserRecord, UserRole } from './types';
import { DAY_MS, HOUR_MS, generateId } from './utils';

const ROLES: UserRole[] = ['admin', 'member', 'limited_access', 'guest'];
const ROLE_WEIGHTS = [0.05, 0.85, 0.08, 0.02];
const RECENTLY_ACTIVE_RATE = 0.95;

const jobTitles = z.record(z.enum(DEPARTMENTS), z.array(z.string().min(1)).min(1)).parse(rawJobTitles);

const jobTitleFor = (ctx: GenerationContext, department: Department) => {
  const titles = jobTitles[department];
  return titles ? ctx.rng.pick(titles) : `${department} Team Member`;
};

const lastActiveAt = (ctx: GenerationContext) => {
  const { rng, horizon } = ctx;
  if (rng.real(0, 1) < RECENTLY_ACTIVE_RATE) {
    return horizon.end - rng.integer(0, 7) * DAY_MS - rng.integer(0, 23) * HOUR_MS;
  }
  return horizon.end - rng.integer(30, 180) * DAY_MS;
};

export const generateUsers = (
  ctx: GenerationContext,
  organization: OrganizationRecord,
  names: NameProvider
): UserRecord[] => {
  const { config, rng, horizon } = ctx;
  return names.names(config.numEmployees, organization.domain).map((person) => {
    const role = weightedPick(rng, ROLES, ROLE_WEIGHTS);
    const department = pickFromDistribution(rng, config.departmentDistribution);
    const jobTitle = jobTitleFor(ctx, department);
    const lastActive = lastActiveAt(ctx);
    return {
      id: generateId(rng),
      organizationId: organization.id,
      email: person.email,
      firstName: person.firstName,
      lastName: person.lastName,
      role,
      jobTitle,
      department,
      isActive: true,
      createdAt: horizon.start - rng.integer(1, 365) * DAY_MS,
      lastActiveAt: lastActive,
    };
  });
};
