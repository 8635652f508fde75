import { z } from 'zod';
import rawTeams from '../data/teams.json';
import type { GenerationConfig } from '../config';
import type { GenerationContext } from './context';
import { DEPARTMENTS } from './types';
import type { Department, TeamMembershipRecord, TeamRecord, UserRecord } from './types';
import { DAY_MS, generateId } from './utils';

const DEFAULT_TEAM_SIZE: [number, number] = [5, 10];

const departmentSchema = z.enum(DEPARTMENTS);

const teamCatalog = z
  .object({
    identifiers: z.record(departmentSchema, z.array(z.string().min(1))),
    descriptions: z.record(departmentSchema, z.string().min(1)),
  })
  .parse(rawTeams);

export const teamSizeRange = (config: GenerationConfig, department: Department) =>
  config.teamSizeRanges[department] ?? DEFAULT_TEAM_SIZE;

/** Department teams sized from the employee share and the average configured team size. */
export const generateTeams = (ctx: GenerationContext, organizationId: string): TeamRecord[] => {
  const { config, rng, horizon } = ctx;
  const teams: TeamRecord[] = [];

  for (const department of DEPARTMENTS.filter((name) => name in config.departmentDistribution)) {
    const share = config.departmentDistribution[department] ?? 0;
    const allocation = Math.floor(config.numEmployees * share);
    if (allocation === 0) continue;

    const [min, max] = teamSizeRange(config, department);
    const numTeams = Math.max(1, Math.floor(allocation / ((min + max) / 2)));
    const identifiers = teamCatalog.identifiers[department] ?? [];

    for (let index = 0; index < numTeams; index += 1) {
      let name: string = department;
      if (numTeams > 1) {
        name = index < identifiers.length ? `${department} - ${identifiers[index]}` : `${department} - Team ${index + 1}`;
      }
      teams.push({
        id: generateId(rng),
        organizationId,
        name,
        description: teamCatalog.descriptions[department] ?? null,
        department,
        createdAt: horizon.start - rng.integer(30, 365) * DAY_MS,
      });
    }
  }
  return teams;
};

/**
 * Splits each department's users across its teams without replacement. Teams
 * later in iteration order draw from whatever the earlier ones left behind.
 */
export const generateTeamMemberships = (
  ctx: GenerationContext,
  teams: TeamRecord[],
  users: UserRecord[]
): TeamMembershipRecord[] => {
  const { config, rng } = ctx;
  const pools = new Map<Department, UserRecord[]>();
  for (const user of users) {
    const pool = pools.get(user.department) ?? [];
    pool.push(user);
    pools.set(user.department, pool);
  }

  const memberships: TeamMembershipRecord[] = [];
  for (const team of teams) {
    const pool = pools.get(team.department);
    if (!pool || pool.length === 0) continue;

    const [min, max] = teamSizeRange(config, team.department);
    const target = Math.min(rng.integer(min, max), pool.length);
    const members = rng.sample(pool, target);
    const claimed = new Set(members.map((member) => member.id));
    pools.set(
      team.department,
      pool.filter((user) => !claimed.has(user.id))
    );
    if (members.length === 0) continue;

    const lead = rng.pick(members);
    for (const member of members) {
      memberships.push({
        id: generateId(rng),
        teamId: team.id,
        userId: member.id,
        isTeamLead: member.id === lead.id,
        joinedAt: member.createdAt + rng.integer(0, 30) * DAY_MS,
      });
    }
  }
  return memberships;
};

export const membersByTeam = (memberships: TeamMembershipRecord[]) => {
  const byTeam = new Map<string, string[]>();
  for (const membership of memberships) {
    const members = byTeam.get(membership.teamId) ?? [];
    members.push(membership.userId);
    byTeam.set(membership.teamId, members);
  }
  return byTeam;
};
