import type { CompanyProvider } from '../providers/companyProvider';
import type { GenerationContext } from './context';
import type { OrganizationRecord } from './types';
import { DAY_MS, generateId } from './utils';

export const generateOrganization = async (
  ctx: GenerationContext,
  companies: CompanyProvider
): Promise<OrganizationRecord> => {
  const company = await companies.company();
  return {
    id: generateId(ctx.rng),
    name: company.name,
    domain: company.domain,
    isOrganization: true,
    createdAt: ctx.horizon.start - 365 * DAY_MS,
  };
};
