import { z } from 'zod';
import type { Random } from 'random-js';
import rawCompanies from '../data/companies.json';
import type { Logger } from '../services/logService';

export type Company = {
  name: string;
  domain: string;
};

export interface CompanyProvider {
  company(): Promise<Company>;
}

/** Lowercased alphanumerics of the name plus `.com`. */
export const domainFromName = (name: string) => `${name.toLowerCase().replace(/[^a-z0-9]/g, '')}.com`;

const companySchema = z.object({ name: z.string().min(1), domain: z.string().min(3) });

const remoteCompaniesSchema = z
  .array(
    z.object({
      name: z.string().trim().min(1),
      domain: z.string().trim().min(3).optional(),
    })
  )
  .transform((entries) =>
    entries
      .map((entry) => ({ name: entry.name, domain: entry.domain ?? domainFromName(entry.name) }))
      .filter((entry) => entry.domain !== '.com')
  )
  .pipe(z.array(companySchema).min(1));

export class StaticCompanyProvider implements CompanyProvider {
  private readonly companies: Company[];

  constructor(
    private readonly rng: Random,
    companies: Company[] = rawCompanies
  ) {
    this.companies = z.array(companySchema).min(1).parse(companies);
  }

  async company() {
    return this.rng.pick(this.companies);
  }
}

export type RemoteCompanyProviderOptions = {
  url: string;
  rng: Random;
  fallback: CompanyProvider;
  logger: Logger;
  timeoutMs?: number;
};

/** Reads a JSON list of `{ name, domain? }` entries; any failure falls back. */
export class RemoteCompanyProvider implements CompanyProvider {
  constructor(private readonly options: RemoteCompanyProviderOptions) {}

  async company() {
    const { url, rng, fallback, logger, timeoutMs = 10_000 } = this.options;
    try {
      const response = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) });
      if (!response.ok) throw new Error(`HTTP ${response.status}`);
      const companies = remoteCompaniesSchema.parse(await response.json());
      logger.info(`Loaded ${companies.length} companies from ${url}`);
      return rng.pick(companies);
    } catch (error) {
      logger.warn(`Company source failed (${error instanceof Error ? error.message : String(error)}); using fallback list.`);
      return fallback.company();
    }
  }
}
