import { z } from 'zod';
import type { Random } from 'random-js';
import rawNames from '../data/names.json';

const namesSchema = z.object({
  firstNames: z.array(z.string().min(1)).min(1),
  lastNames: z.array(z.string().min(1)).min(1),
});

export type PersonName = {
  firstName: string;
  lastName: string;
  email: string;
};

const emailPart = (value: string) => value.toLowerCase().replace(/[^a-z0-9]/g, '');

/**
 * Draws person names with run-unique emails. Name pairs stay unique until the
 * lookup tables run out of combinations; emails stay unique regardless.
 */
export class NameProvider {
  private readonly firstNames: string[];
  private readonly lastNames: string[];
  private readonly usedPairs = new Set<string>();
  private readonly usedEmails = new Set<string>();

  constructor(
    private readonly rng: Random,
    tables: z.input<typeof namesSchema> = rawNames
  ) {
    const parsed = namesSchema.parse(tables);
    this.firstNames = parsed.firstNames;
    this.lastNames = parsed.lastNames;
  }

  names(count: number, domain: string): PersonName[] {
    return Array.from({ length: count }, () => {
      const [firstName, lastName] = this.drawPair();
      return { firstName, lastName, email: this.email(firstName, lastName, domain) };
    });
  }

  private drawPair(): [string, string] {
    const combinations = this.firstNames.length * this.lastNames.length;
    const mustBeFresh = this.usedPairs.size < combinations;
    for (;;) {
      const firstName = this.rng.pick(this.firstNames);
      const lastName = this.rng.pick(this.lastNames);
      const key = `${firstName}\u0000${lastName}`;
      if (mustBeFresh && this.usedPairs.has(key)) continue;
      this.usedPairs.add(key);
      return [firstName, lastName];
    }
  }

  private email(firstName: string, lastName: string, domain: string) {
    const first = emailPart(firstName);
    const last = emailPart(lastName);
    const candidates = [
      `${first}.${last}@${domain}`,
      `${first.charAt(0)}${last}@${domain}`,
      `${first}${last.charAt(0)}@${domain}`,
      `${first}${last}@${domain}`,
    ];
    for (const candidate of candidates) {
      if (!this.usedEmails.has(candidate)) {
        this.usedEmails.add(candidate);
        return candidate;
      }
    }
    for (let suffix = 1; ; suffix += 1) {
      const candidate = `${first}.${last}${suffix}@${domain}`;
      if (!this.usedEmails.has(candidate)) {
        this.usedEmails.add(candidate);
        return candidate;
      }
    }
  }
}
