import type { Random } from 'random-js';

export const HOUR_MS = 3_600_000;
export const DAY_MS = 86_400_000;

export const generateId = (rng: Random) => rng.uuid4();

export const clampNumber = (value: number, min: number, max: number) => Math.min(max, Math.max(min, value));

export const sleep = (ms: number) =>
  new Promise<void>((resolve) => {
    setTimeout(resolve, ms);
  });

export const startOfUtcDay = (timestamp: number) => Math.floor(timestamp / DAY_MS) * DAY_MS;

export const addDays = (timestamp: number, days: number) => timestamp + days * DAY_MS;

export const addHours = (timestamp: number, hours: number) => timestamp + hours * HOUR_MS;

/** 0 = Sunday … 6 = Saturday, in UTC. */
export const utcWeekday = (timestamp: number) => new Date(timestamp).getUTCDay();

export const toIsoTimestamp = (timestamp: number) => new Date(timestamp).toISOString();

export const toIsoDate = (timestamp: number) => toIsoTimestamp(timestamp).slice(0, 10);

export const parseIsoDate = (value: string) => {
  const parsed = Date.parse(`${value}T00:00:00.000Z`);
  return Number.isNaN(parsed) ? null : parsed;
};

export const randomHexColor = (rng: Random) => `#${rng.hex(6, true)}`;
