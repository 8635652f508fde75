import { MersenneTwister19937, Random } from 'random-js';

export type { Random };

/**
 * Every generator in a run draws from the single source created here, so a
 * fixed seed reproduces the whole dataset, identities included.
 */
export const createRng = (seed?: number) =>
  new Random(seed === undefined ? MersenneTwister19937.autoSeed() : MersenneTwister19937.seed(seed));
