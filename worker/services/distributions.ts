import type { Random } from 'random-js';
import { InsufficientPopulationError, InvalidDistributionError, InvalidRangeError } from './errors';

export type Bounds = { min?: number; max?: number };

/** An ordered category → probability mapping; insertion order is significant. Absent keys carry no mass. */
export type BucketDistribution<K extends string> = Readonly<Partial<Record<K, number>>>;

const clip = (value: number, bounds?: Bounds) => {
  let next = value;
  if (bounds?.min !== undefined) next = Math.max(bounds.min, next);
  if (bounds?.max !== undefined) next = Math.min(bounds.max, next);
  return next;
};

const assertWeights = (weights: readonly number[]) => {
  let total = 0;
  for (const weight of weights) {
    if (!Number.isFinite(weight) || weight < 0) {
      throw new InvalidDistributionError(`Weights must be finite and non-negative, got ${weight}.`);
    }
    total += weight;
  }
  if (total <= 0) throw new InvalidDistributionError('Weights must not all be zero.');
  return total;
};

const isBucket = <K extends string>(distribution: BucketDistribution<K>, key: string): key is K =>
  Object.prototype.hasOwnProperty.call(distribution, key);

const entriesOf = <K extends string>(distribution: BucketDistribution<K>) => {
  const entries: Array<readonly [K, number]> = [];
  for (const key of Object.keys(distribution)) {
    if (!isBucket(distribution, key)) continue;
    const mass = distribution[key];
    if (mass !== undefined) entries.push([key, mass]);
  }
  return entries;
};

export const weightedPick = <T>(rng: Random, items: readonly T[], weights: readonly number[]): T => {
  if (items.length === 0) throw new InvalidDistributionError('Cannot pick from an empty item list.');
  if (items.length !== weights.length) {
    throw new InvalidDistributionError(`Got ${items.length} items but ${weights.length} weights.`);
  }
  const total = assertWeights(weights);
  const draw = rng.real(0, total);
  let cumulative = 0;
  let fallback = items[0];
  for (let index = 0; index < items.length; index += 1) {
    if (weights[index] === 0) continue;
    cumulative += weights[index];
    fallback = items[index];
    if (draw < cumulative) return items[index];
  }
  return fallback;
};

export const pickFromDistribution = <K extends string>(rng: Random, distribution: BucketDistribution<K>): K => {
  const entries = entriesOf(distribution);
  return weightedPick(
    rng,
    entries.map(([key]) => key),
    entries.map(([, weight]) => weight)
  );
};

/**
 * Cumulative-sum selection over an ordered mapping. Returns the first bucket
 * whose running mass reaches `draw`; the last bucket absorbs rounding shortfall.
 */
export const bucketedPick = <K extends string>(distribution: BucketDistribution<K>, draw: number): K => {
  if (!(draw >= 0 && draw < 1)) throw new InvalidRangeError(`Draw must lie in [0, 1), got ${draw}.`);
  const entries = entriesOf(distribution);
  if (entries.length === 0) throw new InvalidDistributionError('Bucket distribution is empty.');

  let cumulative = 0;
  for (const [bucket, mass] of entries) {
    if (!Number.isFinite(mass) || mass < 0) {
      throw new InvalidDistributionError(`Bucket "${bucket}" has invalid mass ${mass}.`);
    }
    cumulative += mass;
    if (cumulative >= draw) return bucket;
  }
  return entries[entries.length - 1][0];
};

/**
 * 80/20-style weights: a random top group of ceil(n * topFraction) items
 * shares `topMass` evenly, the rest share the remainder evenly.
 */
export const paretoWeights = <T>(
  rng: Random,
  population: readonly T[],
  topFraction = 0.2,
  topMass = 0.8
): Map<T, number> => {
  if (population.length === 0) throw new InvalidDistributionError('Pareto population is empty.');
  if (!(topFraction > 0 && topFraction <= 1)) {
    throw new InvalidDistributionError(`topFraction must lie in (0, 1], got ${topFraction}.`);
  }
  if (!(topMass >= 0 && topMass <= 1)) {
    throw new InvalidDistributionError(`topMass must lie in [0, 1], got ${topMass}.`);
  }

  const shuffled = rng.shuffle([...population]);
  // Guard against 0.2 * n landing a hair above an integer.
  const topCount = Math.min(shuffled.length, Math.ceil(shuffled.length * topFraction - 1e-9));
  const bottomCount = shuffled.length - topCount;
  const weights = new Map<T, number>();
  shuffled.forEach((item, index) => {
    if (index < topCount) weights.set(item, topMass / topCount);
    else weights.set(item, (1 - topMass) / bottomCount);
  });
  return weights;
};

/** Draws `count` distinct items, each draw proportional to the remaining weights. */
export const weightedSample = <T>(
  rng: Random,
  items: readonly T[],
  weights: readonly number[],
  count: number
): T[] => {
  if (items.length !== weights.length) {
    throw new InvalidDistributionError(`Got ${items.length} items but ${weights.length} weights.`);
  }
  if (count > items.length) throw new InsufficientPopulationError(count, items.length);

  const remaining = items.map((item, index) => ({ item, weight: weights[index] }));
  const picked: T[] = [];
  while (picked.length < count) {
    const choice = weightedPick(
      rng,
      remaining,
      remaining.map((entry) => entry.weight)
    );
    picked.push(choice.item);
    remaining.splice(remaining.indexOf(choice), 1);
  }
  return picked;
};

export const standardNormal = (rng: Random) => {
  const u1 = 1 - rng.real(0, 1);
  const u2 = rng.real(0, 1);
  return Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
};

export const normalInt = (rng: Random, mean: number, std: number, bounds?: Bounds) =>
  Math.trunc(clip(mean + std * standardNormal(rng), bounds));

export const exponential = (rng: Random, scale: number, bounds?: Bounds) => {
  if (!(scale > 0)) throw new InvalidDistributionError(`Exponential scale must be positive, got ${scale}.`);
  return clip(-scale * Math.log(1 - rng.real(0, 1)), bounds);
};

/** `mu` and `sigma` are the location and scale of the underlying normal. */
export const logNormal = (rng: Random, mu: number, sigma: number, bounds?: Bounds) => {
  if (!(sigma >= 0)) throw new InvalidDistributionError(`Log-normal sigma must be non-negative, got ${sigma}.`);
  return clip(Math.exp(mu + sigma * standardNormal(rng)), bounds);
};

// Marsaglia–Tsang
const gamma = (rng: Random, shape: number): number => {
  if (shape < 1) {
    return gamma(rng, shape + 1) * Math.pow(1 - rng.real(0, 1), 1 / shape);
  }
  const d = shape - 1 / 3;
  const c = 1 / Math.sqrt(9 * d);
  for (;;) {
    let x: number;
    let v: number;
    do {
      x = standardNormal(rng);
      v = 1 + c * x;
    } while (v <= 0);
    v = v * v * v;
    const u = 1 - rng.real(0, 1);
    if (Math.log(u) < 0.5 * x * x + d - d * v + d * Math.log(v)) return d * v;
  }
};

export const beta = (rng: Random, alpha: number, betaParam: number, bounds?: Bounds) => {
  if (!(alpha > 0 && betaParam > 0)) {
    throw new InvalidDistributionError(`Beta parameters must be positive, got (${alpha}, ${betaParam}).`);
  }
  const x = gamma(rng, alpha);
  const y = gamma(rng, betaParam);
  return clip(x / (x + y), bounds);
};

/** `n` inverse-transform power-law samples, normalized to sum to 1. */
export const powerLaw = (rng: Random, n: number, alpha = 2.5): number[] => {
  if (!(n > 0)) throw new InvalidDistributionError(`Power-law sample count must be positive, got ${n}.`);
  if (!(alpha > 1)) throw new InvalidDistributionError(`Power-law alpha must exceed 1, got ${alpha}.`);
  const values = Array.from({ length: n }, () => Math.pow(1 - rng.real(0, 1), -1 / (alpha - 1)));
  const total = values.reduce((sum, value) => sum + value, 0);
  return values.map((value) => value / total);
};

/** Rank-frequency probabilities 1/r^s for ranks 1..n. */
export const zipf = (n: number, s = 1.5): number[] => {
  if (!(n > 0)) throw new InvalidDistributionError(`Zipf rank count must be positive, got ${n}.`);
  const frequencies = Array.from({ length: n }, (_, index) => 1 / Math.pow(index + 1, s));
  const total = frequencies.reduce((sum, value) => sum + value, 0);
  return frequencies.map((value) => value / total);
};
