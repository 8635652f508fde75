import type { Random } from 'random-js';
import { resolveHorizon } from '../config';
import type { GenerationConfig } from '../config';
import { createRng } from './random';
import { TemporalEngine } from './temporalService';
import type { Horizon } from './types';

/** Everything a generation stage reads besides upstream entities. Bound once per run. */
export type GenerationContext = {
  config: GenerationConfig;
  rng: Random;
  horizon: Horizon;
  temporal: TemporalEngine;
};

export const createGenerationContext = (config: GenerationConfig, rng: Random = createRng(config.seed)): GenerationContext => {
  const horizon = resolveHorizon(config);
  const temporal = new TemporalEngine({
    rng,
    horizon,
    dueDateDistribution: config.dueDateDistribution,
    weekendAvoidanceRate: config.weekendAvoidanceRate,
    weekdayBiasRate: config.weekdayBiasRate,
    sprintDurationDays: config.sprintDurationDays,
  });
  return { config, rng, horizon, temporal };
};
