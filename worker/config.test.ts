import { describe, it, expect } from 'vitest';
import { loadEnvConfig, parseGenerationConfig, resolveHorizon } from './config';
import { ConfigError } from './services/errors';
import { DAY_MS } from './services/utils';

describe('parseGenerationConfig', () => {
  it('fills every default', () => {
    const config = parseGenerationConfig();
    expect(config.numEmployees).toBe(7500);
    expect(config.simulationEndDate).toBe('2026-01-07');
    expect(config.tasksPerProject).toEqual([15, 40]);
    expect(config.assignmentStrategy).toBe('uniform');
    expect(config.llm).toEqual({ model: 'gemini-2.5-flash', temperature: 0.7, maxTokens: 1000, batchDelayMs: 500 });
    expect(config.customFields.map((field) => field.name)).toEqual([
      'Priority',
      'Effort',
      'Status',
      'Story Points',
      'Sprint',
    ]);
    expect(config.seed).toBeUndefined();
  });

  it('keeps explicit overrides', () => {
    const config = parseGenerationConfig({ numEmployees: 40, seed: 3, assignmentStrategy: 'pareto' });
    expect(config.numEmployees).toBe(40);
    expect(config.seed).toBe(3);
    expect(config.assignmentStrategy).toBe('pareto');
  });

  it('rejects an inverted range with the offending path', () => {
    expect(() => parseGenerationConfig({ tasksPerProject: [40, 15] })).toThrow(
      'tasksPerProject: range minimum must not exceed its maximum'
    );
  });

  it('rejects rates outside [0, 1]', () => {
    expect(() => parseGenerationConfig({ unassignedTaskRate: 1.5 })).toThrow(ConfigError);
  });

  it('rejects a workload share of zero', () => {
    expect(() => parseGenerationConfig({ workloadParetoRatio: 0 })).toThrow(ConfigError);
    expect(() => parseGenerationConfig({ workloadParetoFraction: 0 })).toThrow('workloadParetoFraction');
    expect(parseGenerationConfig({ workloadParetoRatio: 1, workloadParetoFraction: 1 })).toMatchObject({
      workloadParetoRatio: 1,
      workloadParetoFraction: 1,
    });
  });

  it('rejects impossible end dates', () => {
    expect(() => parseGenerationConfig({ simulationEndDate: '2026-13-01' })).toThrow(ConfigError);
    expect(() => parseGenerationConfig({ simulationEndDate: 'Jan 7 2026' })).toThrow('expected YYYY-MM-DD');
  });
});

describe('resolveHorizon', () => {
  it('ends at midnight UTC of the end date', () => {
    const horizon = resolveHorizon({ simulationEndDate: '2026-01-07', simulationDays: 180 });
    expect(horizon.end).toBe(Date.UTC(2026, 0, 7));
    expect(horizon.start).toBe(Date.UTC(2026, 0, 7) - 180 * DAY_MS);
  });
});

describe('loadEnvConfig', () => {
  it('coerces variables and treats blanks as unset', () => {
    const config = loadEnvConfig({
      NUM_EMPLOYEES: '120',
      SEED: '7',
      LOG_LEVEL: 'DEBUG',
      GEMINI_API_KEY: 'test-secret',
      LLM_TEMPERATURE: '0.2',
      DB_PATH: '   ',
      UNRELATED: 'ignored',
    });
    expect(config.numEmployees).toBe(120);
    expect(config.seed).toBe(7);
    expect(config.logLevel).toBe('debug');
    expect(config.llm.apiKey).toBe('test-secret');
    expect(config.llm.temperature).toBe(0.2);
    expect(config.dbPath).toBe('output/workspace.sqlite');
  });

  it('returns defaults for an empty environment', () => {
    expect(loadEnvConfig({})).toEqual(parseGenerationConfig());
  });

  it('names the bad variable', () => {
    expect(() => loadEnvConfig({ NUM_EMPLOYEES: 'many' })).toThrow('NUM_EMPLOYEES');
    expect(() => loadEnvConfig({ LOG_LEVEL: 'verbose' })).toThrow(ConfigError);
  });

  it('validates values after coercion', () => {
    expect(() => loadEnvConfig({ NUM_EMPLOYEES: '-5' })).toThrow('numEmployees');
  });
});
