import { randomUUID } from 'node:crypto';
import type { LogLevel } from '../config';
import type { DataStore } from '../db/sqlite';
import { toGenerationLogRow } from './serializers';
import type { GenerationLogKind } from './types';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export type Logger = {
  debug: (message: string, ...details: unknown[]) => void;
  info: (message: string, ...details: unknown[]) => void;
  warn: (message: string, ...details: unknown[]) => void;
  error: (message: string, ...details: unknown[]) => void;
};

/** Console logger that prefixes every line with `[scope]` and drops lines below `level`. */
export const createLogger = (scope: string, level: LogLevel = 'info'): Logger => {
  const enabled = (candidate: LogLevel) => LEVEL_ORDER[candidate] >= LEVEL_ORDER[level];
  const prefix = `[${scope}]`;
  return {
    debug: (message, ...details) => {
      if (enabled('debug')) console.debug(prefix, message, ...details);
    },
    info: (message, ...details) => {
      if (enabled('info')) console.log(prefix, message, ...details);
    },
    warn: (message, ...details) => {
      if (enabled('warn')) console.warn(prefix, message, ...details);
    },
    error: (message, ...details) => {
      if (enabled('error')) console.error(prefix, message, ...details);
    },
  };
};

export const recordLog = async (store: DataStore, kind: GenerationLogKind, payload: Record<string, unknown>) => {
  await store.bulkInsert('generation_logs', [
    toGenerationLogRow({
      id: randomUUID(),
      kind,
      payload,
      createdAt: Date.now(),
    }),
  ]);
};
