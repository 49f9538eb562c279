import { createConsola, type ConsolaInstance } from 'consola';

const LEVELS: Record<string, number> = {
  silent: -999,
  error: 0,
  warn: 1,
  log: 2,
  info: 3,
  debug: 4,
  trace: 5,
};

/**
 * Resolve AGENTLOOP_LOG_LEVEL to a consola level (undefined keeps consola's default)
 */
export function resolveLogLevel(value: string | undefined = process.env.AGENTLOOP_LOG_LEVEL): number | undefined {
  if (!value) return undefined;
  return LEVELS[value.toLowerCase()];
}

const configuredLevel = resolveLogLevel();
const root = configuredLevel === undefined ? createConsola() : createConsola({ level: configuredLevel });

/**
 * Create a tagged logger, e.g. createLogger('hooks') prints "[hooks]"
 */
export function createLogger(tag: string): ConsolaInstance {
  return root.withTag(tag);
}

export type Logger = ConsolaInstance;
