/**
 * Utility Functions
 */

import os from 'os';
import path from 'path';

export { createLogger, resolveLogLevel, type Logger } from './logger.js';

/** Directory name used for both the user-level and project-level state */
export const AGENTLOOP_DIR_NAME = '.agentloop';

/**
 * Generate a unique session ID
 */
export function generateSessionId(): string {
  return `session_${Date.now()}_${Math.random().toString(36).slice(2, 11)}`;
}

/**
 * ~/.agentloop, resolved at call time so tests can point HOME elsewhere
 */
export function getUserDir(): string {
  return path.join(os.homedir(), AGENTLOOP_DIR_NAME);
}

/**
 * <cwd>/.agentloop
 */
export function getProjectDir(cwd: string): string {
  return path.join(cwd, AGENTLOOP_DIR_NAME);
}

/**
 * First `max` code points of a string; surrogate pairs are never split
 */
export function takeChars(value: string, max: number): string {
  if (value.length <= max) return value;
  return Array.from(value).slice(0, max).join('');
}

/**
 * Cut a string to at most `max` characters, appending a marker when cut
 */
export function truncate(value: string, max: number, marker = '...'): string {
  if (value.length <= max) return value;
  if (max <= marker.length) return value.slice(0, max);
  return value.slice(0, max - marker.length) + marker;
}
