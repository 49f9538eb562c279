/**
 * Observations
 *
 * Every successful tool run in a session is captured as an observation. At
 * session end the batch is appended to <cwd>/.agentloop/observations.jsonl,
 * one JSON object per line; the next session lists the most recent ones at
 * startup.
 */

import path from 'path';
import fs from 'fs-extra';
import { z } from 'zod';
import { createLogger } from '../utils/logger.js';
import { getProjectDir, truncate } from '../utils/index.js';

export const OBSERVATIONS_FILE_NAME = 'observations.jsonl';

/** Stored tool output is cut to this many characters */
export const OBSERVATION_OUTPUT_LIMIT = 500;

const TITLE_SUMMARY_LENGTH = 60;

/** Argument names that best describe a tool call, in order of preference */
const SUMMARY_ARGS = ['command', 'path', 'pattern'];

const logger = createLogger('observations');

const ObservationSchema = z.object({
  toolName: z.string(),
  input: z.record(z.unknown()),
  output: z.string(),
  toolCallId: z.string().optional(),
  timestamp: z.string(),
  sessionId: z.string(),
  summary: z.string().optional(),
});

export type Observation = z.infer<typeof ObservationSchema>;

export function observationsPath(cwd: string): string {
  return path.join(getProjectDir(cwd), OBSERVATIONS_FILE_NAME);
}

/**
 * Short description of a tool call from its most telling argument
 */
export function summarizeInput(input: Record<string, unknown>): string | undefined {
  for (const key of SUMMARY_ARGS) {
    const value = input[key];
    if (typeof value === 'string' && value.trim()) {
      return value.trim().split('\n')[0];
    }
  }
  return undefined;
}

export function observationTitle(observation: Observation): string {
  if (observation.summary) {
    return `${observation.toolName}: ${truncate(observation.summary, TITLE_SUMMARY_LENGTH)}`;
  }
  return observation.toolName;
}

export class ObservationManager {
  private captured: Observation[] = [];

  constructor(
    readonly sessionId: string,
    readonly filePath: string,
    private readonly now: () => Date = () => new Date(),
  ) {}

  get observations(): readonly Observation[] {
    return this.captured;
  }

  get count(): number {
    return this.captured.length;
  }

  capture(toolName: string, input: Record<string, unknown>, output: string, toolCallId?: string): Observation {
    const observation: Observation = {
      toolName,
      input,
      output: truncate(output, OBSERVATION_OUTPUT_LIMIT),
      timestamp: this.now().toISOString(),
      sessionId: this.sessionId,
    };
    if (toolCallId) observation.toolCallId = toolCallId;
    const summary = summarizeInput(input);
    if (summary) observation.summary = summary;

    this.captured.push(observation);
    return observation;
  }

  clear(): void {
    this.captured = [];
  }

  /**
   * Append the captured batch to the observations file and clear it
   *
   * @returns how many observations were written
   */
  async save(): Promise<number> {
    if (this.captured.length === 0) {
      return 0;
    }
    const lines = this.captured.map((observation) => JSON.stringify(observation)).join('\n') + '\n';
    await fs.ensureDir(path.dirname(this.filePath));
    await fs.appendFile(this.filePath, lines, 'utf-8');

    const saved = this.captured.length;
    logger.debug(`Saved ${saved} observation(s) to ${this.filePath}`);
    this.clear();
    return saved;
  }
}

/**
 * The `limit` most recent stored observations, newest first. Unreadable lines
 * are skipped; a missing file gives an empty list.
 */
export async function loadRecentObservations(filePath: string, limit: number): Promise<Observation[]> {
  if (limit <= 0 || !(await fs.pathExists(filePath))) {
    return [];
  }

  const content = await fs.readFile(filePath, 'utf-8');
  const recent: Observation[] = [];
  const lines = content.split('\n');

  for (let i = lines.length - 1; i >= 0 && recent.length < limit; i--) {
    const line = lines[i]?.trim();
    if (!line) continue;
    try {
      const parsed = ObservationSchema.safeParse(JSON.parse(line));
      if (parsed.success) {
        recent.push(parsed.data);
      }
    } catch {
      logger.debug(`Skipping unreadable observation line ${i + 1} in ${filePath}`);
    }
  }

  return recent;
}
