/**
 * Hook file parser
 *
 * One YAML document per file:
 *
 * ```yaml
 * name: git_status
 * trigger: SessionStart
 * condition: has_tool:git
 * actions:
 *   - type: command
 *     command: git status --short
 *     inject_as: git_status
 * ```
 */

import fs from 'fs-extra';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { HOOK_EVENTS } from '../events/types.js';
import { HookParseError, errorMessage } from '../errors/index.js';
import type { HookAction, HookDefinition } from '../../hooks/types.js';

const CommandActionSchema = z.object({
  type: z.literal('command'),
  command: z.string().min(1),
  inject_as: z.string().min(1).optional(),
  requires_approval: z.boolean().optional(),
  approval_prompt: z.string().optional(),
});

const MessageActionSchema = z.object({
  type: z.literal('message'),
  text: z.string(),
});

const KeyedPromptFields = {
  prompt: z.string(),
  set_key: z.string().min(1),
};

const ConfirmActionSchema = z.object({ type: z.literal('confirm'), ...KeyedPromptFields });
const PromptActionSchema = z.object({ type: z.literal('prompt'), ...KeyedPromptFields });
const SecretPromptActionSchema = z.object({ type: z.literal('secret_prompt'), ...KeyedPromptFields });

const SetEnvActionSchema = z.object({
  type: z.literal('set_env'),
  name: z.string().min(1),
  from_key: z.string().min(1),
});

const SetConfigActionSchema = z.object({
  type: z.literal('set_config'),
  path: z.string().min(1),
  value: z.union([z.string(), z.number(), z.boolean()]),
});

export const HookActionSchema: z.ZodType<HookAction, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.discriminatedUnion('type', [
    CommandActionSchema,
    MessageActionSchema,
    z.object({
      type: z.literal('conditional'),
      condition: z.string().min(1),
      then: z.array(HookActionSchema).default([]),
    }),
    ConfirmActionSchema,
    PromptActionSchema,
    SecretPromptActionSchema,
    SetEnvActionSchema,
    SetConfigActionSchema,
  ]),
);

export const HookDefinitionSchema = z.object({
  name: z.string().min(1),
  trigger: z.enum(HOOK_EVENTS),
  condition: z.string().min(1).optional(),
  actions: z.array(HookActionSchema),
});

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join('.') : '<root>';
    return `${where}: ${issue.message}`;
  });
}

/**
 * Parse hook YAML text. `source` only labels errors.
 */
export function parseHookDocument(content: string, source = '<inline>'): HookDefinition {
  let document: unknown;
  try {
    document = parseYaml(content);
  } catch (error) {
    throw new HookParseError(source, [errorMessage(error)]);
  }

  const parsed = HookDefinitionSchema.safeParse(document);
  if (!parsed.success) {
    throw new HookParseError(source, formatIssues(parsed.error));
  }
  return parsed.data;
}

/**
 * Read and parse a hook file
 */
export async function parseHookFile(filePath: string): Promise<HookDefinition> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new HookParseError(filePath, [errorMessage(error)]);
  }
  return parseHookDocument(content, filePath);
}

/**
 * Hook files are *.yaml / *.yml
 */
export function isHookFileName(fileName: string): boolean {
  return fileName.endsWith('.yaml') || fileName.endsWith('.yml');
}
