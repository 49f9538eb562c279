/**
 * @path references in user input
 *
 * `@src/app.ts` at the start of the input, after whitespace, or after one of
 * `( [ { ,` is replaced by the file's contents in a fenced block before the
 * message reaches the model. A reference that cannot be inlined stays as typed
 * and is reported in `skipped`.
 *
 * `user@example.com` is not a reference: the `@` follows a letter.
 */

import path from 'path';
import fs from 'fs-extra';
import type { FileReferenceSettings } from '../core/config/types.js';
import { errorMessage } from '../core/errors/index.js';
import { createLogger } from '../utils/logger.js';
import { LocalSandbox } from './sandbox.js';

export const DEFAULT_FILE_REFERENCE_MAX_SIZE = 10 * 1024 * 1024;

export const DEFAULT_FILE_REFERENCE_EXTENSIONS: readonly string[] = [
  'ts',
  'tsx',
  'js',
  'jsx',
  'mjs',
  'cjs',
  'json',
  'md',
  'txt',
  'yaml',
  'yml',
  'toml',
  'py',
  'rs',
  'go',
  'java',
  'sh',
];

const logger = createLogger('file-refs');

const BOUNDARY = /[\s([{,]/;
const PATH_CHAR = /[\p{L}\p{N}_./\\-]/u;

export interface FileReference {
  /** Offset of the `@` */
  index: number;
  /** Path as typed, without the `@` */
  reference: string;
}

export interface ExpandedInput {
  text: string;
  inlined: string[];
  skipped: Array<{ reference: string; reason: string }>;
}

export type FileReferenceLimits = Pick<FileReferenceSettings, 'maxSize' | 'allowedExtensions'>;

/**
 * References in order of appearance. Trailing dots belong to the sentence,
 * not the path.
 */
export function findFileReferences(text: string): FileReference[] {
  const found: FileReference[] = [];
  let i = 0;

  while (i < text.length) {
    if (text.charAt(i) === '@' && (i === 0 || BOUNDARY.test(text.charAt(i - 1)))) {
      let end = i + 1;
      while (end < text.length && PATH_CHAR.test(text.charAt(end))) {
        end++;
      }
      const reference = text.slice(i + 1, end).replace(/\.+$/, '');
      if (reference) {
        found.push({ index: i, reference });
        i += reference.length + 1;
        continue;
      }
    }
    i++;
  }

  return found;
}

export async function resolveFileReferences(
  text: string,
  sandbox: LocalSandbox,
  limits: FileReferenceLimits,
): Promise<ExpandedInput> {
  const references = findFileReferences(text);
  const expanded: ExpandedInput = { text, inlined: [], skipped: [] };
  if (references.length === 0) {
    return expanded;
  }

  let result = '';
  let last = 0;
  for (const { index, reference } of references) {
    result += text.slice(last, index);
    try {
      const content = await readReference(reference, sandbox, limits);
      result += `\n\`\`\`\n// File: ${reference}\n${content}\n\`\`\`\n`;
      expanded.inlined.push(reference);
    } catch (error) {
      const reason = errorMessage(error);
      logger.warn(`Could not resolve @${reference}: ${reason}`);
      result += `@${reference}`;
      expanded.skipped.push({ reference, reason });
    }
    last = index + reference.length + 1;
  }

  expanded.text = result + text.slice(last);
  return expanded;
}

async function readReference(reference: string, sandbox: LocalSandbox, limits: FileReferenceLimits): Promise<string> {
  const extension = path.extname(reference).slice(1).toLowerCase();
  if (!limits.allowedExtensions.includes(extension)) {
    throw new Error(`Extension not allowed: ${reference}`);
  }

  const resolved = sandbox.resolve(reference);
  if (!(await fs.pathExists(resolved))) {
    throw new Error(`File not found: ${reference}`);
  }

  // Symlinks must not lead out of the working directory either
  const realRoot = new LocalSandbox(await fs.realpath(sandbox.root));
  const real = await fs.realpath(resolved);
  if (!realRoot.contains(real)) {
    throw new Error(`Path is outside the working directory: ${reference}`);
  }

  const stat = await fs.stat(real);
  if (!stat.isFile()) {
    throw new Error(`Not a file: ${reference}`);
  }
  if (stat.size > limits.maxSize) {
    throw new Error(`File is larger than ${limits.maxSize} bytes: ${reference}`);
  }

  return fs.readFile(real, 'utf-8');
}

/**
 * Expands references in turn input according to the fileReferences settings
 */
export class FileReferenceResolver {
  private readonly sandbox: LocalSandbox;

  constructor(
    cwd: string,
    private readonly settings: FileReferenceSettings,
  ) {
    this.sandbox = new LocalSandbox(cwd);
  }

  async expand(text: string): Promise<ExpandedInput> {
    if (!this.settings.enabled) {
      return { text, inlined: [], skipped: [] };
    }
    return resolveFileReferences(text, this.sandbox, this.settings);
  }
}
