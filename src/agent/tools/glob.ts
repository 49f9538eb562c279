import path from 'path';
import { z } from 'zod';
import { StructuredTool } from '@langchain/core/tools';
import { glob } from 'glob';
import fs from 'fs-extra';
import { ToolError, ToolErrorCode } from '../../core/errors/index.js';
import type { LocalSandbox } from '../sandbox.js';

export const MAX_GLOB_HITS = 100;
export const MAX_GLOB_OUTPUT_CHARS = 8000;

const GlobSchema = z.object({
  pattern: z.string().min(1).describe('Glob pattern, e.g. "src/**/*.ts"'),
  path: z.string().optional().describe('Directory to search from (default: working directory)'),
});

export class GlobTool extends StructuredTool {
  name = 'glob';
  description = `Find files by glob pattern. Results are newest first, relative to the working directory.
Returns "none" when nothing matches.`;

  schema = GlobSchema;

  constructor(private readonly sandbox: LocalSandbox) {
    super();
  }

  async _call(input: z.infer<typeof GlobSchema>): Promise<string> {
    if (path.isAbsolute(input.pattern) || input.pattern.split(/[\\/]/).includes('..')) {
      throw new ToolError(
        `Pattern leaves the working directory: ${input.pattern}`,
        ToolErrorCode.PATH_OUTSIDE_WORKING_DIR,
        this.name,
      );
    }
    const base = this.sandbox.resolve(input.path ?? '.', this.name);

    const matches = await glob(input.pattern, {
      cwd: base,
      absolute: true,
      ignore: ['**/node_modules/**', '**/.git/**'],
    });
    if (matches.length === 0) {
      return 'none';
    }

    const withTimes = await Promise.all(
      matches.map(async (file) => ({ file, mtime: (await fs.stat(file)).mtimeMs })),
    );
    withTimes.sort((a, b) => b.mtime - a.mtime || a.file.localeCompare(b.file));

    const lines: string[] = [];
    let length = 0;
    for (const { file } of withTimes.slice(0, MAX_GLOB_HITS)) {
      const line = this.sandbox.display(file);
      const added = line.length + (lines.length > 0 ? 1 : 0);
      if (length + added > MAX_GLOB_OUTPUT_CHARS) break;
      lines.push(line);
      length += added;
    }

    const omitted = withTimes.length - lines.length;
    if (omitted > 0) {
      lines.push(`[truncated glob results: ${omitted} entries omitted]`);
    }
    return lines.join('\n');
  }
}
