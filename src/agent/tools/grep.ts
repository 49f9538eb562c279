import { z } from 'zod';
import { StructuredTool } from '@langchain/core/tools';
import { glob } from 'glob';
import fs from 'fs-extra';
import { ToolError, ToolErrorCode } from '../../core/errors/index.js';
import type { LocalSandbox } from '../sandbox.js';

export const MAX_GREP_HITS = 100;

const GrepSchema = z.object({
  pattern: z.string().min(1).describe('Regular expression to search for'),
  path: z.string().optional().describe('File or directory to search (default: working directory)'),
});

/**
 * Line-oriented regex search. Output lines are "file:line: text".
 */
export class GrepTool extends StructuredTool {
  name = 'grep';
  description = `Search file contents with a regular expression.
Each hit is "path:line: text"; returns "none" when nothing matches.`;

  schema = GrepSchema;

  constructor(private readonly sandbox: LocalSandbox) {
    super();
  }

  async _call(input: z.infer<typeof GrepSchema>): Promise<string> {
    let regex: RegExp;
    try {
      regex = new RegExp(input.pattern);
    } catch {
      throw new ToolError(
        `Invalid regular expression: ${input.pattern}`,
        ToolErrorCode.INVALID_ARGUMENTS,
        this.name,
      );
    }

    const base = this.sandbox.resolve(input.path ?? '.', this.name);
    if (!(await fs.pathExists(base))) {
      throw new ToolError(`File not found: ${input.path ?? '.'}`, ToolErrorCode.FILE_NOT_FOUND, this.name);
    }

    const stats = await fs.stat(base);
    const files = stats.isFile()
      ? [base]
      : (
          await glob('**/*', {
            cwd: base,
            absolute: true,
            nodir: true,
            ignore: ['**/node_modules/**', '**/.git/**'],
          })
        ).sort();

    const hits: string[] = [];
    for (const file of files) {
      let content: string;
      try {
        content = await fs.readFile(file, 'utf-8');
      } catch {
        // binary or unreadable
        continue;
      }

      const lines = content.split(/\r?\n/);
      for (const [index, line] of lines.entries()) {
        if (regex.test(line)) {
          hits.push(`${this.sandbox.display(file)}:${index + 1}: ${line.trim()}`);
          if (hits.length >= MAX_GREP_HITS) {
            return hits.join('\n');
          }
        }
      }
    }

    return hits.length > 0 ? hits.join('\n') : 'none';
  }
}
