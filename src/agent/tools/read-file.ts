import { z } from 'zod';
import { StructuredTool } from '@langchain/core/tools';
import fs from 'fs-extra';
import { ToolError, ToolErrorCode } from '../../core/errors/index.js';
import type { LocalSandbox } from '../sandbox.js';

const ReadFileSchema = z.object({
  path: z.string().describe('File path, relative to the working directory'),
  offset: z.number().int().min(0).optional().describe('Number of lines to skip (default: 0)'),
  limit: z.number().int().min(0).optional().describe('Maximum number of lines to return'),
});

/**
 * Reads a text file as numbered lines ("   1| first line")
 */
export class ReadFileTool extends StructuredTool {
  name = 'read_file';
  description = `Read a text file from the working directory.
Lines are returned numbered. Use offset and limit to page through large files.
Returns "(EOF)" when offset is past the end of the file.`;

  schema = ReadFileSchema;

  constructor(private readonly sandbox: LocalSandbox) {
    super();
  }

  async _call(input: z.infer<typeof ReadFileSchema>): Promise<string> {
    const filePath = this.sandbox.resolve(input.path, this.name);
    if (input.limit === 0) {
      return '';
    }

    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch {
      throw new ToolError(`File not found: ${input.path}`, ToolErrorCode.FILE_NOT_FOUND, this.name);
    }

    const lines = content.split(/\r?\n/);
    // A trailing newline does not start another line
    if (lines.length > 0 && lines[lines.length - 1] === '') {
      lines.pop();
    }

    const offset = input.offset ?? 0;
    const end = input.limit === undefined ? lines.length : offset + input.limit;
    const selected = lines.slice(offset, end);
    if (selected.length === 0) {
      return '(EOF)';
    }

    return selected.map((line, i) => `${String(offset + i + 1).padStart(4)}| ${line}`).join('\n');
  }
}
