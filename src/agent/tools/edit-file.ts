import { z } from 'zod';
import { StructuredTool } from '@langchain/core/tools';
import fs from 'fs-extra';
import { ToolError, ToolErrorCode } from '../../core/errors/index.js';
import type { LocalSandbox } from '../sandbox.js';

const EditFileSchema = z.object({
  path: z.string().describe('File path, relative to the working directory'),
  old_string: z.string().min(1).describe('The exact text to find and replace'),
  new_string: z.string().describe('The replacement text'),
  replace_all: z.boolean().optional().describe('Replace all occurrences (default: false)'),
});

function countOccurrences(text: string, search: string): number {
  let count = 0;
  let index = text.indexOf(search);
  while (index !== -1) {
    count++;
    index = text.indexOf(search, index + search.length);
  }
  return count;
}

/**
 * Exact string replacement. Without replace_all the text must occur exactly once.
 */
export class EditFileTool extends StructuredTool {
  name = 'edit_file';
  description = `Replace text in a file in the working directory.
old_string must match exactly and, unless replace_all is true, occur exactly once.`;

  schema = EditFileSchema;

  constructor(private readonly sandbox: LocalSandbox) {
    super();
  }

  async _call(input: z.infer<typeof EditFileSchema>): Promise<string> {
    const filePath = this.sandbox.resolve(input.path, this.name);

    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch {
      throw new ToolError(`File not found: ${input.path}`, ToolErrorCode.FILE_NOT_FOUND, this.name);
    }

    const occurrences = countOccurrences(content, input.old_string);
    if (occurrences === 0) {
      throw new ToolError(`Pattern not found: ${input.old_string}`, ToolErrorCode.PATTERN_NOT_FOUND, this.name);
    }
    if (occurrences > 1 && !input.replace_all) {
      throw new ToolError(
        `Pattern occurs ${occurrences} times; add context or set replace_all`,
        ToolErrorCode.AMBIGUOUS_PATTERN,
        this.name,
      );
    }

    // split/join avoids "$" patterns in the replacement being expanded
    const updated = input.replace_all
      ? content.split(input.old_string).join(input.new_string)
      : content.replace(input.old_string, () => input.new_string);

    await fs.writeFile(filePath, updated, 'utf-8');
    return 'ok';
  }
}
