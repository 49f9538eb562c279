import { z } from 'zod';
import { StructuredTool } from '@langchain/core/tools';
import fs from 'fs-extra';
import type { LocalSandbox } from '../sandbox.js';

const WriteFileSchema = z.object({
  path: z.string().describe('File path, relative to the working directory'),
  content: z.string().describe('Full file content'),
});

export class WriteFileTool extends StructuredTool {
  name = 'write_file';
  description = 'Create or overwrite a file in the working directory. Parent directories are created as needed.';

  schema = WriteFileSchema;

  constructor(private readonly sandbox: LocalSandbox) {
    super();
  }

  async _call(input: z.infer<typeof WriteFileSchema>): Promise<string> {
    const filePath = this.sandbox.resolve(input.path, this.name);
    await fs.outputFile(filePath, input.content, 'utf-8');
    return 'ok';
  }
}
