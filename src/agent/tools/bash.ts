import { z } from 'zod';
import { StructuredTool, type ToolRunnableConfig } from '@langchain/core/tools';
import type { CallbackManagerForToolRun } from '@langchain/core/callbacks/manager';
import { ToolError, ToolErrorCode } from '../../core/errors/index.js';
import type { ShellSession } from '../shell-session.js';

const BashSchema = z.object({
  command: z.string().min(1).describe('Shell command to run in the working directory'),
  timeout: z.number().int().positive().optional().describe('Timeout in milliseconds (default: 120000)'),
});

export class BashTool extends StructuredTool {
  name = 'bash';
  description = `Run a shell command in the working directory and return its output.
stderr follows stdout after a "--- stderr ---" line. A non-zero exit is reported as an error.`;

  schema = BashSchema;

  constructor(private readonly shell: ShellSession) {
    super();
  }

  async _call(
    input: z.infer<typeof BashSchema>,
    _runManager?: CallbackManagerForToolRun,
    config?: ToolRunnableConfig,
  ): Promise<string> {
    const result = await this.shell.execute(input.command, { timeout: input.timeout, signal: config?.signal });

    let output = result.stdout;
    if (result.stderr) {
      output += `\n--- stderr ---\n${result.stderr}`;
    }

    if (result.timedOut) {
      throw new ToolError(`Command timed out: ${input.command}`, ToolErrorCode.COMMAND_FAILED, this.name);
    }
    if (result.code !== 0) {
      throw new ToolError(
        output.trim() ? `Exit code: ${result.code}\n${output}` : `Exit code: ${result.code}`,
        ToolErrorCode.COMMAND_FAILED,
        this.name,
      );
    }

    return output.trim() ? output : '(empty)';
  }
}
