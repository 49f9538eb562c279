/**
 * Tool Registry for agentloop
 *
 * Maps tool names to StructuredTool instances and runs them, turning every
 * failure into a typed ToolError result.
 *
 * Usage:
 * ```typescript
 * const registry = new ToolRegistry();
 * registry.registerAll(createTools(cwd));
 *
 * const result = await registry.execute('read_file', { path: 'README.md' });
 * if (!result.ok) console.error(result.error.code);
 * ```
 */

import { StructuredTool, ToolInputParsingException } from '@langchain/core/tools';
import { ToolError, ToolErrorCode, errorMessage } from '../core/errors/index.js';

export type ToolExecutionResult = { ok: true; output: string } | { ok: false; error: ToolError };

export class ToolRegistry {
  private tools: Map<string, StructuredTool> = new Map();

  /**
   * Register a tool; a tool with the same name is replaced
   */
  register(tool: StructuredTool): void {
    this.tools.set(tool.name, tool);
  }

  registerAll(tools: StructuredTool[]): void {
    for (const tool of tools) {
      this.register(tool);
    }
  }

  get(name: string): StructuredTool | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  getAll(): StructuredTool[] {
    return Array.from(this.tools.values());
  }

  getNames(): string[] {
    return Array.from(this.tools.keys());
  }

  get size(): number {
    return this.tools.size;
  }

  /**
   * Validate `args` against the tool's schema and run it
   */
  async execute(name: string, args: Record<string, unknown>, signal?: AbortSignal): Promise<ToolExecutionResult> {
    const tool = this.tools.get(name);
    if (!tool) {
      return { ok: false, error: new ToolError(`Unknown tool: ${name}`, ToolErrorCode.UNKNOWN_TOOL, name) };
    }

    try {
      const output: unknown = await tool.invoke(args, { signal });
      return { ok: true, output: typeof output === 'string' ? output : JSON.stringify(output) };
    } catch (error) {
      if (error instanceof ToolError) {
        return { ok: false, error };
      }
      if (error instanceof ToolInputParsingException) {
        return {
          ok: false,
          error: new ToolError(`Invalid arguments for ${name}: ${error.message}`, ToolErrorCode.INVALID_ARGUMENTS, name),
        };
      }
      return {
        ok: false,
        error: new ToolError(errorMessage(error), ToolErrorCode.EXECUTION_FAILED, name),
      };
    }
  }
}
