import { StructuredTool } from '@langchain/core/tools';
import { LocalSandbox } from './sandbox.js';
import { ShellSession } from './shell-session.js';
import { ReadFileTool } from './tools/read-file.js';
import { WriteFileTool } from './tools/write-file.js';
import { EditFileTool } from './tools/edit-file.js';
import { BashTool } from './tools/bash.js';
import { GlobTool } from './tools/glob.js';
import { GrepTool } from './tools/grep.js';

export { ReadFileTool } from './tools/read-file.js';
export { WriteFileTool } from './tools/write-file.js';
export { EditFileTool } from './tools/edit-file.js';
export { BashTool } from './tools/bash.js';
export { GlobTool, MAX_GLOB_HITS } from './tools/glob.js';
export { GrepTool, MAX_GREP_HITS } from './tools/grep.js';

/**
 * The built-in tools, all confined to `cwd`
 */
export function createTools(cwd: string): StructuredTool[] {
  const sandbox = new LocalSandbox(cwd);
  return [
    new ReadFileTool(sandbox),
    new WriteFileTool(sandbox),
    new EditFileTool(sandbox),
    new BashTool(new ShellSession(sandbox.root)),
    new GlobTool(sandbox),
    new GrepTool(sandbox),
  ];
}
