import path from 'path';
import { ToolError, ToolErrorCode } from '../core/errors/index.js';

/**
 * Working-directory jail shared by the file tools. Relative paths resolve
 * against the root; anything resolving outside it is rejected.
 */
export class LocalSandbox {
  readonly root: string;

  constructor(cwd: string) {
    this.root = path.resolve(cwd);
  }

  /**
   * Absolute path for `target`, which must stay inside the root
   *
   * @throws ToolError PATH_OUTSIDE_WORKING_DIR
   */
  resolve(target: string, toolName?: string): string {
    const resolved = path.resolve(this.root, target);
    if (!this.contains(resolved)) {
      throw new ToolError(
        `Path is outside the working directory: ${target}`,
        ToolErrorCode.PATH_OUTSIDE_WORKING_DIR,
        toolName,
      );
    }
    return resolved;
  }

  contains(absolutePath: string): boolean {
    const relative = path.relative(this.root, absolutePath);
    if (relative === '') return true;
    return relative !== '..' && !relative.startsWith(`..${path.sep}`) && !path.isAbsolute(relative);
  }

  /**
   * Path relative to the root, with forward slashes, for tool output
   */
  display(absolutePath: string): string {
    return path.relative(this.root, absolutePath).split(path.sep).join('/') || '.';
  }
}
