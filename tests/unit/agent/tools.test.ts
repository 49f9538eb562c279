/**
 * Built-in tool Tests
 *
 * Each test gets its own working directory under the OS temp dir
 */

import path from 'path';
import fs from 'fs-extra';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { LocalSandbox } from '../../../src/agent/sandbox.js';
import { ShellSession } from '../../../src/agent/shell-session.js';
import {
  BashTool,
  EditFileTool,
  GlobTool,
  GrepTool,
  MAX_GREP_HITS,
  ReadFileTool,
  WriteFileTool,
  createTools,
} from '../../../src/agent/tools.js';
import { ToolError, ToolErrorCode } from '../../../src/core/errors/index.js';
import { makeTempDir } from '../../helpers/fakes.js';

async function expectToolError(promise: Promise<unknown>, code: ToolErrorCode): Promise<ToolError> {
  const error: unknown = await promise.then(
    () => undefined,
    (e: unknown) => e,
  );
  expect(error).toBeInstanceOf(ToolError);
  if (!(error instanceof ToolError)) {
    throw new Error('expected a ToolError');
  }
  expect(error.code).toBe(code);
  return error;
}

describe('built-in tools', () => {
  let cwd: string;
  let sandbox: LocalSandbox;

  beforeEach(async () => {
    cwd = await makeTempDir();
    sandbox = new LocalSandbox(cwd);
  });

  afterEach(async () => {
    await fs.remove(cwd);
  });

  describe('createTools()', () => {
    it('should create the six tools in order', () => {
      expect(createTools(cwd).map((tool) => tool.name)).toEqual([
        'read_file',
        'write_file',
        'edit_file',
        'bash',
        'glob',
        'grep',
      ]);
    });
  });

  describe('LocalSandbox', () => {
    it('should resolve paths inside the root', () => {
      expect(sandbox.resolve('src/a.ts')).toBe(path.join(sandbox.root, 'src', 'a.ts'));
      expect(sandbox.display(path.join(sandbox.root, 'src', 'a.ts'))).toBe('src/a.ts');
      expect(sandbox.display(sandbox.root)).toBe('.');
    });

    it('should reject paths that leave the root', () => {
      expect(() => sandbox.resolve('../outside.txt', 'read_file')).toThrow(ToolError);
      expect(() => sandbox.resolve('/etc/passwd')).toThrow('Path is outside the working directory: /etc/passwd');
    });

    it('should allow names that only start with two dots', () => {
      expect(sandbox.contains(path.join(sandbox.root, '..hidden'))).toBe(true);
    });
  });

  describe('ReadFileTool', () => {
    let tool: ReadFileTool;

    beforeEach(async () => {
      tool = new ReadFileTool(sandbox);
      await fs.writeFile(path.join(cwd, 'notes.txt'), 'alpha\nbeta\ngamma\n');
    });

    it('should return numbered lines', async () => {
      expect(await tool._call({ path: 'notes.txt' })).toBe('   1| alpha\n   2| beta\n   3| gamma');
    });

    it('should page with offset and limit', async () => {
      expect(await tool._call({ path: 'notes.txt', offset: 1, limit: 1 })).toBe('   2| beta');
    });

    it('should return (EOF) past the end', async () => {
      expect(await tool._call({ path: 'notes.txt', offset: 3 })).toBe('(EOF)');
    });

    it('should return nothing for a zero limit', async () => {
      expect(await tool._call({ path: 'notes.txt', limit: 0 })).toBe('');
    });

    it('should fail for a missing file', async () => {
      await expectToolError(tool._call({ path: 'absent.txt' }), ToolErrorCode.FILE_NOT_FOUND);
    });

    it('should refuse paths outside the working directory', async () => {
      await expectToolError(tool._call({ path: '../x.txt' }), ToolErrorCode.PATH_OUTSIDE_WORKING_DIR);
    });
  });

  describe('WriteFileTool', () => {
    it('should create parent directories', async () => {
      const tool = new WriteFileTool(sandbox);

      expect(await tool._call({ path: 'a/b/c.txt', content: 'hello' })).toBe('ok');
      expect(await fs.readFile(path.join(cwd, 'a', 'b', 'c.txt'), 'utf-8')).toBe('hello');
    });
  });

  describe('EditFileTool', () => {
    let tool: EditFileTool;
    let file: string;

    beforeEach(async () => {
      tool = new EditFileTool(sandbox);
      file = path.join(cwd, 'code.ts');
      await fs.writeFile(file, 'const a = 1;\nconst b = 1;\n');
    });

    it('should replace a unique match', async () => {
      expect(await tool._call({ path: 'code.ts', old_string: 'a = 1', new_string: 'a = 2' })).toBe('ok');
      expect(await fs.readFile(file, 'utf-8')).toBe('const a = 2;\nconst b = 1;\n');
    });

    it('should refuse an ambiguous match without replace_all', async () => {
      const error = await expectToolError(
        tool._call({ path: 'code.ts', old_string: '= 1', new_string: '= 3' }),
        ToolErrorCode.AMBIGUOUS_PATTERN,
      );
      expect(error.message).toBe('Pattern occurs 2 times; add context or set replace_all');
    });

    it('should replace every match with replace_all', async () => {
      await tool._call({ path: 'code.ts', old_string: '= 1', new_string: '= $&', replace_all: true });
      expect(await fs.readFile(file, 'utf-8')).toBe('const a = $&;\nconst b = $&;\n');
    });

    it('should insert replacement text literally', async () => {
      await tool._call({ path: 'code.ts', old_string: 'b = 1', new_string: "b = '$1'" });
      expect(await fs.readFile(file, 'utf-8')).toBe("const a = 1;\nconst b = '$1';\n");
    });

    it('should fail when the text is absent', async () => {
      await expectToolError(
        tool._call({ path: 'code.ts', old_string: 'missing', new_string: 'x' }),
        ToolErrorCode.PATTERN_NOT_FOUND,
      );
    });
  });

  describe('BashTool', () => {
    let tool: BashTool;

    beforeEach(() => {
      tool = new BashTool(new ShellSession(cwd));
    });

    it('should return stdout', async () => {
      expect(await tool._call({ command: 'echo hello' })).toBe('hello');
    });

    it('should run in the working directory', async () => {
      await fs.writeFile(path.join(cwd, 'here.txt'), 'x');
      expect(await tool._call({ command: 'ls' })).toBe('here.txt');
    });

    it('should append stderr after a separator', async () => {
      expect(await tool._call({ command: 'echo out; echo err >&2' })).toBe('out\n--- stderr ---\nerr');
    });

    it('should report empty output', async () => {
      expect(await tool._call({ command: 'true' })).toBe('(empty)');
    });

    it('should fail on a non-zero exit', async () => {
      const error = await expectToolError(tool._call({ command: 'echo nope; exit 3' }), ToolErrorCode.COMMAND_FAILED);
      expect(error.message).toBe('Exit code: 3\nnope');
    });
  });

  describe('GlobTool', () => {
    let tool: GlobTool;

    beforeEach(async () => {
      tool = new GlobTool(sandbox);
      await fs.outputFile(path.join(cwd, 'src', 'a.ts'), '');
      await fs.outputFile(path.join(cwd, 'src', 'b.ts'), '');
      await fs.outputFile(path.join(cwd, 'README.md'), '');
      const old = new Date('2020-01-01T00:00:00Z');
      await fs.utimes(path.join(cwd, 'src', 'a.ts'), old, old);
    });

    it('should list matches newest first', async () => {
      expect(await tool._call({ pattern: 'src/*.ts' })).toBe('src/b.ts\nsrc/a.ts');
    });

    it('should search from a subdirectory', async () => {
      expect(await tool._call({ pattern: '*.ts', path: 'src' })).toBe('src/b.ts\nsrc/a.ts');
    });

    it('should return none without matches', async () => {
      expect(await tool._call({ pattern: '**/*.py' })).toBe('none');
    });

    it('should refuse patterns that leave the working directory', async () => {
      await expectToolError(tool._call({ pattern: '../*.ts' }), ToolErrorCode.PATH_OUTSIDE_WORKING_DIR);
    });
  });

  describe('GrepTool', () => {
    let tool: GrepTool;

    beforeEach(async () => {
      tool = new GrepTool(sandbox);
      await fs.outputFile(path.join(cwd, 'src', 'a.ts'), 'export const x = 1;\n  // TODO: rename\n');
      await fs.outputFile(path.join(cwd, 'src', 'b.ts'), 'const todo = false;\n');
    });

    it('should report file, line and trimmed text', async () => {
      expect(await tool._call({ pattern: 'TODO' })).toBe('src/a.ts:2: // TODO: rename');
    });

    it('should search a single file', async () => {
      expect(await tool._call({ pattern: 'const', path: 'src/b.ts' })).toBe('src/b.ts:1: const todo = false;');
    });

    it('should return none without hits', async () => {
      expect(await tool._call({ pattern: 'zzz' })).toBe('none');
    });

    it('should cap the number of hits', async () => {
      await fs.outputFile(path.join(cwd, 'many.txt'), 'hit\n'.repeat(MAX_GREP_HITS + 20));
      const output = await tool._call({ pattern: '^hit$', path: 'many.txt' });
      expect(output.split('\n')).toHaveLength(MAX_GREP_HITS);
    });

    it('should reject an invalid expression', async () => {
      await expectToolError(tool._call({ pattern: '(' }), ToolErrorCode.INVALID_ARGUMENTS);
    });

    it('should fail for a missing path', async () => {
      await expectToolError(tool._call({ pattern: 'x', path: 'nowhere' }), ToolErrorCode.FILE_NOT_FOUND);
    });
  });
});
