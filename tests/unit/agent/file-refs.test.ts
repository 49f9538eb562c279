/**
 * @path reference Tests
 */

import path from 'path';
import fs from 'fs-extra';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  DEFAULT_FILE_REFERENCE_EXTENSIONS,
  DEFAULT_FILE_REFERENCE_MAX_SIZE,
  FileReferenceResolver,
  findFileReferences,
  resolveFileReferences,
  type FileReferenceLimits,
} from '../../../src/agent/file-refs.js';
import { LocalSandbox } from '../../../src/agent/sandbox.js';
import { makeTempDir } from '../../helpers/fakes.js';

function references(text: string): string[] {
  return findFileReferences(text).map((ref) => ref.reference);
}

describe('findFileReferences()', () => {
  it('should find each reference with its offset', () => {
    expect(findFileReferences('Check @file.ts and @src/another.txt')).toEqual([
      { index: 6, reference: 'file.ts' },
      { index: 19, reference: 'src/another.txt' },
    ]);
  });

  it('should find a reference at the start of a line', () => {
    expect(references('@main.ts\nsecond line')).toEqual(['main.ts']);
  });

  it('should find references after opening brackets and commas', () => {
    expect(references('Files: (@a.txt,@b.md) [@c.json]')).toEqual(['a.txt', 'b.md', 'c.json']);
  });

  it('should ignore email addresses', () => {
    expect(references('Contact user@example.com for help')).toEqual([]);
  });

  it('should leave a sentence-ending dot out of the path', () => {
    expect(references('Summarize @notes.txt.')).toEqual(['notes.txt']);
  });

  it('should ignore a bare @', () => {
    expect(references('@ nothing here')).toEqual([]);
  });
});

describe('resolveFileReferences()', () => {
  let root: string;
  let cwd: string;
  let sandbox: LocalSandbox;
  const limits: FileReferenceLimits = {
    maxSize: DEFAULT_FILE_REFERENCE_MAX_SIZE,
    allowedExtensions: [...DEFAULT_FILE_REFERENCE_EXTENSIONS],
  };

  beforeEach(async () => {
    root = await makeTempDir();
    cwd = path.join(root, 'project');
    await fs.ensureDir(cwd);
    sandbox = new LocalSandbox(cwd);
  });

  afterEach(async () => {
    await fs.remove(root);
  });

  it('should inline the file in a fenced block', async () => {
    await fs.outputFile(path.join(cwd, 'notes.txt'), 'Hello, world!');

    const expanded = await resolveFileReferences('Check @notes.txt please', sandbox, limits);

    expect(expanded).toEqual({
      text: 'Check \n```\n// File: notes.txt\nHello, world!\n```\n please',
      inlined: ['notes.txt'],
      skipped: [],
    });
  });

  it('should inline several files from subdirectories', async () => {
    await fs.outputFile(path.join(cwd, 'src', 'a.ts'), 'export const a = 1;');
    await fs.outputFile(path.join(cwd, 'b.md'), '# B');

    const expanded = await resolveFileReferences('Compare @src/a.ts and @b.md', sandbox, limits);

    expect(expanded.inlined).toEqual(['src/a.ts', 'b.md']);
    expect(expanded.text).toBe(
      'Compare \n```\n// File: src/a.ts\nexport const a = 1;\n```\n and \n```\n// File: b.md\n# B\n```\n',
    );
  });

  it('should return input without references unchanged', async () => {
    expect(await resolveFileReferences('plain text', sandbox, limits)).toEqual({
      text: 'plain text',
      inlined: [],
      skipped: [],
    });
  });

  it('should keep a missing file as typed', async () => {
    const expanded = await resolveFileReferences('Check @missing.txt now', sandbox, limits);

    expect(expanded.text).toBe('Check @missing.txt now');
    expect(expanded.skipped).toEqual([{ reference: 'missing.txt', reason: 'File not found: missing.txt' }]);
  });

  it('should not read outside the working directory', async () => {
    await fs.outputFile(path.join(root, 'secret.txt'), 'test-secret');

    const expanded = await resolveFileReferences('@../secret.txt', sandbox, limits);

    expect(expanded.text).toBe('@../secret.txt');
    expect(expanded.skipped).toEqual([
      { reference: '../secret.txt', reason: 'Path is outside the working directory: ../secret.txt' },
    ]);
  });

  it('should not follow a symlink out of the working directory', async () => {
    await fs.outputFile(path.join(root, 'secret.txt'), 'test-secret');
    await fs.symlink(path.join(root, 'secret.txt'), path.join(cwd, 'link.txt'));

    const expanded = await resolveFileReferences('@link.txt', sandbox, limits);

    expect(expanded.text).toBe('@link.txt');
    expect(expanded.skipped).toEqual([
      { reference: 'link.txt', reason: 'Path is outside the working directory: link.txt' },
    ]);
  });

  it('should skip extensions that are not allowed', async () => {
    await fs.outputFile(path.join(cwd, 'tool.exe'), 'binary');

    const expanded = await resolveFileReferences('@tool.exe', sandbox, limits);

    expect(expanded.skipped).toEqual([{ reference: 'tool.exe', reason: 'Extension not allowed: tool.exe' }]);
  });

  it('should skip files over the size limit', async () => {
    await fs.outputFile(path.join(cwd, 'big.txt'), 'abcdefgh');

    const expanded = await resolveFileReferences('@big.txt', sandbox, { ...limits, maxSize: 4 });

    expect(expanded.skipped).toEqual([{ reference: 'big.txt', reason: 'File is larger than 4 bytes: big.txt' }]);
  });

  it('should skip directories', async () => {
    await fs.ensureDir(path.join(cwd, 'docs.md'));

    const expanded = await resolveFileReferences('@docs.md', sandbox, limits);

    expect(expanded.skipped).toEqual([{ reference: 'docs.md', reason: 'Not a file: docs.md' }]);
  });
});

describe('FileReferenceResolver', () => {
  let cwd: string;

  beforeEach(async () => {
    cwd = await makeTempDir();
    await fs.outputFile(path.join(cwd, 'a.txt'), 'A');
  });

  afterEach(async () => {
    await fs.remove(cwd);
  });

  it('should expand references when enabled', async () => {
    const resolver = new FileReferenceResolver(cwd, {
      enabled: true,
      maxSize: 100,
      allowedExtensions: ['txt'],
    });

    expect((await resolver.expand('see @a.txt')).text).toBe('see \n```\n// File: a.txt\nA\n```\n');
  });

  it('should leave input as typed when disabled', async () => {
    const resolver = new FileReferenceResolver(cwd, {
      enabled: false,
      maxSize: 100,
      allowedExtensions: ['txt'],
    });

    expect(await resolver.expand('see @a.txt')).toEqual({ text: 'see @a.txt', inlined: [], skipped: [] });
  });
});
