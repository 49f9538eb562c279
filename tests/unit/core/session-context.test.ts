/**
 * Session context Tests
 */

import path from 'path';
import fs from 'fs-extra';
import { describe, it, expect } from 'vitest';
import { collectSessionContext, formatSessionContext } from '../../../src/core/session-context.js';
import { makeTempDir } from '../../helpers/fakes.js';

describe('formatSessionContext()', () => {
  const cwd = path.resolve('/work/project');

  it('should describe a clean checkout', () => {
    expect(formatSessionContext(cwd, { branch: 'main', dirtyFiles: 0 })).toBe(
      `Working directory: ${cwd}\nGit branch: main\nWorking tree clean`,
    );
  });

  it('should count uncommitted changes', () => {
    expect(formatSessionContext(cwd, { branch: 'feature/x', dirtyFiles: 3 })).toBe(
      `Working directory: ${cwd}\nGit branch: feature/x\nUncommitted changes: 3 file(s)`,
    );
  });

  it('should list recent commits', () => {
    expect(
      formatSessionContext(cwd, { branch: 'main', dirtyFiles: 0, recentCommits: ['abc1234 Add parser', 'def5678 Init'] }),
    ).toBe(
      `Working directory: ${cwd}\nGit branch: main\nWorking tree clean\nRecent commits:\n  - abc1234 Add parser\n  - def5678 Init`,
    );
  });

  it('should omit an empty commit list', () => {
    expect(formatSessionContext(cwd, { branch: 'main', recentCommits: [] })).toBe(
      `Working directory: ${cwd}\nGit branch: main`,
    );
  });

  it('should omit the tree state when it is unknown', () => {
    expect(formatSessionContext(cwd, { branch: 'main' })).toBe(`Working directory: ${cwd}\nGit branch: main`);
  });

  it('should say when there is no repository', () => {
    expect(formatSessionContext(cwd, {})).toBe(`Working directory: ${cwd}\nNot a git repository`);
  });
});

describe('collectSessionContext()', () => {
  it('should report a plain directory as not a repository', async () => {
    const dir = await makeTempDir();
    try {
      expect(await collectSessionContext(dir)).toBe(`Working directory: ${path.resolve(dir)}\nNot a git repository`);
    } finally {
      await fs.remove(dir);
    }
  });
});
