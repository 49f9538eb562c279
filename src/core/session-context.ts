import path from 'path';
import { execa } from 'execa';

export const RECENT_COMMIT_COUNT = 5;

export interface RepositoryStatus {
  branch?: string;
  /** Entries in `git status --porcelain` */
  dirtyFiles?: number;
  /** `git log --oneline`, newest first */
  recentCommits?: string[];
}

async function git(cwd: string, args: string[]): Promise<string | undefined> {
  const result = await execa('git', args, { cwd, reject: false });
  return result.exitCode === 0 ? result.stdout : undefined;
}

/**
 * Branch, dirty count and recent commits of the repository at `cwd`; empty
 * outside a git repository
 */
export async function readRepositoryStatus(cwd: string): Promise<RepositoryStatus> {
  const branch = (await git(cwd, ['rev-parse', '--abbrev-ref', 'HEAD']))?.trim();
  if (!branch) {
    return {};
  }
  const status = await git(cwd, ['status', '--porcelain']);
  const dirtyFiles = status === undefined ? undefined : status.split('\n').filter((line) => line.trim()).length;
  // Fails on a branch with no commits yet
  const log = await git(cwd, ['log', '--oneline', `-${RECENT_COMMIT_COUNT}`]);
  const recentCommits = log?.split('\n').filter((line) => line.trim());
  return { branch, dirtyFiles, recentCommits };
}

export function formatSessionContext(cwd: string, status: RepositoryStatus): string {
  const lines = [`Working directory: ${path.resolve(cwd)}`];
  if (status.branch) {
    lines.push(`Git branch: ${status.branch}`);
    if (status.dirtyFiles !== undefined) {
      lines.push(status.dirtyFiles === 0 ? 'Working tree clean' : `Uncommitted changes: ${status.dirtyFiles} file(s)`);
    }
    if (status.recentCommits && status.recentCommits.length > 0) {
      lines.push('Recent commits:', ...status.recentCommits.map((commit) => `  - ${commit}`));
    }
  } else {
    lines.push('Not a git repository');
  }
  return lines.join('\n');
}

/**
 * Short VCS summary shown to hooks and the model
 */
export async function collectSessionContext(cwd: string): Promise<string> {
  return formatSessionContext(cwd, await readRepositoryStatus(cwd));
}
