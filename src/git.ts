import { simpleGit, type SimpleGit } from 'simple-git';
import type { RepositoryInspector } from './types.js';
import { debug, errorMessage } from './log.js';

/** The raw git queries the inspector is built from. */
export interface GitCommands {
  topLevel(): Promise<string>;
  porcelainStatus(): Promise<string>;
  lastSubject(): Promise<string>;
  shortStatus(path: string): Promise<string>;
}

export const simpleGitCommands = (cwd: string): GitCommands => {
  // simpleGit throws synchronously for a missing baseDir, so build it inside the call.
  let instance: SimpleGit | undefined;
  const git = () => (instance ??= simpleGit({ baseDir: cwd }));
  return {
    topLevel: async () => git().revparse(['--show-toplevel']),
    porcelainStatus: async () => git().raw(['status', '--porcelain']),
    lastSubject: async () => git().raw(['show', '-s', '--format=%s']),
    shortStatus: async (path) => git().raw(['status', '--short', '--', path]),
  };
};

export const countStatusEntries = (raw: string): number =>
  raw.split('\n').filter((line) => line.trim().length > 0).length;

/**
 * Read-only view of the repository. A failing git call (not a repository,
 * no commits yet, git missing) reads as `false` or `''`.
 */
export class GitInspector implements RepositoryInspector {
  constructor(private commands: GitCommands) {}

  static forDirectory(cwd: string): GitInspector {
    return new GitInspector(simpleGitCommands(cwd));
  }

  private async query(label: string, run: () => Promise<string>): Promise<string | null> {
    try {
      return await run();
    } catch (e) {
      debug('git', `${label} failed:`, errorMessage(e));
      return null;
    }
  }

  async isRepository(): Promise<boolean> {
    const out = await this.query('rev-parse', () => this.commands.topLevel());
    return !!out && out.trim() !== '';
  }

  async treeIsClean(): Promise<boolean> {
    const out = await this.query('status', () => this.commands.porcelainStatus());
    return out !== null && countStatusEntries(out) === 0;
  }

  async lastCommitSubject(): Promise<string> {
    const out = await this.query('show', () => this.commands.lastSubject());
    return (out ?? '').trim();
  }

  async fileHasPendingChanges(path: string): Promise<boolean> {
    const out = await this.query('status --short', () => this.commands.shortStatus(path));
    return !!out && countStatusEntries(out) > 0;
  }
}
