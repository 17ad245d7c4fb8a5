import { simpleGit, type SimpleGit } from 'simple-git';
import { resolve } from 'node:path';

export class GitBridge {
  private git: SimpleGit;

  constructor(repoPath: string) {
    this.git = simpleGit(repoPath);
  }

  async isRepo(): Promise<boolean> {
    try {
      await this.git.revparse(['--is-inside-work-tree']);
      return true;
    } catch {
      return false;
    }
  }

  async getRepoRoot(): Promise<string> {
    const root = await this.git.revparse(['--show-toplevel']);
    return root.trim();
  }

  /** Absolute path of the hooks directory, honoring core.hooksPath. */
  async getHooksDir(): Promise<string> {
    const [root, hooks] = await Promise.all([
      this.getRepoRoot(),
      this.git.revparse(['--git-path', 'hooks']),
    ]);
    return resolve(root, hooks.trim());
  }

  /**
   * Tracked files plus untracked files that are not ignored, relative to the
   * repository root.
   */
  async listFiles(pathspecs: string[] = []): Promise<string[]> {
    const raw = await this.git.raw(['ls-files', '--cached', '--others', '--exclude-standard', '--', ...pathspecs]);
    return [...new Set(raw.split('\n').map(line => line.trim()).filter(Boolean))].sort();
  }
}
