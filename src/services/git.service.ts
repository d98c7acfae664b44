import simpleGit, { type SimpleGit } from 'simple-git';
import { GIT_BINARY } from '../config';
import { logDebug } from '../ui/logger';

/**
 * Thin wrapper around simple-git, one instance per repository root.
 * Every method propagates errors — a non-zero git exit rejects with
 * simple-git's GitError and callers decide how to report it.
 */
export class GitService {
  constructor(readonly repoPath: string) {}

  private git(): SimpleGit {
    return simpleGit({
      baseDir: this.repoPath,
      binary: GIT_BINARY,
      maxConcurrentProcesses: 1,
    });
  }

  async raw(args: string[]): Promise<string> {
    logDebug(`git ${args.join(' ')}`);
    return this.git().raw(args);
  }

  async getRoot(): Promise<string> {
    const root = await this.raw(['rev-parse', '--show-toplevel']);
    return root.trim();
  }

  async getVersion(): Promise<string> {
    const version = await this.git().version();
    if (!version.installed) {
      throw new Error(`${GIT_BINARY} is not installed`);
    }
    return `${version.major}.${version.minor}.${version.patch}`;
  }

  async statusPorcelain(): Promise<string> {
    return this.raw(['status', '--porcelain', '-uall']);
  }

  async changedNameStatus(): Promise<string> {
    return this.raw(['diff', '--name-status', 'HEAD']);
  }

  async commitExists(hash: string): Promise<boolean> {
    try {
      await this.raw(['cat-file', '-e', `${hash}^{commit}`]);
      return true;
    } catch {
      return false;
    }
  }

  async show(hash: string, extra: string[] = [], paths: string[] = []): Promise<string> {
    return this.raw(['show', ...extra, hash, ...pathspec(paths)]);
  }

  async diff(extra: string[], paths: string[] = []): Promise<string> {
    return this.raw(['diff', ...extra, ...pathspec(paths)]);
  }

  async add(paths: string[]): Promise<void> {
    await this.raw(['add', '--', ...paths]);
  }

  async unstage(paths: string[]): Promise<void> {
    await this.raw(['reset', '-q', 'HEAD', '--', ...paths]);
  }

  async checkout(paths: string[]): Promise<void> {
    await this.raw(['checkout', '--', ...paths]);
  }

  async resetTo(hash: string): Promise<void> {
    await this.raw(['reset', '-q', hash]);
  }

  async commit(message: string, paths: string[]): Promise<string> {
    return this.raw(['commit', '-m', message, ...pathspec(paths)]);
  }
}

function pathspec(paths: string[]): string[] {
  return paths.length > 0 ? ['--', ...paths] : [];
}
