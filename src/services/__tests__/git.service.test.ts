import { describe, it, expect, vi, beforeEach } from 'vitest';

const mockRaw = vi.fn();
const mockVersion = vi.fn();

vi.mock('simple-git', () => ({
  default: vi.fn(() => ({
    raw: mockRaw,
    version: mockVersion,
  })),
}));

import simpleGit from 'simple-git';
import { GitService } from '../git.service';

describe('GitService', () => {
  let git: GitService;

  beforeEach(() => {
    vi.clearAllMocks();
    git = new GitService('/repo');
  });

  it('runs git serially in the repository', async () => {
    mockRaw.mockResolvedValue('');

    await git.raw(['status']);

    expect(simpleGit).toHaveBeenCalledWith({
      baseDir: '/repo',
      binary: 'git',
      maxConcurrentProcesses: 1,
    });
  });

  describe('getRoot()', () => {
    it('returns the trimmed top-level directory', async () => {
      mockRaw.mockResolvedValue('/repo\n');

      expect(await git.getRoot()).toBe('/repo');
      expect(mockRaw).toHaveBeenCalledWith(['rev-parse', '--show-toplevel']);
    });

    it('propagates errors from simple-git', async () => {
      mockRaw.mockRejectedValue(new Error('fatal: not a git repository'));

      await expect(git.getRoot()).rejects.toThrow('fatal: not a git repository');
    });
  });

  describe('getVersion()', () => {
    it('formats the installed version', async () => {
      mockVersion.mockResolvedValue({ major: 2, minor: 45, patch: 1, agent: 'git', installed: true });

      expect(await git.getVersion()).toBe('2.45.1');
    });

    it('throws when git is missing', async () => {
      mockVersion.mockResolvedValue({ major: 0, minor: 0, patch: 0, agent: '', installed: false });

      await expect(git.getVersion()).rejects.toThrow('git is not installed');
    });
  });

  describe('commitExists()', () => {
    it('is true when cat-file succeeds', async () => {
      mockRaw.mockResolvedValue('');

      expect(await git.commitExists('abc123')).toBe(true);
      expect(mockRaw).toHaveBeenCalledWith(['cat-file', '-e', 'abc123^{commit}']);
    });

    it('is false when cat-file fails', async () => {
      mockRaw.mockRejectedValue(new Error('fatal: Not a valid object name abc123'));

      expect(await git.commitExists('abc123')).toBe(false);
    });
  });

  describe('write operations', () => {
    beforeEach(() => {
      mockRaw.mockResolvedValue('');
    });

    it('stages paths after a pathspec separator', async () => {
      await git.add(['-weird.txt', 'b.txt']);

      expect(mockRaw).toHaveBeenCalledWith(['add', '--', '-weird.txt', 'b.txt']);
    });

    it('unstages against HEAD', async () => {
      await git.unstage(['a.txt']);

      expect(mockRaw).toHaveBeenCalledWith(['reset', '-q', 'HEAD', '--', 'a.txt']);
    });

    it('checks out work-tree paths', async () => {
      await git.checkout(['a.txt']);

      expect(mockRaw).toHaveBeenCalledWith(['checkout', '--', 'a.txt']);
    });

    it('commits only the given paths', async () => {
      await git.commit('Message', ['a.txt']);

      expect(mockRaw).toHaveBeenCalledWith(['commit', '-m', 'Message', '--', 'a.txt']);
    });

    it('omits the pathspec when no paths are given', async () => {
      await git.show('abc123');
      await git.diff(['HEAD']);

      expect(mockRaw).toHaveBeenCalledWith(['show', 'abc123']);
      expect(mockRaw).toHaveBeenCalledWith(['diff', 'HEAD']);
    });
  });
});
