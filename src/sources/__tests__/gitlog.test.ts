import { describe, it, expect, vi, beforeEach } from 'vitest';

const mockRaw = vi.fn();

vi.mock('simple-git', () => ({
  default: vi.fn(() => ({ raw: mockRaw })),
}));

import { buildLogArgs, gitlogSource, parseLogArgs, parseLogLine } from '../gitlog';
import { GitService } from '../../services/git.service';
import * as ConfigService from '../../services/config.service';
import { createFakeSession } from '../../session/__tests__/fake-session';

const HASH_A = 'a'.repeat(40);
const HASH_B = '0123456789abcdef0123456789abcdef01234567';
const FORMAT = '--pretty=format:%H%x1f%h%x1f%s%x1f%cr%x1f%an';

function logLine(hash: string, short: string, subject: string, date: string, author: string): string {
  return [hash, short, subject, date, author].join('\x1f');
}

describe('parseLogArgs', () => {
  it('reads "all" and the filter after the second colon', () => {
    expect(parseLogArgs(['all'])).toEqual({ all: true, filter: undefined });
    expect(parseLogArgs(['', 'fix'])).toEqual({ all: false, filter: 'fix' });
    expect(parseLogArgs([])).toEqual({ all: false, filter: undefined });
  });
});

describe('buildLogArgs', () => {
  it('includes --all for the all-branches listing', () => {
    const args = buildLogArgs({ all: true, maxCount: 200 });

    expect(args).toEqual(['log', FORMAT, '--max-count=200', '--all']);
  });

  it('never includes --all for the plain listing', () => {
    const args = buildLogArgs({ all: false, maxCount: 50 });

    expect(args).not.toContain('--all');
    expect(args).toEqual(['log', FORMAT, '--max-count=50']);
  });

  it('passes the filter through unescaped as a single argument', () => {
    const args = buildLogArgs({ all: false, filter: 'fix: "quoted" $HOME *', maxCount: 10 });

    expect(args[args.length - 1]).toBe('--grep=fix: "quoted" $HOME *');
  });

  it('restricts to the current file after a pathspec separator', () => {
    const args = buildLogArgs({ all: false, file: 'src/app.ts', maxCount: 10 });

    expect(args.slice(-2)).toEqual(['--', 'src/app.ts']);
  });

  it('ignores the current file for the all listing', () => {
    const args = buildLogArgs({ all: true, file: 'src/app.ts', maxCount: 10 });

    expect(args).not.toContain('src/app.ts');
  });
});

describe('parseLogLine', () => {
  it('builds a candidate keyed by the full hash', () => {
    const candidate = parseLogLine(logLine(HASH_B, '0123456', 'Add parser', '2 days ago', 'Ada'), '/repo');

    expect(candidate).toEqual({
      kind: 'gitlog',
      word: '0123456 Add parser (2 days ago) <Ada>',
      root: '/repo',
      hash: HASH_B,
      shortHash: '0123456',
      subject: 'Add parser',
      author: 'Ada',
      relativeDate: '2 days ago',
    });
  });

  it('records the file the listing was restricted to', () => {
    const candidate = parseLogLine(logLine(HASH_A, 'aaaaaaa', 's', 'now', 'me'), '/repo', 'src/x.ts');

    expect(candidate?.path).toBe('src/x.ts');
  });

  it('skips lines with missing fields or a bad hash', () => {
    expect(parseLogLine('', '/repo')).toBeNull();
    expect(parseLogLine('not a log line', '/repo')).toBeNull();
    expect(parseLogLine(logLine('xyz', 'xyz', 's', 'now', 'me'), '/repo')).toBeNull();
  });
});

describe('gitlogSource.gather', () => {
  const config = ConfigService.defaults();

  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('lists commits of the current file', async () => {
    mockRaw.mockResolvedValue(
      [logLine(HASH_A, 'aaaaaaa', 'First', '1 hour ago', 'Ada'), logLine(HASH_B, '0123456', 'Second', 'now', 'Bo')].join('\n')
    );

    const candidates = await gitlogSource.gather({
      root: '/repo',
      file: 'src/app.ts',
      args: [],
      git: new GitService('/repo'),
      session: createFakeSession(),
      config,
    });

    expect(mockRaw).toHaveBeenCalledWith(['log', FORMAT, '--max-count=200', '--', 'src/app.ts']);
    expect(candidates.map((c) => c.hash)).toEqual([HASH_A, HASH_B]);
    expect(candidates[0].path).toBe('src/app.ts');
  });

  it('lists the whole repository on every branch for gitlog:all', async () => {
    mockRaw.mockResolvedValue('');

    const candidates = await gitlogSource.gather({
      root: '/repo',
      file: 'src/app.ts',
      args: ['all'],
      git: new GitService('/repo'),
      session: createFakeSession(),
      config,
    });

    expect(mockRaw).toHaveBeenCalledWith(['log', FORMAT, '--max-count=200', '--all']);
    expect(candidates).toEqual([]);
  });

  it('applies the configured commit limit and message filter', async () => {
    mockRaw.mockResolvedValue('');

    await gitlogSource.gather({
      root: '/repo',
      args: ['', 'release: v2'],
      git: new GitService('/repo'),
      session: createFakeSession(),
      config: { ...config, log: { maxCount: 5 } },
    });

    expect(mockRaw).toHaveBeenCalledWith(['log', FORMAT, '--max-count=5', '--grep=release: v2']);
  });
});
