import { describe, it, expect, vi, beforeEach } from 'vitest';

const mockRaw = vi.fn();

vi.mock('simple-git', () => ({
  default: vi.fn(() => ({ raw: mockRaw })),
}));

import { runAction } from '../../actions/dispatcher';
import * as ConfigService from '../../services/config.service';
import { createFakeSession, type FakeSession } from '../../session/__tests__/fake-session';
import type { CommitCandidate } from '../../types/candidate';

const HASH = '0123456789abcdef0123456789abcdef01234567';

const commit: CommitCandidate = {
  kind: 'gitlog',
  word: '0123456 Add parser (2 days ago) <Ada>',
  root: '/repo',
  hash: HASH,
  shortHash: '0123456',
  subject: 'Add parser',
  author: 'Ada',
  relativeDate: '2 days ago',
};

const config = ConfigService.defaults();

describe('gitlog actions', () => {
  let session: FakeSession;

  beforeEach(() => {
    vi.clearAllMocks();
    session = createFakeSession();
    mockRaw.mockImplementation(async (args: string[]) => {
      if (args[0] === 'cat-file') return '';
      if (args[0] === 'show') return 'commit 0123456\n\n    Add parser\n';
      if (args[0] === 'diff') return 'diff --git a/x b/x\n';
      return '';
    });
  });

  it('opens the commit in a buffer by default', async () => {
    const result = await runAction('default', [commit], { session, config });

    expect(mockRaw).toHaveBeenCalledWith(['cat-file', '-e', `${HASH}^{commit}`]);
    expect(mockRaw).toHaveBeenCalledWith(['show', HASH]);
    expect(session.openBuffer).toHaveBeenCalledWith(
      '0123456 Add parser',
      'commit 0123456\n\n    Add parser\n'
    );
    expect(result).toEqual({ ok: true, persist: false, redraw: false });
  });

  it('reports a commit that no longer exists', async () => {
    mockRaw.mockRejectedValue(new Error('fatal: Not a valid object name'));

    await runAction('open', [commit], { session, config });

    expect(session.openBuffer).not.toHaveBeenCalled();
    expect(session.errors).toEqual(['Commit not found: 0123456']);
  });

  it('previews the commit restricted to the listed file', async () => {
    await runAction('preview', [{ ...commit, path: 'src/parser.ts' }], { session, config });

    expect(mockRaw).toHaveBeenCalledWith(['show', '--stat', '--patch', HASH, '--', 'src/parser.ts']);
    expect(session.preview).toHaveBeenCalled();
    expect(session.openBuffer).not.toHaveBeenCalled();
  });

  it('diffs the commit against the working copy for delete', async () => {
    await runAction('delete', [commit], { session, config });

    expect(mockRaw).toHaveBeenCalledWith(['diff', HASH]);
    expect(session.preview).toHaveBeenCalledWith('0123456..working copy', 'diff --git a/x b/x\n');
  });

  it('resets HEAD to the commit after confirmation', async () => {
    session.answers.push('y');

    await runAction('reset', [commit], { session, config });

    expect(mockRaw).toHaveBeenCalledWith(['reset', '-q', HASH]);
    expect(session.messages).toEqual(['HEAD is now at 0123456 Add parser']);
  });

  it('does nothing when the reset is not confirmed', async () => {
    await runAction('reset', [commit], { session, config });

    expect(session.input).toHaveBeenCalledWith('Reset HEAD to 0123456? [y/n] ', 'n');
    expect(mockRaw).not.toHaveBeenCalledWith(['reset', '-q', HASH]);
  });

  it('rejects actions the kind does not define', async () => {
    const result = await runAction('add', [commit], { session, config });

    expect(result.ok).toBe(false);
    expect(session.errors).toEqual(['Action "add" is not defined for gitlog']);
  });
});
