import { GitService } from '../services/git.service';
import type { Session } from '../session/types';
import type { CommitCandidate } from '../types/candidate';
import { showDiff } from './files';
import type { Kind } from './types';

async function requireCommit(
  git: GitService,
  target: CommitCandidate,
  session: Session
): Promise<boolean> {
  if (await git.commitExists(target.hash)) return true;
  session.error(`Commit not found: ${target.shortHash}`);
  return false;
}

function pathsOf(target: CommitCandidate): string[] {
  return target.path ? [target.path] : [];
}

export const gitlogKind: Kind<'gitlog'> = {
  name: 'gitlog',
  defaultAction: 'open',
  actions: [
    {
      name: 'open',
      description: 'Show the commit in a buffer',
      async run([target], { session }) {
        const git = new GitService(target.root);
        if (!(await requireCommit(git, target, session))) return;
        const content = await git.show(target.hash);
        await session.openBuffer(`${target.shortHash} ${target.subject}`, content);
      },
    },
    {
      name: 'preview',
      description: 'Preview the commit',
      persist: true,
      async run([target], { session }) {
        const git = new GitService(target.root);
        if (!(await requireCommit(git, target, session))) return;
        const content = await git.show(target.hash, ['--stat', '--patch'], pathsOf(target));
        await session.preview(`${target.shortHash} ${target.subject}`, content);
      },
    },
    {
      // Named "delete" for the key it is usually bound to; it shows a diff.
      name: 'delete',
      description: 'Diff the commit against the working copy',
      persist: true,
      async run([target], { session }) {
        const git = new GitService(target.root);
        if (!(await requireCommit(git, target, session))) return;
        const diff = await git.diff([target.hash], pathsOf(target));
        await showDiff(session, `${target.shortHash}..working copy`, diff);
      },
    },
    {
      name: 'reset',
      description: 'Move HEAD to the commit, keeping the working tree',
      redraw: true,
      async run([target], { session }) {
        const git = new GitService(target.root);
        if (!(await requireCommit(git, target, session))) return;
        const answer = await session.input(`Reset HEAD to ${target.shortHash}? [y/n] `, 'n');
        if (answer !== 'y') return;
        await git.resetTo(target.hash);
        session.message(`HEAD is now at ${target.shortHash} ${target.subject}`);
      },
    },
  ],
};
