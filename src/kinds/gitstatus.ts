import * as fs from 'fs/promises';
import { GitService } from '../services/git.service';
import { GIT_BINARY } from '../config';
import type { Session } from '../session/types';
import type { StatusCandidate } from '../types/candidate';
import { absolutePath, fileExists, openFiles, showDiff } from './files';
import type { Kind } from './types';

function isUntracked(target: StatusCandidate): boolean {
  return !target.staged && !target.tree;
}

async function diffOf(target: StatusCandidate, cached: boolean): Promise<string> {
  if (isUntracked(target)) {
    // Nothing to diff against; the whole file is new.
    return fs.readFile(absolutePath(target), 'utf-8');
  }
  const git = new GitService(target.root);
  return git.diff(cached ? ['--cached'] : [], [target.path]);
}

/** Both sides of a staged rename or copy; index operations need the source path too. */
function indexPaths(target: StatusCandidate): string[] {
  return target.origPath ? [target.origPath, target.path] : [target.path];
}

async function requireExisting(target: StatusCandidate, session: Session): Promise<boolean> {
  // Deleted entries have no file on disk but still have a diff.
  if (target.status.includes('D')) return true;
  if (await fileExists(absolutePath(target))) return true;
  session.error(`File not found: ${target.path}`);
  return false;
}

export const gitstatusKind: Kind<'gitstatus'> = {
  name: 'gitstatus',
  defaultAction: 'open',
  actions: [
    {
      name: 'open',
      description: 'Open the file',
      run: (targets, { session }) => openFiles(targets, session),
    },
    {
      name: 'preview',
      description: 'Show the diff (or the content of an untracked file)',
      persist: true,
      async run([target], { session }) {
        if (!(await requireExisting(target, session))) return;
        const cached = target.staged && !target.tree;
        await showDiff(session, target.path, await diffOf(target, cached));
      },
    },
    {
      // Named "delete" for the key it is usually bound to; it shows a diff.
      name: 'delete',
      description: 'Diff against the working copy',
      persist: true,
      async run([target], { session }) {
        if (!(await requireExisting(target, session))) return;
        let cached = false;
        if (target.staged && target.tree) {
          cached = (await session.input('Diff cached?[y/n] ', 'y')) === 'y';
        } else if (target.staged) {
          cached = true;
        }
        await showDiff(session, target.path, await diffOf(target, cached));
      },
    },
    {
      name: 'reset',
      description: 'Unstage, discard work-tree changes, or remove an untracked file',
      persist: true,
      redraw: true,
      async run(targets, { session }) {
        for (const target of targets) {
          const git = new GitService(target.root);
          if (target.staged && target.tree) {
            const answer = await session.input('Select action reset or checkout [r/c] ');
            if (answer === 'c') {
              await git.checkout([target.path]);
            } else if (answer === 'r') {
              await git.unstage(indexPaths(target));
            } else {
              session.message(`Skipped ${target.path}`);
            }
          } else if (target.tree) {
            await git.checkout([target.path]);
          } else if (target.staged) {
            await git.unstage(indexPaths(target));
          } else {
            const filePath = absolutePath(target);
            if (!(await fileExists(filePath))) {
              session.error(`File not found: ${target.path}`);
              continue;
            }
            await session.removeFile(filePath);
          }
        }
      },
    },
    {
      name: 'add',
      description: 'Stage the files',
      persist: true,
      redraw: true,
      async run(targets, { session }) {
        const git = new GitService(targets[0].root);
        await git.add(targets.map((t) => t.path));
        session.message(`Staged ${targets.length} file(s)`);
      },
    },
    {
      name: 'patch',
      description: 'Stage hunks interactively',
      redraw: true,
      async run(targets, { session }) {
        const root = targets[0].root;
        const code = await session.runInteractive(
          GIT_BINARY,
          ['add', '--patch', '--', ...targets.map((t) => t.path)],
          root
        );
        if (code !== 0) throw new Error(`git add --patch exited with code ${code}`);
      },
    },
    {
      name: 'commit',
      description: 'Commit the selected files',
      redraw: true,
      async run(targets, { session }) {
        const message = (await session.input('Commit message: ')).trim();
        if (message === '') {
          session.message('Commit aborted: empty message');
          return;
        }
        const git = new GitService(targets[0].root);
        const output = await git.commit(message, targets.flatMap(indexPaths));
        session.message(output.split('\n')[0]);
      },
    },
  ],
};
