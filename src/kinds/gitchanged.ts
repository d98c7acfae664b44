import { GitService } from '../services/git.service';
import type { ChangedCandidate } from '../types/candidate';
import type { ActionContext, Kind } from './types';
import { openFiles, showDiff } from './files';

async function diffAgainstHead([target]: ChangedCandidate[], { session }: ActionContext): Promise<void> {
  const git = new GitService(target.root);
  await showDiff(session, target.path, await git.diff(['HEAD'], [target.path]));
}

export const gitchangedKind: Kind<'gitchanged'> = {
  name: 'gitchanged',
  defaultAction: 'open',
  actions: [
    {
      name: 'open',
      description: 'Open the file',
      run: (targets, { session }) => openFiles(targets, session),
    },
    {
      name: 'preview',
      description: 'Show the diff against HEAD',
      persist: true,
      run: diffAgainstHead,
    },
    {
      name: 'delete',
      description: 'Diff against the working copy',
      persist: true,
      run: diffAgainstHead,
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
  ],
};
