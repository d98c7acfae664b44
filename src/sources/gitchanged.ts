import type { ChangedCandidate } from '../types/candidate';
import { unquotePath } from './gitstatus';
import type { Source, SourceContext } from './types';

// Simple line source: one candidate per path differing from HEAD.
export function parseNameStatusLine(line: string, root: string): ChangedCandidate | null {
  const fields = line.split('\t');
  if (fields.length < 2 || fields[0] === '') return null;

  const status = fields[0][0];
  // Renames and copies list "R100\told\tnew"; keep the new side.
  const path = unquotePath(fields[fields.length - 1]);
  if (path === '') return null;

  return {
    kind: 'gitchanged',
    word: `${status}  ${path}`,
    root,
    status,
    path,
  };
}

export const gitchangedSource: Source<'gitchanged'> = {
  name: 'gitchanged',
  kind: 'gitchanged',
  description: 'Files that differ from HEAD in the index or the working tree',

  async gather(context: SourceContext): Promise<ChangedCandidate[]> {
    const output = await context.git.changedNameStatus();
    const candidates: ChangedCandidate[] = [];
    for (const line of output.split('\n')) {
      const candidate = parseNameStatusLine(line, context.root);
      if (candidate) candidates.push(candidate);
    }
    return candidates;
  },
};
