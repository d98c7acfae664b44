import chalk from 'chalk';
import type { Candidate } from '../types/candidate';

/** Colours a candidate's word the way the finder highlights it. */
export function highlightWord(candidate: Candidate): string {
  switch (candidate.kind) {
    case 'gitlog': {
      const rest = candidate.word.slice(candidate.shortHash.length);
      return `${chalk.yellow(candidate.shortHash)}${rest}`;
    }
    case 'gitstatus':
      // Entries with an index change are "tracked"; work-tree-only and untracked ones are not.
      return candidate.staged ? chalk.green(candidate.word) : chalk.red(candidate.word);
    case 'gitchanged':
      return candidate.word;
  }
}

export function formatCandidateRow(
  candidate: Candidate,
  cursor: boolean,
  marked: boolean
): string {
  const pointer = cursor ? chalk.cyan('▶') : ' ';
  const mark = marked ? chalk.magenta('*') : ' ';
  const word = highlightWord(candidate);
  return `${pointer}${mark} ${cursor ? chalk.bold(word) : word}`;
}

export function plainRow(candidate: Candidate, index: number): string {
  return `${index + 1}\t${candidate.word}`;
}

export function colorizeDiff(text: string): string {
  return text
    .split('\n')
    .map((line) => {
      if (line.startsWith('+++') || line.startsWith('---')) return chalk.bold(line);
      if (line.startsWith('+')) return chalk.green(line);
      if (line.startsWith('-')) return chalk.red(line);
      if (line.startsWith('@@')) return chalk.cyan(line);
      if (line.startsWith('commit ')) return chalk.yellow(line);
      return line;
    })
    .join('\n');
}
