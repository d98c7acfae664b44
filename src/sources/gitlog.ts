import type { CommitCandidate } from '../types/candidate';
import type { Source, SourceContext } from './types';

const FIELD_SEPARATOR = '\x1f';
const LOG_FORMAT = ['%H', '%h', '%s', '%cr', '%an'].join('%x1f');
const HASH_PATTERN = /^(?:[0-9a-f]{40}|[0-9a-f]{64})$/;

export interface LogOptions {
  all: boolean;
  filter?: string;
  file?: string;
  maxCount: number;
}

/** `gitlog:all` → all refs; `gitlog::<text>` → commit-message filter. */
export function parseLogArgs(args: string[]): Pick<LogOptions, 'all' | 'filter'> {
  const all = args[0] === 'all';
  const filter = args[1];
  return { all, filter: filter ? filter : undefined };
}

export function buildLogArgs(options: LogOptions): string[] {
  const args = ['log', `--pretty=format:${LOG_FORMAT}`, `--max-count=${options.maxCount}`];
  if (options.all) args.push('--all');
  if (options.filter !== undefined) args.push(`--grep=${options.filter}`);
  // The "all" listing covers the whole repository, not the current file.
  if (!options.all && options.file) args.push('--', options.file);
  return args;
}

export function parseLogLine(
  line: string,
  root: string,
  file?: string
): CommitCandidate | null {
  const fields = line.split(FIELD_SEPARATOR);
  if (fields.length !== 5) return null;

  const [hash, shortHash, subject, relativeDate, author] = fields;
  if (!HASH_PATTERN.test(hash)) return null;

  return {
    kind: 'gitlog',
    word: `${shortHash} ${subject} (${relativeDate}) <${author}>`,
    root,
    hash,
    shortHash,
    subject,
    author,
    relativeDate,
    ...(file ? { path: file } : {}),
  };
}

export const gitlogSource: Source<'gitlog'> = {
  name: 'gitlog',
  kind: 'gitlog',
  description: 'Commits of the current file (gitlog), all refs (gitlog:all) or matching a message filter (gitlog::<text>)',

  async gather(context: SourceContext): Promise<CommitCandidate[]> {
    const { all, filter } = parseLogArgs(context.args);
    const file = all ? undefined : context.file;
    const output = await context.git.raw(
      buildLogArgs({ all, filter, file, maxCount: context.config.log.maxCount })
    );

    const candidates: CommitCandidate[] = [];
    for (const line of output.split('\n')) {
      const candidate = parseLogLine(line, context.root, file);
      if (candidate) candidates.push(candidate);
    }
    return candidates;
  },
};
