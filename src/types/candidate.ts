export type KindName = 'gitlog' | 'gitstatus' | 'gitchanged';

interface CandidateBase {
  /** Display text handed to the finder. */
  word: string;
  /** Repository top-level directory. */
  root: string;
}

export interface CommitCandidate extends CandidateBase {
  kind: 'gitlog';
  hash: string;
  shortHash: string;
  subject: string;
  author: string;
  relativeDate: string;
  /** File the listing was restricted to, relative to root. */
  path?: string;
}

export interface StatusCandidate extends CandidateBase {
  kind: 'gitstatus';
  /** Two-character porcelain code, e.g. "M " or "??". */
  status: string;
  path: string;
  origPath?: string;
  staged: boolean;
  tree: boolean;
}

export interface ChangedCandidate extends CandidateBase {
  kind: 'gitchanged';
  status: string;
  path: string;
}

export type Candidate = CommitCandidate | StatusCandidate | ChangedCandidate;

export type CandidateOf<K extends KindName> = Extract<Candidate, { kind: K }>;
