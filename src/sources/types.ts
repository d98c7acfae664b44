import type { GitService } from '../services/git.service';
import type { GitsiftConfig } from '../services/config.service';
import type { Session } from '../session/types';
import type { CandidateOf, KindName } from '../types/candidate';

export interface SourceContext {
  /** Repository top-level directory. */
  root: string;
  /** Current buffer's file, relative to root, when there is one. */
  file?: string;
  /** Colon-separated arguments following the source name. */
  args: string[];
  git: GitService;
  session: Session;
  config: GitsiftConfig;
}

export interface Source<K extends KindName = KindName> {
  name: string;
  kind: K;
  description: string;
  gather(context: SourceContext): Promise<CandidateOf<K>[]>;
}
