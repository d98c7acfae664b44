import type { GitsiftConfig } from '../services/config.service';
import type { Session } from '../session/types';
import type { CandidateOf, KindName } from '../types/candidate';

export interface ActionContext {
  session: Session;
  config: GitsiftConfig;
}

export interface Action<K extends KindName> {
  name: string;
  description: string;
  /** Keep the finder open after the action runs. */
  persist?: boolean;
  /** Regather candidates after the action runs. */
  redraw?: boolean;
  run(targets: CandidateOf<K>[], context: ActionContext): Promise<void>;
}

export interface Kind<K extends KindName> {
  name: K;
  defaultAction: string;
  actions: Action<K>[];
}
