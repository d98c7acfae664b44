import type { KindName } from '../types/candidate';
import { gitchangedKind } from './gitchanged';
import { gitlogKind } from './gitlog';
import { gitstatusKind } from './gitstatus';
import type { Kind } from './types';

type KindMap = { [K in KindName]: Kind<K> };

const KINDS: KindMap = {
  gitlog: gitlogKind,
  gitstatus: gitstatusKind,
  gitchanged: gitchangedKind,
};

export function getKind<K extends KindName>(name: K): Kind<K> {
  return KINDS[name];
}
