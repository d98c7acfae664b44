import { getKind } from '../kinds';
import type { ActionContext } from '../kinds/types';
import type { Candidate, CandidateOf, KindName } from '../types/candidate';
import { UnknownActionError, errorMessage } from '../errors';
import { logDebug } from '../ui/logger';

export interface ActionResult {
  ok: boolean;
  persist: boolean;
  redraw: boolean;
}

const FAILED: ActionResult = { ok: false, persist: true, redraw: false };

function ofKind<K extends KindName>(targets: Candidate[], kind: K): CandidateOf<K>[] {
  return targets.filter((t): t is CandidateOf<K> => t.kind === kind);
}

export function actionNames(kindName: KindName): string[] {
  return getKind(kindName).actions.map((a) => a.name);
}

/** Resolves "default" to the kind's default action. */
export function resolveActionName(kindName: KindName, actionName: string): string {
  return actionName === 'default' ? getKind(kindName).defaultAction : actionName;
}

async function execute<K extends KindName>(
  kindName: K,
  actionName: string,
  targets: Candidate[],
  context: ActionContext
): Promise<ActionResult> {
  const kind = getKind(kindName);
  const name = resolveActionName(kindName, actionName);
  const action = kind.actions.find((a) => a.name === name);
  if (!action) throw new UnknownActionError(kind.name, name);

  logDebug(`${kind.name}:${name} on ${targets.length} target(s)`);
  await action.run(ofKind(targets, kindName), context);
  return { ok: true, persist: action.persist ?? false, redraw: action.redraw ?? false };
}

/**
 * Runs a named action on the selected candidates. Failures, including a
 * non-zero git exit, are reported through the session; nothing is retried.
 */
export async function runAction(
  actionName: string,
  targets: Candidate[],
  context: ActionContext
): Promise<ActionResult> {
  if (targets.length === 0) {
    context.session.message('No candidates selected');
    return FAILED;
  }

  try {
    return await execute(targets[0].kind, actionName, targets, context);
  } catch (err) {
    context.session.error(errorMessage(err));
    return FAILED;
  }
}
