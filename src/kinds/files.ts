import * as fs from 'fs/promises';
import * as path from 'path';
import type { Candidate } from '../types/candidate';
import type { Session } from '../session/types';

export function absolutePath(candidate: { root: string; path: string }): string {
  return path.join(candidate.root, candidate.path);
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/** Opens every target that still exists; reports the ones that do not. */
export async function openFiles(
  targets: Array<Extract<Candidate, { path: string }>>,
  session: Session
): Promise<void> {
  for (const target of targets) {
    const filePath = absolutePath(target);
    if (!(await fileExists(filePath))) {
      session.error(`File not found: ${target.path}`);
      continue;
    }
    await session.openFile(filePath);
  }
}

export async function showDiff(
  session: Session,
  title: string,
  diff: string
): Promise<void> {
  if (diff.trim() === '') {
    session.message(`No differences: ${title}`);
    return;
  }
  await session.preview(title, diff);
}
