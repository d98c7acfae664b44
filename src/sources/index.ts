import * as fs from 'fs/promises';
import * as path from 'path';
import { GitService } from '../services/git.service';
import type { GitsiftConfig } from '../services/config.service';
import type { Session } from '../session/types';
import type { Candidate, KindName } from '../types/candidate';
import { NotARepositoryError, UnknownSourceError, errorMessage } from '../errors';
import { logDebug } from '../ui/logger';
import { gitlogSource } from './gitlog';
import { gitstatusSource } from './gitstatus';
import { gitchangedSource } from './gitchanged';
import type { Source } from './types';

const SOURCES: Source[] = [gitlogSource, gitstatusSource, gitchangedSource];

export interface Invocation {
  name: string;
  args: string[];
}

/**
 * Splits `name[:arg[:arg]]`. Everything after the second colon is one
 * argument, kept verbatim, so `gitlog::fix: typo` filters on "fix: typo".
 */
export function parseInvocation(text: string): Invocation {
  const first = text.indexOf(':');
  if (first === -1) return { name: text, args: [] };

  const name = text.slice(0, first);
  const rest = text.slice(first + 1);
  const second = rest.indexOf(':');
  if (second === -1) return { name, args: [rest] };
  return { name, args: [rest.slice(0, second), rest.slice(second + 1)] };
}

export function listSources(): Source[] {
  return [...SOURCES];
}

export function getSource(name: string): Source {
  const source = SOURCES.find((s) => s.name === name);
  if (!source) throw new UnknownSourceError(name);
  return source;
}

export interface GatherOptions {
  cwd: string;
  /** Current buffer's file; relative paths resolve against cwd. */
  file?: string;
  session: Session;
  config: GitsiftConfig;
}

export interface GatherResult {
  /** False when git failed and the failure was reported. */
  ok: boolean;
  kind: KindName;
  root: string | null;
  candidates: Candidate[];
}

export async function resolveRoot(cwd: string): Promise<string> {
  try {
    return await new GitService(cwd).getRoot();
  } catch (err) {
    logDebug(errorMessage(err));
    throw new NotARepositoryError(cwd);
  }
}

/**
 * git reports the root with symlinks resolved, so the file must be too before
 * it can be made relative. A file that no longer exists keeps its directory's
 * real path.
 */
export async function realFilePath(filePath: string): Promise<string> {
  try {
    return await fs.realpath(filePath);
  } catch {
    try {
      return path.join(await fs.realpath(path.dirname(filePath)), path.basename(filePath));
    } catch {
      return filePath;
    }
  }
}

/**
 * Runs one listing. Git failures are reported through the session and yield
 * an empty list; only an unknown source name throws.
 */
export async function gatherCandidates(
  invocationText: string,
  options: GatherOptions
): Promise<GatherResult> {
  const invocation = parseInvocation(invocationText);
  const source = getSource(invocation.name);

  let root: string;
  try {
    root = await resolveRoot(options.cwd);
  } catch (err) {
    options.session.error(errorMessage(err));
    return { ok: false, kind: source.kind, root: null, candidates: [] };
  }

  const file = options.file
    ? path.relative(root, await realFilePath(path.resolve(options.cwd, options.file)))
    : undefined;

  try {
    const candidates = await source.gather({
      root,
      file,
      args: invocation.args,
      git: new GitService(root),
      session: options.session,
      config: options.config,
    });
    return { ok: true, kind: source.kind, root, candidates };
  } catch (err) {
    options.session.error(`${source.name}: ${errorMessage(err)}`);
    return { ok: false, kind: source.kind, root, candidates: [] };
  }
}
