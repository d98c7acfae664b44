import type { StatusCandidate } from '../types/candidate';
import { logDebug } from '../ui/logger';
import type { Source, SourceContext } from './types';

/** Porcelain column char → [symbol, description]. */
export const STATUS_MAP: Record<string, readonly [string, string]> = {
  ' ': [' ', ''],
  M: ['~', 'modified'],
  A: ['+', 'added'],
  D: ['-', 'deleted'],
  R: ['→', 'renamed'],
  C: ['C', 'copied'],
  U: ['U', 'updated'],
  T: ['T', 'typechange'],
  '?': ['?', 'untracked'],
};

export function isStatusCode(code: string): boolean {
  if (code.length !== 2 || code === '  ') return false;
  const [index, tree] = code;
  if (!(index in STATUS_MAP) || !(tree in STATUS_MAP)) return false;
  // "?" only ever appears as "??"
  return (index === '?') === (tree === '?');
}

const C_ESCAPES: Record<string, string> = {
  a: '\x07', b: '\b', f: '\f', n: '\n', r: '\r', t: '\t', v: '\v', '"': '"', '\\': '\\',
};

/**
 * git wraps paths with unusual characters in double quotes with C-style
 * escapes; octal escapes are UTF-8 bytes.
 */
export function unquotePath(value: string): string {
  if (value.length < 2 || !value.startsWith('"') || !value.endsWith('"')) return value;

  const bytes: number[] = [];
  // One element per code point.
  const body = Array.from(value.slice(1, -1));
  for (let i = 0; i < body.length; i++) {
    const ch = body[i];
    if (ch !== '\\' || i === body.length - 1) {
      bytes.push(...Buffer.from(ch, 'utf-8'));
      continue;
    }
    const next = body[i + 1];
    const octal = /^[0-7]{3}/.exec(body.slice(i + 1, i + 4).join(''));
    if (octal) {
      bytes.push(parseInt(octal[0], 8));
      i += 3;
    } else {
      bytes.push(...Buffer.from(C_ESCAPES[next] ?? next, 'utf-8'));
      i += 1;
    }
  }
  return Buffer.from(bytes).toString('utf-8');
}

export interface ParsedStatusLine {
  status: string;
  path: string;
  origPath?: string;
}

export function parseStatusLine(line: string): ParsedStatusLine | null {
  if (line.trim() === '' || line.length < 4 || line[2] !== ' ') return null;

  const status = line.slice(0, 2);
  if (!isStatusCode(status)) return null;

  const rest = line.slice(3);
  if (status.includes('R') || status.includes('C')) {
    const arrow = rest.indexOf(' -> ');
    if (arrow > 0) {
      return {
        status,
        path: unquotePath(rest.slice(arrow + 4)),
        origPath: unquotePath(rest.slice(0, arrow)),
      };
    }
  }
  return { status, path: unquotePath(rest) };
}

export function formatStatusWord(status: string, displayPath: string): string {
  const [indexSymbol, indexDesc] = STATUS_MAP[status[0]];
  const [treeSymbol, rawTreeDesc] = STATUS_MAP[status[1]];
  const treeDesc = rawTreeDesc === indexDesc ? '' : rawTreeDesc;
  return `${indexSymbol}${treeSymbol} ${indexDesc.padEnd(12)} ${treeDesc.padEnd(12)} ${displayPath}`;
}

export function toStatusCandidate(parsed: ParsedStatusLine, root: string): StatusCandidate {
  const displayPath = parsed.origPath ? `${parsed.origPath} -> ${parsed.path}` : parsed.path;
  return {
    kind: 'gitstatus',
    word: formatStatusWord(parsed.status, displayPath),
    root,
    status: parsed.status,
    path: parsed.path,
    ...(parsed.origPath ? { origPath: parsed.origPath } : {}),
    staged: parsed.status[0] !== ' ' && parsed.status[0] !== '?',
    tree: parsed.status[1] !== ' ' && parsed.status[1] !== '?',
  };
}

export function parseStatusOutput(output: string, root: string): StatusCandidate[] {
  const candidates: StatusCandidate[] = [];
  for (const line of output.split('\n')) {
    const parsed = parseStatusLine(line);
    if (parsed) candidates.push(toStatusCandidate(parsed, root));
    else if (line.trim() !== '') logDebug(`gitstatus: skipped "${line}"`);
  }
  return candidates;
}

export const gitstatusSource: Source<'gitstatus'> = {
  name: 'gitstatus',
  kind: 'gitstatus',
  description: 'Changed, staged and untracked files of the working tree',

  async gather(context: SourceContext): Promise<StatusCandidate[]> {
    const output = await context.git.statusPorcelain();
    return parseStatusOutput(output, context.root);
  },
};
