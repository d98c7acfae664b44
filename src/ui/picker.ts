import chalk from 'chalk';
import type { ActionResult } from '../actions/dispatcher';
import type { Candidate } from '../types/candidate';
import { errorMessage } from '../errors';
import { formatCandidateRow } from './formatters';

const DIVIDER = chalk.dim('─'.repeat(72));
const CLEAR = '\u001b[2J\u001b[H';

const KEY_UP = '\u001b[A';
const KEY_DOWN = '\u001b[B';
const KEY_CTRL_C = '\u0003';

export interface PickerOptions {
  title: string;
  candidates: Candidate[];
  /** Single key → action name. */
  mappings: Record<string, string>;
  gather: () => Promise<Candidate[]>;
  run: (actionName: string, targets: Candidate[]) => Promise<ActionResult>;
  /** Latest session message, shown under the list after an action. */
  takeStatus?: () => string;
}

export interface PickerState {
  candidates: Candidate[];
  cursor: number;
  marked: Set<number>;
}

/** Marked candidates in list order, or the one under the cursor. */
export function selectedTargets(state: PickerState): Candidate[] {
  if (state.marked.size > 0) {
    return [...state.marked].sort((a, b) => a - b).map((i) => state.candidates[i]);
  }
  const current = state.candidates[state.cursor];
  return current ? [current] : [];
}

export function moveCursor(state: PickerState, delta: number): void {
  if (state.candidates.length === 0) return;
  state.cursor = Math.min(state.candidates.length - 1, Math.max(0, state.cursor + delta));
}

export function toggleMark(state: PickerState): void {
  if (state.candidates.length === 0) return;
  if (state.marked.has(state.cursor)) state.marked.delete(state.cursor);
  else state.marked.add(state.cursor);
  moveCursor(state, 1);
}

/** Rows that fit the terminal, keeping the cursor in view. */
export function visibleWindow(total: number, cursor: number, height: number): [number, number] {
  if (total <= height) return [0, total];
  const start = Math.min(Math.max(0, cursor - Math.floor(height / 2)), total - height);
  return [start, start + height];
}

/**
 * Interactive list over raw stdin. Resolves when the user quits or an action
 * that does not persist has run.
 */
export function runPicker(options: PickerOptions): Promise<void> {
  const state: PickerState = { candidates: options.candidates, cursor: 0, marked: new Set() };
  let status = '';
  let busy = false;

  const help = [
    '↑↓ move',
    'Space mark',
    'Enter open',
    ...Object.entries(options.mappings).map(([key, action]) => `${key} ${action}`),
    'q quit',
  ].join('  ');

  function render(): void {
    process.stdout.write(CLEAR);
    console.log(chalk.bold(`gitsift — ${options.title} (${state.candidates.length})`));
    console.log(DIVIDER);
    if (state.candidates.length === 0) {
      console.log(chalk.dim('  No candidates.'));
    }
    const height = Math.max(1, (process.stdout.rows ?? 24) - 6);
    const [start, end] = visibleWindow(state.candidates.length, state.cursor, height);
    for (let i = start; i < end; i++) {
      console.log(formatCandidateRow(state.candidates[i], i === state.cursor, state.marked.has(i)));
    }
    console.log(DIVIDER);
    if (status) console.log(status);
    console.log(chalk.dim(help));
  }

  return new Promise<void>((resolve) => {
    function attach(): void {
      process.stdin.removeListener('data', onData);
      process.stdin.setRawMode(true);
      process.stdin.resume();
      process.stdin.setEncoding('utf-8');
      process.stdin.on('data', onData);
    }

    function detach(): void {
      process.stdin.removeListener('data', onData);
      process.stdin.setRawMode(false);
      process.stdin.pause();
    }

    function finish(): void {
      detach();
      process.removeListener('SIGINT', finish);
      process.stdout.write(CLEAR);
      resolve();
    }

    async function trigger(actionName: string): Promise<void> {
      const targets = selectedTargets(state);
      if (targets.length === 0) return;

      detach();
      process.stdout.write(CLEAR);
      status = '';
      const result = await options.run(actionName, targets);
      if (result.ok && !result.persist) {
        finish();
        return;
      }
      if (result.redraw) {
        state.candidates = await options.gather();
        state.marked.clear();
        state.cursor = Math.min(state.cursor, Math.max(0, state.candidates.length - 1));
      }
      status = options.takeStatus?.() ?? '';
      attach();
      render();
    }

    async function handle(key: string): Promise<void> {
      if (key === KEY_CTRL_C || key === 'q') {
        finish();
      } else if (key === KEY_UP) {
        moveCursor(state, -1);
        render();
      } else if (key === KEY_DOWN) {
        moveCursor(state, 1);
        render();
      } else if (key === ' ') {
        toggleMark(state);
        render();
      } else if (key === '\r' || key === '\n') {
        await trigger('default');
      } else if (options.mappings[key]) {
        await trigger(options.mappings[key]);
      }
    }

    function onData(key: string): void {
      if (busy) return;
      busy = true;
      void handle(key)
        .catch((err: unknown) => {
          status = chalk.red(errorMessage(err));
          attach();
          render();
        })
        .finally(() => {
          busy = false;
        });
    }

    process.once('SIGINT', finish);
    attach();
    render();
  });
}
