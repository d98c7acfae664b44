import { Command, InvalidArgumentError } from 'commander';
import ora from 'ora';
import * as ConfigService from '../services/config.service';
import type { GitsiftConfig } from '../services/config.service';
import { gatherCandidates, getSource, parseInvocation } from '../sources';
import { runAction } from '../actions/dispatcher';
import { TerminalSession } from '../ui/terminal-session';
import { runPicker } from '../ui/picker';
import { plainRow } from '../ui/formatters';
import { logError } from '../ui/logger';
import type { Candidate } from '../types/candidate';
import { GitsiftError, errorMessage } from '../errors';

interface PickOptions {
  file?: string;
  action?: string;
  select?: number[];
  plain?: boolean;
}

export function parseSelection(value: string): number[] {
  const indexes = value.split(',').map((part) => part.trim()).filter(Boolean);
  return indexes.map((part) => {
    const n = Number(part);
    if (!Number.isInteger(n) || n < 1) {
      throw new InvalidArgumentError(`"${part}" is not a candidate number.`);
    }
    return n;
  });
}

/** 1-based selection; no selection means every candidate. */
export function pickTargets(candidates: Candidate[], select?: number[]): Candidate[] {
  if (!select || select.length === 0) return candidates;
  return select.map((n) => {
    const candidate = candidates[n - 1];
    if (!candidate) {
      throw new GitsiftError(`No candidate #${n} (${candidates.length} listed)`);
    }
    return candidate;
  });
}

async function pickInteractively(source: string, options: PickOptions, config: GitsiftConfig): Promise<void> {
  let latest = '';
  const session = new TerminalSession({
    removeCommand: config.removeCommand,
    pagePreviews: true,
    onMessage: (text, isError) => {
      latest = isError ? `Error: ${text}` : text;
    },
  });
  const gather = async (): Promise<Candidate[]> => {
    const result = await gatherCandidates(source, { cwd: process.cwd(), file: options.file, session, config });
    return result.candidates;
  };

  const spinner = ora(`Listing ${source}…`).start();
  const candidates = await gather();
  spinner.stop();

  await runPicker({
    title: source,
    candidates,
    mappings: config.mappings,
    gather,
    run: (actionName, targets) => runAction(actionName, targets, { session, config }),
    takeStatus: () => {
      const status = latest;
      latest = '';
      return status;
    },
  });
}

export const pickCommand = new Command('pick')
  .description('List candidates from a source and run actions on them')
  .argument('<source>', 'gitlog, gitlog:all, gitlog::<filter>, gitstatus or gitchanged')
  .option('-f, --file <path>', 'File of the current buffer (restricts gitlog)')
  .option('-a, --action <name>', 'Run an action on the selection instead of picking')
  .option('-s, --select <numbers>', 'Candidate numbers, comma separated, starting at 1', parseSelection)
  .option('--plain', 'Print candidates without the interactive picker')
  .action(async (source: string, options: PickOptions) => {
    try {
      getSource(parseInvocation(source).name);
      const config = await ConfigService.load();

      const interactive =
        !options.plain && !options.action && process.stdin.isTTY && process.stdout.isTTY;
      if (interactive) {
        await pickInteractively(source, options, config);
        process.exit(0);
      }

      const session = new TerminalSession({ removeCommand: config.removeCommand });
      const result = await gatherCandidates(source, {
        cwd: process.cwd(),
        file: options.file,
        session,
        config,
      });

      if (options.action) {
        const targets = pickTargets(result.candidates, options.select);
        const outcome = await runAction(options.action, targets, { session, config });
        session.close();
        process.exit(outcome.ok ? 0 : 1);
      } else {
        result.candidates.forEach((candidate, i) => console.log(plainRow(candidate, i)));
        process.exit(result.ok ? 0 : 1);
      }
    } catch (err) {
      logError(errorMessage(err));
      process.exit(err instanceof GitsiftError ? 1 : 2);
    }
  });
