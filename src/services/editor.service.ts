import { spawn } from 'child_process';
import { logDebug } from '../ui/logger';

export interface SpawnOptions {
  cwd?: string;
  /** Written to the child's stdin, which is otherwise inherited. */
  input?: string;
}

/**
 * Runs a command attached to the user's terminal and resolves to its exit
 * code. Commands may carry arguments ("less -R", "code --wait").
 */
export function spawnAttached(
  commandLine: string,
  args: string[],
  options: SpawnOptions = {}
): Promise<number> {
  const [command, ...baseArgs] = commandLine.split(/\s+/).filter(Boolean);

  const child = spawn(command, [...baseArgs, ...args], {
    cwd: options.cwd,
    stdio: [options.input === undefined ? 'inherit' : 'pipe', 'inherit', 'inherit'],
  });

  if (options.input !== undefined && child.stdin) {
    // The pager may exit before reading everything (user pressed q).
    child.stdin.on('error', (err) => logDebug(`${command}: ${err.message}`));
    child.stdin.end(options.input);
  }

  return new Promise((resolve, reject) => {
    child.on('error', (err) => {
      if ('code' in err && err.code === 'ENOENT') reject(new Error(`${command} not found`));
      else reject(err);
    });
    child.on('close', (code) => resolve(code ?? 0));
  });
}

export function editorCommand(): string {
  return process.env.VISUAL || process.env.EDITOR || 'vi';
}

export function pagerCommand(): string {
  return process.env.PAGER || 'less -R';
}
