import chalk from 'chalk';
import { DEBUG } from '../config';

let verboseMode = DEBUG;

export function setVerbose(verbose: boolean): void {
  verboseMode = verbose;
}

// Everything goes to stderr so stdout stays pipeable.
export function logInfo(message: string): void {
  process.stderr.write(`${message}\n`);
}

export function logSuccess(message: string): void {
  process.stderr.write(`${chalk.green('✔')} ${message}\n`);
}

export function logError(message: string): void {
  process.stderr.write(`${chalk.red(`Error: ${message}`)}\n`);
}

export function logDebug(message: string): void {
  if (!verboseMode) return;
  process.stderr.write(`${chalk.dim(`[debug] ${message}`)}\n`);
}
