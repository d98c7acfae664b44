import * as fs from 'fs/promises';
import { createInterface, type Interface } from 'readline';
import chalk from 'chalk';
import prompts from 'prompts';
import { GitsiftError } from '../errors';
import type { Session } from '../session/types';
import { editorCommand, pagerCommand, spawnAttached } from '../services/editor.service';
import { colorizeDiff } from './formatters';
import { logError, logInfo } from './logger';

export interface TerminalSessionOptions {
  /** Executable that receives a file to remove, e.g. "trash". */
  removeCommand?: string;
  /** Send previews through the pager instead of printing them. */
  pagePreviews?: boolean;
  /** Replaces the default stderr output for messages and errors. */
  onMessage?: (text: string, isError: boolean) => void;
  /** Answers for `input`; defaults to stdin. */
  input?: NodeJS.ReadableStream;
  /** Prompt on a terminal rather than reading answers line by line. */
  interactive?: boolean;
}

/**
 * Answers piped in for scripted runs. One reader for the whole session, so
 * lines buffered past the first answer are kept for the next prompt.
 */
class LineQueue {
  private readonly lines: string[] = [];
  private readonly waiting: Array<(line: string | undefined) => void> = [];
  private closed = false;
  private readonly reader: Interface;

  constructor(input: NodeJS.ReadableStream) {
    this.reader = createInterface({ input, crlfDelay: Infinity, terminal: false });
    this.reader.on('line', (line: string) => {
      const waiter = this.waiting.shift();
      if (waiter) waiter(line);
      else this.lines.push(line);
    });
    this.reader.on('close', () => {
      this.closed = true;
      for (const waiter of this.waiting.splice(0)) waiter(undefined);
    });
  }

  /** Next line, or undefined once the input has ended. */
  next(): Promise<string | undefined> {
    const line = this.lines.shift();
    if (line !== undefined) return Promise.resolve(line);
    if (this.closed) return Promise.resolve(undefined);
    return new Promise((resolve) => this.waiting.push(resolve));
  }

  close(): void {
    this.reader.close();
  }
}

export class TerminalSession implements Session {
  private lineQueue?: LineQueue;

  constructor(private readonly options: TerminalSessionOptions = {}) {}

  message(text: string): void {
    if (this.options.onMessage) this.options.onMessage(text, false);
    else logInfo(text);
  }

  error(text: string): void {
    if (this.options.onMessage) this.options.onMessage(text, true);
    else logError(text);
  }

  async input(prompt: string, defaultValue = ''): Promise<string> {
    const interactive = this.options.interactive ?? Boolean(process.stdin.isTTY);
    const answer = interactive
      ? await this.ask(prompt, defaultValue)
      : await this.readLine(prompt);
    const trimmed = (answer ?? '').trim();
    return trimmed === '' ? defaultValue : trimmed;
  }

  /** Stops reading piped answers so the process can exit. */
  close(): void {
    this.lineQueue?.close();
    this.lineQueue = undefined;
  }

  private async ask(prompt: string, defaultValue: string): Promise<string> {
    let cancelled = false;
    const response = await prompts(
      {
        type: 'text',
        name: 'value',
        message: prompt.trim(),
        initial: defaultValue,
        stdout: process.stderr,
      },
      {
        onCancel: () => {
          cancelled = true;
          return false;
        },
      }
    );
    if (cancelled) throw new GitsiftError('Cancelled');
    const value: unknown = response.value;
    return typeof value === 'string' ? value : '';
  }

  private async readLine(prompt: string): Promise<string | undefined> {
    process.stderr.write(prompt);
    this.lineQueue ??= new LineQueue(this.options.input ?? process.stdin);
    return this.lineQueue.next();
  }

  async openFile(filePath: string): Promise<void> {
    const code = await spawnAttached(editorCommand(), [filePath]);
    if (code !== 0) throw new Error(`${editorCommand()} exited with code ${code}`);
  }

  async openBuffer(title: string, content: string): Promise<void> {
    await spawnAttached(pagerCommand(), [], { input: `${title}\n\n${colorizeDiff(content)}` });
  }

  async preview(title: string, content: string): Promise<void> {
    if (this.options.pagePreviews) {
      await this.openBuffer(title, content);
      return;
    }
    process.stdout.write(`${chalk.bold(title)}\n${colorizeDiff(content)}\n`);
  }

  runInteractive(command: string, args: string[], cwd: string): Promise<number> {
    return spawnAttached(command, args, { cwd });
  }

  async removeFile(filePath: string): Promise<void> {
    const { removeCommand } = this.options;
    if (removeCommand) {
      const code = await spawnAttached(removeCommand, [filePath]);
      if (code !== 0) throw new Error(`${removeCommand} exited with code ${code}`);
    } else {
      await fs.rm(filePath);
    }
    this.message(`Removed ${filePath}`);
  }
}
