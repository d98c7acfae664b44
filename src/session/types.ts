/**
 * The editor-side surface actions talk to. The terminal implementation lives
 * in ui/terminal-session; an embedding editor supplies its own.
 */
export interface Session {
  /** Transient status-line message. */
  message(text: string): void;
  error(text: string): void;
  /** Prompts for a line of input; resolves to `defaultValue` (or '') on an empty answer. */
  input(prompt: string, defaultValue?: string): Promise<string>;
  openFile(filePath: string): Promise<void>;
  /** Opens read-only content in a new buffer, taking focus. */
  openBuffer(title: string, content: string): Promise<void>;
  /** Shows content without moving focus away from the finder. */
  preview(title: string, content: string): Promise<void>;
  /** Runs a command attached to the user's terminal and resolves to its exit code. */
  runInteractive(command: string, args: string[], cwd: string): Promise<number>;
  removeFile(filePath: string): Promise<void>;
}
