/**
 * Where install and uninstall runs report to the user. Core code never
 * writes to the terminal directly; the CLI picks an implementation per
 * session (clack in a terminal, plain lines in CI or when piped).
 */

/** Progress indicator for the staging phase of an install. */
export interface ProgressSpinner {
  start(message: string): void;
  /** Replace the text of a running spinner. Ignored once stopped. */
  message(text: string): void;
  stop(finalMessage?: string): void;
}

export interface OutputPort {
  info(message: string): void;
  success(message: string): void;
  error(message: string): void;
  /** Boxed block, used for the activation instructions after an install. */
  note(content: string, title?: string): void;
  spinner(): ProgressSpinner;
}
