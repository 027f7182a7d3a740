/**
 * Output Port Interface
 *
 * Contract for all user-facing output. Commands write through this port
 * instead of calling console.log or @clack/prompts directly.
 *
 * Implementations:
 *   - createClackOutput (CLI, TTY): @clack/prompts
 *   - createPlainOutput (CLI, CI or piped): plain console
 *   - consoleOutput (library default): plain console, never prompts
 */

/**
 * Spinner that works across all output backends.
 */
export interface UnifiedSpinner {
  start(message: string): void;
  stop(finalMessage?: string): void;
  message(text: string): void;
}

export interface OutputPort {
  /** Display an informational message */
  info(message: string): void;

  /** Display a step/progress indicator */
  step(message: string): void;

  /** Display a plain message */
  message(message: string): void;

  /** Display a success message */
  success(message: string): void;

  /** Display an error message */
  error(message: string): void;

  /** Display a warning message */
  warn(message: string): void;

  /** Display a note block with optional title */
  note(content: string, title?: string): void;

  /** Prompt for a yes/no confirmation */
  confirm(message: string, options?: { initial?: boolean }): Promise<boolean>;

  /** Create a spinner for long-running operations */
  spinner(): UnifiedSpinner;
}
