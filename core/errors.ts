/**
 * Error types. Recoverable failures surface as status messages; only a
 * TerminalError ends the process.
 */

export class GridpadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Terminal setup or restore failed. Fatal. */
export class TerminalError extends GridpadError {}

/** A document could not be read or written. */
export class DocumentIOError extends GridpadError {
  readonly fileName: string;

  constructor(fileName: string, cause: unknown) {
    super(describeCause(cause), { cause });
    this.fileName = fileName;
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}
