/**
 * Status bar and message bar text.
 *
 * Messages are structured values; this module is the only place that
 * turns them into text.
 */

export type StatusMessage =
  | { kind: 'help' }
  | { kind: 'prompt'; template: string; input: string }
  | { kind: 'saved'; bytes: number }
  | { kind: 'save-failed'; reason: string }
  | { kind: 'save-aborted' }
  | { kind: 'open-failed'; reason: string }
  | { kind: 'new-file'; fileName: string }
  | { kind: 'quit-warning'; remaining: number }
  | { kind: 'clear' };

export interface TimedMessage {
  text: string;
  /** Clock value (ms) when the message was set. */
  shownAt: number;
}

export interface StatusBarInfo {
  fileName: string | null;
  rowCount: number;
  dirty: boolean;
  fileType: string | null;
  /** 0-based cursor row. */
  cursorRow: number;
}

const FILE_LABEL_MAX = 20;

export function formatStatusMessage(message: StatusMessage): string {
  switch (message.kind) {
    case 'help':
      return 'HELP: Ctrl-S = save | Ctrl-Q = quit | Ctrl-F = find';
    case 'prompt':
      // Function form: `$` sequences in the input are literal.
      return message.template.replace('%s', () => message.input);
    case 'saved':
      return `${message.bytes} bytes written to disk`;
    case 'save-failed':
      return `Can't save! I/O error: ${message.reason}`;
    case 'save-aborted':
      return 'Save aborted';
    case 'open-failed':
      return `Can't open! I/O error: ${message.reason}`;
    case 'new-file':
      return `New file: ${message.fileName}`;
    case 'quit-warning':
      return `WARNING!!! File has unsaved changes. Press Ctrl-Q ${message.remaining} more times to quit.`;
    case 'clear':
      return '';
  }
}

/**
 * One status line exactly `width` columns wide: file label, line count
 * and dirty flag on the left; file type and position right-aligned when
 * they fit.
 */
export function composeStatusBar(info: StatusBarInfo, width: number): string {
  const label = (info.fileName ?? '[No Name]').slice(0, FILE_LABEL_MAX);
  const left = `${label} - ${info.rowCount} lines ${info.dirty ? '(modified)' : ''}`;
  const right = `${info.fileType ?? 'no ft'} | ${info.cursorRow + 1}/${info.rowCount}`;

  let line = left.slice(0, width);
  while (line.length < width) {
    if (width - line.length === right.length) {
      line += right;
      break;
    }
    line += ' ';
  }
  return line;
}

/** Message text if it has not expired, truncated to `width`. */
export function visibleMessage(
  message: TimedMessage | null,
  now: number,
  timeoutMs: number,
  width: number,
): string {
  if (message === null || message.text.length === 0) return '';
  if (now - message.shownAt >= timeoutMs) return '';
  return message.text.slice(0, width);
}
