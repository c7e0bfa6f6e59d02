/**
 * EditorSession: the single owner of editor state.
 *
 * Keys arrive one at a time through handleKey(); the terminal layer calls
 * render() afterwards and writes the frame. While a prompt is open every
 * key goes to the prompt.
 */

import { Cursor, type CursorPosition } from '../core/cursor/cursor';
import { EditorDocument, splitLines } from '../core/document/document';
import type { DocumentStore } from '../core/document/file-store';
import { CommandRegistry, type CommandContext } from '../core/commands/registry';
import { registerEditingCommands, typeCharacter } from '../core/commands/editing';
import { registerNavigationCommands } from '../core/commands/navigation';
import type { EditorConfig } from '../core/config/editor-config';
import type { KeyEvent, NamedKey } from '../core/input/keys';
import { getLogger } from '../core/logging';
import { SearchSession } from '../core/search/incremental';
import { builtinSyntaxProfiles, selectSyntaxProfile, type SyntaxProfile } from '../core/tokenizer/syntax-profile';
import { Viewport, type ScrollPosition } from '../core/viewport/viewport-manager';
import { composeFrame, type Frame } from './compositor';
import { LinePrompt } from './prompt';
import { formatStatusMessage, type StatusMessage, type TimedMessage } from './status-bar';

const log = getLogger('session');

/** Rows reserved below the text area: status bar and message bar. */
export const RESERVED_ROWS = 2;

export const SEARCH_PROMPT = 'Search: %s (Use ESC/Arrows/Enter)';
export const SAVE_AS_PROMPT = 'Save as: %s (ESC to cancel)';

export type KeyOutcome = 'continue' | 'quit';

export interface EditorSessionOptions {
  config: EditorConfig;
  store: DocumentStore;
  /** Full terminal size; the text area is two rows shorter. */
  screenRows: number;
  screenCols: number;
  /** Millisecond clock used for message expiry. */
  clock?: () => number;
  profiles?: readonly SyntaxProfile[];
}

const KEY_COMMANDS: Partial<Record<NamedKey, string>> = {
  MoveLeft: 'editor.action.moveCursorLeft',
  MoveRight: 'editor.action.moveCursorRight',
  MoveUp: 'editor.action.moveCursorUp',
  MoveDown: 'editor.action.moveCursorDown',
  Home: 'editor.action.moveCursorToLineStart',
  End: 'editor.action.moveCursorToLineEnd',
  PageUp: 'editor.action.pageUp',
  PageDown: 'editor.action.pageDown',
  Backspace: 'editor.action.deleteLeft',
  Delete: 'editor.action.deleteRight',
  Enter: 'editor.action.insertLineBreak',
};

interface FindState {
  search: SearchSession;
  savedCursor: CursorPosition;
  savedScroll: ScrollPosition;
}

interface ActivePrompt {
  prompt: LinePrompt;
  purpose: 'find' | 'save-as';
}

export class EditorSession {
  readonly document: EditorDocument;
  readonly cursor: Cursor;
  readonly viewport: Viewport;
  readonly commands: CommandRegistry;

  private readonly config: EditorConfig;
  private readonly store: DocumentStore;
  private readonly clock: () => number;
  private readonly profiles: readonly SyntaxProfile[];

  private _fileName: string | null = null;
  private _message: TimedMessage | null = null;
  private _quitTimes: number;
  private _prompt: ActivePrompt | null = null;
  private _find: FindState | null = null;

  constructor(options: EditorSessionOptions) {
    this.config = options.config;
    this.store = options.store;
    this.clock = options.clock ?? Date.now;
    this.profiles = options.profiles ?? builtinSyntaxProfiles();
    this._quitTimes = options.config.quitTimes;

    this.document = new EditorDocument({ tabStop: options.config.tabStop });
    this.cursor = new Cursor();
    this.viewport = new Viewport(
      options.screenRows - RESERVED_ROWS,
      options.screenCols,
    );

    this.commands = new CommandRegistry();
    registerNavigationCommands(this.commands);
    registerEditingCommands(this.commands);
  }

  get fileName(): string | null {
    return this._fileName;
  }

  get message(): TimedMessage | null {
    return this._message;
  }

  get isPromptOpen(): boolean {
    return this._prompt !== null;
  }

  get search(): SearchSession | null {
    return this._find?.search ?? null;
  }

  private get context(): CommandContext {
    return { document: this.document, cursor: this.cursor, viewport: this.viewport };
  }

  setStatusMessage(message: StatusMessage): void {
    this._message = { text: formatStatusMessage(message), shownAt: this.clock() };
  }

  /**
   * Load a file. A missing file opens empty under that name. A read that
   * fails for any other reason leaves the session untouched.
   */
  open(fileName: string): void {
    let text: string | null;
    try {
      text = this.store.read(fileName);
    } catch (err) {
      log.error('open failed', err, { fileName });
      this.setStatusMessage({ kind: 'open-failed', reason: reasonOf(err) });
      return;
    }

    this._fileName = fileName;
    this.document.setSyntax(selectSyntaxProfile(fileName, this.profiles));
    this.cursor.moveTo(0, 0);
    this.viewport.restore({ rowOffset: 0, colOffset: 0 });

    if (text === null) {
      log.info('new file', { fileName });
      this.document.loadLines([]);
      this.setStatusMessage({ kind: 'new-file', fileName });
    } else {
      this.document.loadLines(splitLines(text));
      log.info('opened', { fileName, rows: this.document.rowCount });
    }
  }

  /** Terminal was resized to `screenRows` x `screenCols`. */
  resize(screenRows: number, screenCols: number): void {
    this.viewport.resize(screenRows - RESERVED_ROWS, screenCols);
  }

  handleKey(key: KeyEvent): KeyOutcome {
    if (this._prompt !== null) {
      this.handlePromptKey(this._prompt, key);
      return 'continue';
    }

    if (key.kind === 'named' && key.key === 'Quit') {
      if (this.document.isDirty && this._quitTimes > 0) {
        this.setStatusMessage({ kind: 'quit-warning', remaining: this._quitTimes });
        this._quitTimes--;
        return 'continue';
      }
      return 'quit';
    }

    this.dispatch(key);
    this._quitTimes = this.config.quitTimes;
    return 'continue';
  }

  /** Recompute scroll for the current cursor and compose a frame. */
  render(): Frame {
    const displayColumn = this.viewport.recompute(this.cursor, this.document);
    return composeFrame({
      document: this.document,
      viewport: this.viewport,
      cursor: this.cursor,
      displayColumn,
      fileName: this._fileName,
      message: this._message,
      now: this.clock(),
      messageTimeoutMs: this.config.messageTimeoutMs,
    });
  }

  private dispatch(key: KeyEvent): void {
    if (key.kind === 'char') {
      typeCharacter(this.context, String.fromCharCode(key.code));
      return;
    }

    switch (key.key) {
      case 'Save':
        this.save();
        return;
      case 'Find':
        this.startFind();
        return;
      case 'Escape':
      case 'Redraw':
      case 'Quit':
        return;
      default: {
        const id = KEY_COMMANDS[key.key];
        if (id !== undefined) this.commands.execute(id, this.context);
      }
    }
  }

  private save(): void {
    if (this._fileName === null) {
      this.openPrompt(new LinePrompt(SAVE_AS_PROMPT), 'save-as');
      return;
    }
    this.writeToStore(this._fileName);
  }

  private writeToStore(fileName: string): void {
    try {
      const bytes = this.store.write(fileName, this.document.contentsAsFlatText());
      this.document.markSaved();
      log.info('saved', { fileName, bytes });
      this.setStatusMessage({ kind: 'saved', bytes });
    } catch (err) {
      log.error('save failed', err, { fileName });
      this.setStatusMessage({ kind: 'save-failed', reason: reasonOf(err) });
    }
  }

  private startFind(): void {
    const search = new SearchSession(this.document, this.cursor);
    search.begin();
    this._find = {
      search,
      savedCursor: this.cursor.position,
      savedScroll: this.viewport.position,
    };

    const prompt = new LinePrompt(SEARCH_PROMPT, (input, key) => {
      const match = search.onQueryChanged(input, key);
      // Scroll past the end so the next recompute puts the match row on top.
      if (match !== null) this.viewport.rowOffset = this.document.rowCount;
    });
    this.openPrompt(prompt, 'find');
  }

  private openPrompt(prompt: LinePrompt, purpose: ActivePrompt['purpose']): void {
    this._prompt = { prompt, purpose };
    this.showPrompt(prompt);
  }

  private showPrompt(prompt: LinePrompt): void {
    this.setStatusMessage({ kind: 'prompt', template: prompt.template, input: prompt.input });
  }

  private handlePromptKey(active: ActivePrompt, key: KeyEvent): void {
    const outcome = active.prompt.handleKey(key);
    if (outcome.status === 'pending') {
      this.showPrompt(active.prompt);
      return;
    }

    this._prompt = null;
    this.setStatusMessage({ kind: 'clear' });

    if (active.purpose === 'find') {
      this.finishFind(outcome.status === 'accepted');
      return;
    }

    if (outcome.status === 'accepted') {
      this._fileName = outcome.value;
      this.document.setSyntax(selectSyntaxProfile(outcome.value, this.profiles));
      this.writeToStore(outcome.value);
    } else {
      this.setStatusMessage({ kind: 'save-aborted' });
    }
  }

  private finishFind(commit: boolean): void {
    const find = this._find;
    if (find === null) return;
    this._find = null;

    find.search.end(commit);
    if (!commit) {
      this.cursor.restore(find.savedCursor);
      this.viewport.restore(find.savedScroll);
    }
  }
}

function reasonOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
