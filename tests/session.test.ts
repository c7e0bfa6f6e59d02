import { beforeEach, describe, expect, test } from 'vitest';
import { DEFAULT_CONFIG } from '../core/config/editor-config';
import type { DocumentStore } from '../core/document/file-store';
import { DocumentIOError } from '../core/errors';
import { charKey, namedKey, type NamedKey } from '../core/input/keys';
import type { Frame, FramePrimitive } from '../view-model/compositor';
import { EditorSession } from '../view-model/editor-session';
import { formatStatusMessage } from '../view-model/status-bar';
import { MemoryDocumentStore } from './support/memory-store';

class FailingStore extends MemoryDocumentStore {
  failReads: boolean;
  failWrites: boolean;

  constructor(fail: { reads: boolean; writes: boolean }) {
    super();
    this.failReads = fail.reads;
    this.failWrites = fail.writes;
  }

  override read(fileName: string): string | null {
    if (this.failReads) throw new DocumentIOError(fileName, new Error('permission denied'));
    return super.read(fileName);
  }

  override write(fileName: string, text: string): number {
    if (this.failWrites) throw new DocumentIOError(fileName, new Error('disk full'));
    return super.write(fileName, text);
  }
}

let now = 0;
let store: MemoryDocumentStore;

function createSession(target: DocumentStore = store): EditorSession {
  return new EditorSession({
    config: DEFAULT_CONFIG,
    store: target,
    screenRows: 10,
    screenCols: 40,
    clock: () => now,
  });
}

function press(session: EditorSession, ...keys: NamedKey[]): void {
  for (const key of keys) session.handleKey(namedKey(key));
}

function typeText(session: EditorSession, text: string): void {
  for (const ch of text) session.handleKey(charKey(ch));
}

function messageText(session: EditorSession): string {
  return session.message?.text ?? '';
}

function find(frame: Frame, kind: FramePrimitive['kind']): FramePrimitive | undefined {
  return frame.primitives.find((p) => p.kind === kind);
}

beforeEach(() => {
  now = 0;
  store = new MemoryDocumentStore();
});

describe('EditorSession', () => {
  describe('open', () => {
    test('loads an existing file and picks its profile', () => {
      store.files.set('main.c', 'int x;\nreturn;\n');
      const session = createSession();
      session.open('main.c');
      expect(session.document.rowCount).toBe(2);
      expect(session.document.syntax?.name).toBe('c');
      expect(session.document.isDirty).toBe(false);
      expect(session.fileName).toBe('main.c');
    });

    test('a missing file opens empty under that name', () => {
      const session = createSession();
      session.open('new.c');
      expect(session.document.rowCount).toBe(0);
      expect(session.fileName).toBe('new.c');
      expect(messageText(session)).toBe('New file: new.c');
    });

    test('a read failure is reported, not thrown', () => {
      const session = createSession(new FailingStore({ reads: true, writes: false }));
      session.open('locked.txt');
      expect(messageText(session)).toBe("Can't open! I/O error: permission denied");
      expect(session.document.rowCount).toBe(0);
    });

    test('a read failure leaves the previous file open', () => {
      const flaky = new FailingStore({ reads: false, writes: false });
      flaky.files.set('a.c', 'int x;\nint y;\n');
      const session = createSession(flaky);
      session.open('a.c');
      session.cursor.moveTo(1, 2);

      flaky.failReads = true;
      session.open('notes.txt');

      expect(session.fileName).toBe('a.c');
      expect(session.document.syntax?.name).toBe('c');
      expect(session.document.rows.map((r) => r.raw)).toEqual(['int x;', 'int y;']);
      expect(session.cursor.position).toEqual({ row: 1, column: 2 });
      expect(messageText(session)).toBe("Can't open! I/O error: permission denied");
    });

    test('saving after a failed open asks for a name instead of overwriting', () => {
      const locked = new FailingStore({ reads: true, writes: false });
      locked.files.set('secret.c', 'keep me\n');
      const session = createSession(locked);
      session.open('secret.c');
      press(session, 'Save');

      expect(locked.files.get('secret.c')).toBe('keep me\n');
      expect(locked.files.size).toBe(1);
      expect(session.isPromptOpen).toBe(true);
      expect(messageText(session)).toBe('Save as:  (ESC to cancel)');
    });
  });

  describe('editing', () => {
    test('typing, line breaks and backspace', () => {
      const session = createSession();
      typeText(session, 'ab');
      press(session, 'MoveLeft', 'Enter');
      expect(session.document.rows.map((r) => r.raw)).toEqual(['a', 'b']);
      expect(session.cursor.position).toEqual({ row: 1, column: 0 });

      press(session, 'Backspace');
      expect(session.document.rows.map((r) => r.raw)).toEqual(['ab']);
      expect(session.cursor.position).toEqual({ row: 0, column: 1 });
      expect(session.document.isDirty).toBe(true);
    });

    test('Escape and Redraw change nothing', () => {
      const session = createSession();
      press(session, 'Escape', 'Redraw');
      expect(session.document.rowCount).toBe(0);
      expect(session.document.isDirty).toBe(false);
    });
  });

  describe('save', () => {
    test('writes to the open file and reports the byte count', () => {
      const session = createSession();
      session.open('a.txt');
      typeText(session, 'x');
      press(session, 'Save');
      expect(store.files.get('a.txt')).toBe('x\n');
      expect(messageText(session)).toBe('2 bytes written to disk');
      expect(session.document.isDirty).toBe(false);
    });

    test('prompts for a name when there is none', () => {
      const session = createSession();
      typeText(session, 'x');
      press(session, 'Save');
      expect(session.isPromptOpen).toBe(true);
      expect(messageText(session)).toBe('Save as:  (ESC to cancel)');

      typeText(session, 'out.c');
      expect(messageText(session)).toBe('Save as: out.c (ESC to cancel)');
      press(session, 'Enter');

      expect(session.isPromptOpen).toBe(false);
      expect(session.fileName).toBe('out.c');
      expect(session.document.syntax?.name).toBe('c');
      expect(store.files.get('out.c')).toBe('x\n');
      expect(messageText(session)).toBe('2 bytes written to disk');
    });

    test('Escape at the prompt aborts the save', () => {
      const session = createSession();
      typeText(session, 'x');
      press(session, 'Save', 'Escape');
      expect(messageText(session)).toBe('Save aborted');
      expect(session.fileName).toBeNull();
      expect(session.document.isDirty).toBe(true);
      expect(store.files.size).toBe(0);
    });

    test('a write failure keeps the document dirty', () => {
      const session = createSession(new FailingStore({ reads: false, writes: true }));
      session.open('locked.txt');
      typeText(session, 'x');
      press(session, 'Save');
      expect(messageText(session)).toBe("Can't save! I/O error: disk full");
      expect(session.document.isDirty).toBe(true);
    });
  });

  describe('quit', () => {
    test('a clean document quits at once', () => {
      expect(createSession().handleKey(namedKey('Quit'))).toBe('quit');
    });

    test('unsaved changes need extra presses', () => {
      const session = createSession();
      typeText(session, 'x');
      expect(session.handleKey(namedKey('Quit'))).toBe('continue');
      expect(messageText(session)).toBe(formatStatusMessage({ kind: 'quit-warning', remaining: 3 }));
      expect(session.handleKey(namedKey('Quit'))).toBe('continue');
      expect(messageText(session)).toBe(formatStatusMessage({ kind: 'quit-warning', remaining: 2 }));
      expect(session.handleKey(namedKey('Quit'))).toBe('continue');
      expect(session.handleKey(namedKey('Quit'))).toBe('quit');
    });

    test('any other key resets the count', () => {
      const session = createSession();
      typeText(session, 'x');
      press(session, 'Quit', 'Quit', 'MoveLeft', 'Quit');
      expect(messageText(session)).toBe(formatStatusMessage({ kind: 'quit-warning', remaining: 3 }));
    });
  });

  describe('find', () => {
    function sessionWithNeedle(): EditorSession {
      const lines = Array.from({ length: 20 }, (_, i) => (i === 15 ? 'the needle' : `line ${i}`));
      store.files.set('notes.txt', lines.join('\n'));
      const session = createSession();
      session.open('notes.txt');
      return session;
    }

    test('a hit moves the cursor and scrolls the match to the top', () => {
      const session = sessionWithNeedle();
      press(session, 'Find');
      typeText(session, 'needle');
      expect(messageText(session)).toBe('Search: needle (Use ESC/Arrows/Enter)');
      expect(session.cursor.position).toEqual({ row: 15, column: 4 });

      session.render();
      expect(session.viewport.rowOffset).toBe(15);
    });

    test('Escape restores the cursor and scroll', () => {
      const session = sessionWithNeedle();
      session.cursor.moveTo(2, 1);
      press(session, 'Find');
      typeText(session, 'needle');
      press(session, 'Escape');

      expect(session.isPromptOpen).toBe(false);
      expect(session.cursor.position).toEqual({ row: 2, column: 1 });
      expect(session.viewport.position).toEqual({ rowOffset: 0, colOffset: 0 });
      expect(messageText(session)).toBe('');
    });

    test('Enter keeps the cursor on the match', () => {
      const session = sessionWithNeedle();
      press(session, 'Find');
      typeText(session, 'needle');
      press(session, 'Enter');
      expect(session.isPromptOpen).toBe(false);
      expect(session.search).toBeNull();
      expect(session.cursor.position).toEqual({ row: 15, column: 4 });
    });

    test('the prompt echoes a query containing dollar signs', () => {
      const session = sessionWithNeedle();
      press(session, 'Find');
      typeText(session, "$'");
      expect(messageText(session)).toBe("Search: $' (Use ESC/Arrows/Enter)");
    });

    test('keys go to the prompt while it is open', () => {
      const session = sessionWithNeedle();
      press(session, 'Find');
      typeText(session, 'zz');
      expect(session.document.isDirty).toBe(false);
    });
  });

  describe('render', () => {
    test('the help message expires', () => {
      const session = createSession();
      session.setStatusMessage({ kind: 'help' });

      now = 4999;
      expect(find(session.render(), 'message')).toEqual({
        kind: 'message',
        text: formatStatusMessage({ kind: 'help' }).slice(0, 40),
      });

      now = 5000;
      expect(find(session.render(), 'message')).toEqual({ kind: 'message', text: '' });
    });

    test('the text area is two rows shorter than the screen', () => {
      const session = createSession();
      const frame = session.render();
      expect(frame.primitives.filter((p) => p.kind === 'empty-row')).toHaveLength(8);

      session.resize(20, 100);
      expect(session.viewport.visibleRows).toBe(18);
      expect(session.viewport.visibleCols).toBe(100);
    });
  });
});
