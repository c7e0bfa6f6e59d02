import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { EditorDocument } from '../core/document/document';
import { FileDocumentStore } from '../core/document/file-store';
import { DocumentIOError } from '../core/errors';

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'gridpad-store-'));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe('FileDocumentStore', () => {
  const store = new FileDocumentStore();

  test('writes and reads back text', () => {
    const path = join(dir, 'a.txt');
    expect(store.write(path, 'x\ny\n')).toBe(4);
    expect(store.read(path)).toBe('x\ny\n');
  });

  test('bytes are kept one for one', () => {
    const path = join(dir, 'latin.txt');
    expect(store.write(path, '\xe9\xff\n')).toBe(3);
    expect([...readFileSync(path)]).toEqual([0xe9, 0xff, 0x0a]);
    expect(store.read(path)).toBe('\xe9\xff\n');
  });

  test('a missing file reads as null', () => {
    expect(store.read(join(dir, 'missing.txt'))).toBeNull();
  });

  test('reading a directory fails with the file name', () => {
    try {
      store.read(dir);
      expect.unreachable('read should fail');
    } catch (err) {
      expect(err).toBeInstanceOf(DocumentIOError);
      if (err instanceof DocumentIOError) expect(err.fileName).toBe(dir);
    }
  });

  test('writing into a missing directory fails', () => {
    expect(() => store.write(join(dir, 'no', 'such', 'file.txt'), 'x')).toThrow(DocumentIOError);
  });

  test('load and save round trip through a document', () => {
    const path = join(dir, 'round.c');
    const text = 'int main() {\n\treturn 0;\n}\n';
    store.write(path, text);
    const loaded = store.read(path);
    expect(loaded).toBe(text);
    const doc = EditorDocument.fromText(loaded ?? '');
    expect(store.write(path, doc.contentsAsFlatText())).toBe(text.length);
    expect(readFileSync(path, 'latin1')).toBe(text);
  });
});
