/**
 * Document persistence. Contents are byte strings: one code unit per
 * byte, read and written as latin1 so no byte is altered on the way.
 */

import { readFileSync, writeFileSync } from 'node:fs';
import { DocumentIOError } from '../errors';

export interface DocumentStore {
  /** File contents, or null when the file does not exist. */
  read(fileName: string): string | null;
  /** Replace the file with `text`; returns the number of bytes written. */
  write(fileName: string, text: string): number;
}

function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

export class FileDocumentStore implements DocumentStore {
  read(fileName: string): string | null {
    try {
      return readFileSync(fileName, 'latin1');
    } catch (err) {
      if (errorCode(err) === 'ENOENT') return null;
      throw new DocumentIOError(fileName, err);
    }
  }

  write(fileName: string, text: string): number {
    const bytes = Buffer.from(text, 'latin1');
    try {
      writeFileSync(fileName, bytes, { mode: 0o644 });
    } catch (err) {
      throw new DocumentIOError(fileName, err);
    }
    return bytes.length;
  }
}
