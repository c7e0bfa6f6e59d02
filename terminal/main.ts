/**
 * Entry point: `gridpad [file]`.
 */

import { loadEditorConfig, type EditorConfig } from '../core/config/editor-config';
import { FileDocumentStore } from '../core/document/file-store';
import { TerminalError } from '../core/errors';
import { configureLogging, getLogger } from '../core/logging';
import { EditorSession } from '../view-model/editor-session';
import { themeByName } from '../view-model/theme';
import { CURSOR, SCREEN, serializeFrame } from './ansi';
import { decodeKeys } from './input';
import { enableRawMode } from './raw-mode';

const log = getLogger('main');

const DEFAULT_ROWS = 24;
const DEFAULT_COLS = 80;

function writeBytes(text: string): void {
  process.stdout.write(Buffer.from(text, 'latin1'));
}

function clearScreen(): void {
  writeBytes(SCREEN.clear + CURSOR.home);
}

function run(config: EditorConfig, fileName: string | undefined): void {
  const restore = enableRawMode(process.stdin);
  const theme = themeByName(config.theme);
  const session = new EditorSession({
    config,
    store: new FileDocumentStore(),
    screenRows: process.stdout.rows ?? DEFAULT_ROWS,
    screenCols: process.stdout.columns ?? DEFAULT_COLS,
  });

  if (fileName !== undefined) session.open(fileName);
  session.setStatusMessage({ kind: 'help' });

  const draw = (): void => {
    writeBytes(serializeFrame(session.render(), theme));
  };

  const exit = (code: number): void => {
    restore();
    clearScreen();
    log.info('exit', { code });
    process.exit(code);
  };

  const fatal = (err: unknown): void => {
    log.error('fatal', err);
    restore();
    clearScreen();
    process.stderr.write(`gridpad: ${err instanceof Error ? err.message : String(err)}\n`);
    process.exit(1);
  };

  process.stdin.on('data', (chunk: Buffer) => {
    try {
      for (const key of decodeKeys(chunk.toString('latin1'))) {
        if (session.handleKey(key) === 'quit') {
          exit(0);
          return;
        }
      }
      draw();
    } catch (err) {
      fatal(err);
    }
  });

  process.stdout.on('resize', () => {
    session.resize(process.stdout.rows ?? DEFAULT_ROWS, process.stdout.columns ?? DEFAULT_COLS);
    draw();
  });

  process.on('uncaughtException', fatal);

  log.info('started', { fileName: fileName ?? null });
  draw();
}

function main(argv: readonly string[]): void {
  let config: EditorConfig;
  try {
    config = loadEditorConfig();
  } catch (err) {
    process.stderr.write(`gridpad: ${err instanceof Error ? err.message : String(err)}\n`);
    process.exit(1);
  }
  configureLogging({ logFile: config.logFile, level: config.logLevel });

  try {
    run(config, argv[0]);
  } catch (err) {
    if (err instanceof TerminalError) {
      clearScreen();
      process.stderr.write(`gridpad: ${err.message}\n`);
      process.exit(1);
    }
    throw err;
  }
}

main(process.argv.slice(2));
