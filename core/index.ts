/**
 * Core barrel export: re-exports all public APIs from core/.
 */

export { EDITOR_NAME, VERSION } from './version';

// Errors / logging / config
export { GridpadError, TerminalError, DocumentIOError } from './errors';
export { Logger, getLogger, configureLogging, formatLogLine, type LogLevel, type LoggerOptions } from './logging';
export { StrictObject, ConfigValidationError, parseWithSchema, type ConfigIssue } from './config/typebox-helpers';
export {
  EditorConfigSchema, DEFAULT_CONFIG, parseEditorConfig, loadEditorConfig, defaultConfigPath,
  type EditorConfig,
} from './config/editor-config';

// Document
export { EditorDocument, splitLines, type DocumentOptions } from './document/document';
export { Row } from './document/row';
export { DEFAULT_TAB_STOP, expandTabs, rawToDisplay, displayToRaw, type RowContent } from './document/coordinates';
export { FileDocumentStore, type DocumentStore } from './document/file-store';

// Cursor
export { Cursor, type CursorDirection, type CursorPosition } from './cursor/cursor';

// Input
export { charKey, namedKey, isNamed, isPromptPrintable, type KeyEvent, type NamedKey } from './input/keys';

// Commands
export { CommandRegistry, type CommandHandler, type CommandContext } from './commands/registry';
export { registerEditingCommands, typeCharacter, deleteLeft, insertLineBreak } from './commands/editing';
export { registerNavigationCommands } from './commands/navigation';

// Viewport
export { Viewport, type VisibleRange, type ScrollPosition } from './viewport/viewport-manager';

// Tokenizer / Syntax
export { Classification, type ClassificationTag } from './tokenizer/classification';
export {
  highlightLine, cascadeHighlight, isSeparator,
  type HighlightResult, type HighlightTarget,
} from './tokenizer/highlighter';
export {
  SyntaxProfileSchema, createSyntaxProfile, parseSyntaxProfiles, builtinSyntaxProfiles, selectSyntaxProfile,
  type SyntaxProfile, type SyntaxProfileDefinition,
} from './tokenizer/syntax-profile';
export { searchMatchTag, classificationToTag, resolveTagColor, classificationColor } from './tokenizer/token-theme';

// Search
export { SearchSession, SearchDirection, type SearchMatch } from './search/incremental';
