// Theme
export * from './theme.js';

// ANSI utilities
export { ANSIBuilder } from './ansi/builder.js';
export * from './ansi/codes.js';
export * from './ansi/colors.js';

// Buffer system
export { ScreenBuffer } from './buffer/screen-buffer.js';
export { createCell, createStyle, invertStyle, cellsEqual, cloneCell } from './buffer/cell.js';

// Terminal
export {
  TerminalInitError,
  type Logger,
  type TerminalBackend,
  type TerminalSize,
  type TerminalSurface,
} from './terminal/terminal.js';
export { AnsiTerminal, type TerminalInput, type TerminalOutput } from './terminal/ansi-terminal.js';

// Layout and windows
export { LayoutManager, computeWidths, type ScreenLayout } from './layout/layout-manager.js';
export { Window } from './window/window.js';

// Panes
export { classifyMode, type FileKind } from './panes/file-kind.js';
export {
  DirectoryRenderer,
  computeViewport,
  isShowInfo,
  SHOW_INFO_VALUES,
  type ShowInfo,
  type DirectoryRendererOptions,
} from './panes/directory-renderer.js';
export { LineScanner, type LineSource } from './panes/line-scanner.js';
export { previewFile, isBinaryRune, PreviewError } from './panes/previewer.js';

// Formatting
export { humanize, formatShortTime, formatCtime, formatMode } from './format/formatters.js';

// Input
export { KeyParser, type ParsedKey } from './input/key-parser.js';
export { toKeyToken, NAMED_KEY_TOKENS, type KeyToken } from './input/key-token.js';
export {
  KeyResolver,
  findBindings,
  type Candidate,
  type Describable,
  type Resolution,
  type ResolverState,
  type ResetReason,
} from './input/key-resolver.js';

// UI
export { UI, type EngineOptions, type Identity, type UIOptions } from './ui/ui.js';
export { type Navigation } from './ui/navigation.js';
export { runPrompt, COMMAND_PREFIX, SHELL_PREFIX, type Completers } from './ui/prompt.js';
export { formatMenuRows } from './ui/bind-menu.js';
