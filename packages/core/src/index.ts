/**
 * @filemeta/core
 *
 * Platform-agnostic file descriptor model for filemeta.
 * The Node.js resolver, rename engine and CLI live in @filemeta/cli.
 *
 * @module @filemeta/core
 */

// Descriptor types
export type {
  FileKind,
  FileFlagName,
  FileHint,
  LauncherHints,
  FileAttributes,
  FileInfoSnapshot,
} from './file-types.js';

export {
  FILE_KINDS,
  FileFlags,
  kindFromMode,
  hasFlag,
  flagNames,
} from './file-types.js';

// Identity and descriptor
export { FileIdentity } from './file-identity.js';

export {
  FileInfo,
  matches,
  unrefAll,
} from './file-info.js';

export type {
  FileInfoInit,
  FileInfoChange,
} from './file-info.js';

// Content types
export type {
  ContentTypeHandle,
  ContentTypeSource,
} from './content-type.js';

export {
  DESKTOP_ENTRY_TYPE,
  EXECUTABLE_TYPES,
  isDesktopEntry,
} from './content-type.js';

// Errors
export {
  FileInfoError,
  IoError,
  InvalidNameError,
  EncodingError,
  AlreadyExistsError,
  InvalidFormatError,
  MissingExecFieldError,
  UnreadableLauncherError,
  TemplateParseError,
  KeyFileParseError,
  DisposedError,
  isFileInfoError,
  toIoError,
} from './errors.js';

// Desktop entry format
export {
  KeyFile,
  DESKTOP_ENTRY_GROUP,
  escapeValue,
  unescapeValue,
} from './keyfile.js';

export {
  expandLocale,
  languageNames,
  normalizeLocales,
} from './locale.js';

export type { LocaleEnvironment } from './locale.js';

// Exec templates
export {
  expandExecTemplate,
  quoteExecArgument,
  DEFAULT_TERMINAL_COMMAND,
} from './exec-template.js';

export type {
  ExecTarget,
  ExecTemplateOptions,
} from './exec-template.js';

// Logging
export {
  LOG_LEVELS,
  silentLogger,
  isLevelEnabled,
} from './logger.js';

export type {
  Logger,
  LogLevel,
} from './logger.js';
