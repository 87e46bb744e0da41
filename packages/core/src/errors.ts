/**
 * File Info Errors
 *
 * Error types for resolution, rename and launch operations.
 * Each class carries a stable `code` for programmatic handling and a
 * `toUserMessage()` rendering for interactive layers.
 *
 * @module @filemeta/core/errors
 */

/**
 * Base class for all file info errors.
 */
export class FileInfoError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly path?: string
  ) {
    super(message);
    this.name = 'FileInfoError';
  }

  /**
   * Get a message suitable for showing to the user.
   * Override in subclasses for better wording.
   */
  toUserMessage(): string {
    return this.message;
  }
}

/**
 * Thrown when a stat, rename, read or write fails at the OS level.
 * `osCode` is the errno name reported by the OS (e.g. `ENOENT`).
 */
export class IoError extends FileInfoError {
  constructor(
    public readonly osCode: string,
    message: string,
    path?: string,
    public readonly errno?: number
  ) {
    super('IO_ERROR', message, path);
    this.name = 'IoError';
  }

  toUserMessage(): string {
    switch (this.osCode) {
      case 'ENOENT':
        return `No such file or directory: ${this.path}`;
      case 'EACCES':
      case 'EPERM':
        return `Permission denied: ${this.path}`;
      case 'EXDEV':
        return `Cannot move ${this.path} across filesystems`;
      default:
        return this.message;
    }
  }
}

/**
 * Thrown when a new name is empty, contains a path separator or is not valid UTF-8.
 */
export class InvalidNameError extends FileInfoError {
  constructor(public readonly fileName: string) {
    super('INVALID_NAME', `Invalid file name: "${fileName}"`);
    this.name = 'InvalidNameError';
  }

  toUserMessage(): string {
    return this.fileName === ''
      ? 'The file name must not be empty.'
      : `"${this.fileName}" is not a valid file name.`;
  }
}

/**
 * Thrown when a name cannot be represented in the filesystem encoding.
 */
export class EncodingError extends FileInfoError {
  constructor(message: string, path?: string) {
    super('ENCODING_ERROR', message, path);
    this.name = 'EncodingError';
  }
}

/**
 * Thrown when a rename destination is already occupied.
 */
export class AlreadyExistsError extends FileInfoError {
  constructor(path: string) {
    super('ALREADY_EXISTS', `File already exists: ${path}`, path);
    this.name = 'AlreadyExistsError';
  }

  toUserMessage(): string {
    return `The name is already in use: ${this.path}`;
  }
}

/**
 * Thrown when a desktop entry lacks its `[Desktop Entry]` group.
 */
export class InvalidFormatError extends FileInfoError {
  constructor(message: string, path?: string) {
    super('INVALID_FORMAT', message, path);
    this.name = 'InvalidFormatError';
  }

  toUserMessage(): string {
    return `Invalid desktop file${this.path ? ` ${this.path}` : ''}: ${this.message}`;
  }
}

/**
 * Thrown when a desktop entry has no usable `Exec` field.
 */
export class MissingExecFieldError extends FileInfoError {
  constructor(path: string) {
    super('MISSING_EXEC_FIELD', `No Exec field specified in ${path}`, path);
    this.name = 'MissingExecFieldError';
  }
}

/**
 * Thrown when a desktop entry cannot be read or parsed for launching.
 */
export class UnreadableLauncherError extends FileInfoError {
  constructor(path: string, public readonly reason?: string) {
    super(
      'UNREADABLE_LAUNCHER',
      `Unable to parse file ${path}${reason ? `: ${reason}` : ''}`,
      path
    );
    this.name = 'UnreadableLauncherError';
  }
}

/**
 * Thrown when an Exec template cannot be expanded.
 */
export class TemplateParseError extends FileInfoError {
  constructor(message: string, public readonly template: string) {
    super('TEMPLATE_PARSE_ERROR', message);
    this.name = 'TemplateParseError';
  }

  toUserMessage(): string {
    return `Cannot parse command "${this.template}": ${this.message}`;
  }
}

/**
 * Thrown when key file text is malformed.
 */
export class KeyFileParseError extends FileInfoError {
  constructor(message: string, public readonly line: number) {
    super('KEY_FILE_PARSE_ERROR', `Line ${line}: ${message}`);
    this.name = 'KeyFileParseError';
  }
}

/**
 * Thrown when a released handle is used.
 */
export class DisposedError extends FileInfoError {
  constructor(what: string) {
    super('DISPOSED', `${what} has already been released`);
    this.name = 'DisposedError';
  }
}

/**
 * Type guard for FileInfoError and its subclasses.
 */
export function isFileInfoError(error: unknown): error is FileInfoError {
  return error instanceof FileInfoError;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && typeof (error as NodeJS.ErrnoException).code === 'string';
}

/**
 * Convert a Node.js system error into an IoError.
 * Anything that is not a system error is rethrown unchanged.
 */
export function toIoError(error: unknown, path: string): IoError {
  if (error instanceof IoError) {
    return error;
  }
  if (isErrnoException(error) && error.code) {
    return new IoError(error.code, error.message, path, error.errno);
  }
  throw error;
}
