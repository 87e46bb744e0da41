/**
 * File Descriptor Types
 *
 * Closed kind taxonomy, flag bits and hint keys shared by every
 * resolver implementation.
 *
 * @module @filemeta/core/file-types
 */

// ─────────────────────────────────────────────────────────────────────────────
// File Kind
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Kind of filesystem node, derived from the type bits of the stat mode.
 * `unknown` is only produced for type bits outside the seven POSIX types.
 */
export type FileKind =
  | 'regular'
  | 'directory'
  | 'symlink'
  | 'socket'
  | 'block-device'
  | 'char-device'
  | 'fifo'
  | 'unknown';

export const FILE_KINDS: readonly FileKind[] = [
  'regular',
  'directory',
  'symlink',
  'socket',
  'block-device',
  'char-device',
  'fifo',
  'unknown',
];

// POSIX file type bits
const S_IFMT = 0o170000;
const S_IFSOCK = 0o140000;
const S_IFLNK = 0o120000;
const S_IFREG = 0o100000;
const S_IFBLK = 0o060000;
const S_IFDIR = 0o040000;
const S_IFCHR = 0o020000;
const S_IFIFO = 0o010000;

/**
 * Map the type field of a stat mode to a FileKind.
 */
export function kindFromMode(mode: number): FileKind {
  switch (mode & S_IFMT) {
    case S_IFSOCK:
      return 'socket';
    case S_IFLNK:
      return 'symlink';
    case S_IFBLK:
      return 'block-device';
    case S_IFDIR:
      return 'directory';
    case S_IFCHR:
      return 'char-device';
    case S_IFIFO:
      return 'fifo';
    case S_IFREG:
      return 'regular';
    default:
      return 'unknown';
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Flags
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Attribute flag bits. New flags take the next free bit.
 */
export const FileFlags = {
  NONE: 0,
  /** The path is a symbolic link (attributes may come from its target) */
  SYMLINK: 1 << 0,
  /** The file may be launched by double-click */
  EXECUTABLE: 1 << 1,
} as const;

export type FileFlagName = Exclude<keyof typeof FileFlags, 'NONE'>;

export function hasFlag(flags: number, flag: number): boolean {
  return (flags & flag) === flag;
}

/**
 * Names of the flags set in `flags`, in bit order.
 */
export function flagNames(flags: number): FileFlagName[] {
  const names: FileFlagName[] = [];
  if (hasFlag(flags, FileFlags.SYMLINK)) names.push('SYMLINK');
  if (hasFlag(flags, FileFlags.EXECUTABLE)) names.push('EXECUTABLE');
  return names;
}

// ─────────────────────────────────────────────────────────────────────────────
// Hints
// ─────────────────────────────────────────────────────────────────────────────

export type FileHint = 'icon' | 'name';

/**
 * Presentation hints read from a desktop entry. A field is undefined
 * when the entry lacks the corresponding key.
 */
export interface LauncherHints {
  icon: string | undefined;
  name: string | undefined;
}

// ─────────────────────────────────────────────────────────────────────────────
// Attributes
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Raw POSIX attributes of a file. Times are epoch milliseconds;
 * inode and device numbers are bigint so large values survive.
 */
export interface FileAttributes {
  /** Full st_mode, type bits included */
  mode: number;
  uid: number;
  gid: number;
  size: number;
  atime: number;
  ctime: number;
  mtime: number;
  inode: bigint;
  device: bigint;
}

/**
 * Plain JSON-friendly view of a FileInfo.
 */
export interface FileInfoSnapshot {
  path: string;
  uri: string;
  displayName: string;
  kind: FileKind;
  mode: string;
  flags: FileFlagName[];
  uid: number;
  gid: number;
  size: number;
  atime: string;
  ctime: string;
  mtime: string;
  inode: string;
  device: string;
  contentType: string;
  hints?: LauncherHints;
}
