/**
 * FileInfo
 *
 * Reference-counted descriptor of a file's observable state. Created by a
 * resolver, mutated only by the rename engine, released through `unref()`.
 *
 * @module @filemeta/core/file-info
 */

import type { ContentTypeHandle } from './content-type.js';
import { DisposedError } from './errors.js';
import type { FileIdentity } from './file-identity.js';
import {
  flagNames,
  type FileAttributes,
  type FileHint,
  type FileInfoSnapshot,
  type FileKind,
  type LauncherHints,
} from './file-types.js';

/**
 * Everything a resolver hands to a new FileInfo. The descriptor takes
 * over the caller's reference on `contentType`.
 */
export interface FileInfoInit {
  identity: FileIdentity;
  kind: FileKind;
  attributes: FileAttributes;
  flags: number;
  contentType: ContentTypeHandle;
  hints?: LauncherHints;
}

/**
 * Fields the rename engine may replace. A new `contentType` carries a
 * reference that the descriptor takes over; the old one is released.
 */
export interface FileInfoChange {
  identity?: FileIdentity;
  displayName?: string;
  contentType?: ContentTypeHandle;
  flags?: number;
  /** `null` clears the hints */
  hints?: LauncherHints | null;
}

export class FileInfo {
  private refCount = 1;
  private _identity: FileIdentity;
  private _displayName: string;
  private _contentType: ContentTypeHandle;
  private _flags: number;
  private _hints: LauncherHints | undefined;
  private readonly _kind: FileKind;
  private readonly attributes: Readonly<FileAttributes>;

  constructor(init: FileInfoInit) {
    this._identity = init.identity;
    this._displayName = init.identity.displayName;
    this._kind = init.kind;
    this.attributes = { ...init.attributes };
    this._flags = init.flags;
    this._contentType = init.contentType;
    this._hints = init.hints ? { ...init.hints } : undefined;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Reference Counting
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Take another reference. Returns the same descriptor.
   */
  ref(): this {
    this.assertAlive();
    this.refCount++;
    return this;
  }

  /**
   * Drop a reference. The last one releases the identity, the
   * content-type reference and the hints.
   */
  unref(): void {
    this.assertAlive();
    this.refCount--;
    if (this.refCount === 0) {
      this._contentType.unref();
      this._hints = undefined;
    }
  }

  get referenceCount(): number {
    return this.refCount;
  }

  get isDisposed(): boolean {
    return this.refCount === 0;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Accessors
  // ─────────────────────────────────────────────────────────────────────────

  get identity(): FileIdentity {
    this.assertAlive();
    return this._identity;
  }

  get path(): string {
    return this.identity.path;
  }

  get displayName(): string {
    this.assertAlive();
    return this._displayName;
  }

  get kind(): FileKind {
    this.assertAlive();
    return this._kind;
  }

  /** Permission bits only (`st_mode & 0o7777`). */
  get mode(): number {
    this.assertAlive();
    return this.attributes.mode & 0o7777;
  }

  get flags(): number {
    this.assertAlive();
    return this._flags;
  }

  get uid(): number {
    this.assertAlive();
    return this.attributes.uid;
  }

  get gid(): number {
    this.assertAlive();
    return this.attributes.gid;
  }

  get size(): number {
    this.assertAlive();
    return this.attributes.size;
  }

  get atime(): number {
    this.assertAlive();
    return this.attributes.atime;
  }

  get ctime(): number {
    this.assertAlive();
    return this.attributes.ctime;
  }

  get mtime(): number {
    this.assertAlive();
    return this.attributes.mtime;
  }

  get inode(): bigint {
    this.assertAlive();
    return this.attributes.inode;
  }

  get device(): bigint {
    this.assertAlive();
    return this.attributes.device;
  }

  get contentType(): ContentTypeHandle {
    this.assertAlive();
    return this._contentType;
  }

  /**
   * Launcher hints, or undefined when the file is not a desktop entry.
   */
  get hints(): Readonly<LauncherHints> | undefined {
    this.assertAlive();
    return this._hints;
  }

  /**
   * Value of a single hint, or undefined when the file does not provide it.
   */
  getHint(hint: FileHint): string | undefined {
    this.assertAlive();
    return this._hints?.[hint];
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Mutation
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Apply the outcome of a successful rename. Attributes are not touched.
   */
  applyChange(change: FileInfoChange): void {
    this.assertAlive();
    if (change.identity) {
      this._identity = change.identity;
    }
    if (change.displayName !== undefined) {
      this._displayName = change.displayName;
    }
    if (change.contentType) {
      const previous = this._contentType;
      this._contentType = change.contentType;
      previous.unref();
    }
    if (change.flags !== undefined) {
      this._flags = change.flags;
    }
    if (change.hints === null) {
      this._hints = undefined;
    } else if (change.hints) {
      this._hints = { ...change.hints };
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Serialization
  // ─────────────────────────────────────────────────────────────────────────

  toJSON(): FileInfoSnapshot {
    this.assertAlive();
    const snapshot: FileInfoSnapshot = {
      path: this._identity.path,
      uri: this._identity.uri,
      displayName: this._displayName,
      kind: this._kind,
      mode: this.mode.toString(8).padStart(4, '0'),
      flags: flagNames(this._flags),
      uid: this.attributes.uid,
      gid: this.attributes.gid,
      size: this.attributes.size,
      atime: new Date(this.attributes.atime).toISOString(),
      ctime: new Date(this.attributes.ctime).toISOString(),
      mtime: new Date(this.attributes.mtime).toISOString(),
      inode: this.attributes.inode.toString(),
      device: this.attributes.device.toString(),
      contentType: this._contentType.name,
    };
    if (this._hints) {
      snapshot.hints = { ...this._hints };
    }
    return snapshot;
  }

  private assertAlive(): void {
    if (this.refCount <= 0) {
      throw new DisposedError('FileInfo');
    }
  }
}

/**
 * Whether `a` and `b` denote the same observable file state. Ignores the
 * reference count, the display name and the hints.
 */
export function matches(a: FileInfo, b: FileInfo): boolean {
  return a.kind === b.kind
    && a.mode === b.mode
    && a.flags === b.flags
    && a.uid === b.uid
    && a.gid === b.gid
    && a.size === b.size
    && a.atime === b.atime
    && a.mtime === b.mtime
    && a.ctime === b.ctime
    && a.inode === b.inode
    && a.device === b.device
    && a.contentType === b.contentType
    && a.identity.equals(b.identity);
}

/**
 * Release one reference on every descriptor in `infos`.
 */
export function unrefAll(infos: Iterable<FileInfo>): void {
  for (const info of infos) {
    info.unref();
  }
}
