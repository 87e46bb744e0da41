/**
 * File Identity
 *
 * Absolute path plus its file:// URI. Two identities are equal when
 * their URIs are equal.
 *
 * @module @filemeta/core/file-identity
 */

import * as nodePath from 'path';
import { pathToFileURL } from 'url';

export class FileIdentity {
  readonly path: string;
  readonly uri: string;

  private constructor(path: string) {
    this.path = path;
    this.uri = pathToFileURL(path).href;
  }

  /**
   * Create an identity for `path`, resolved against the working directory.
   */
  static forPath(path: string): FileIdentity {
    return new FileIdentity(nodePath.resolve(path));
  }

  /**
   * Name shown to the user: the last path component, or `/` for the root.
   */
  get displayName(): string {
    return nodePath.basename(this.path) || nodePath.sep;
  }

  /**
   * Identity of the directory containing this one.
   */
  parent(): FileIdentity {
    return new FileIdentity(nodePath.dirname(this.path));
  }

  /**
   * Identity of the sibling entry called `name`.
   */
  sibling(name: string): FileIdentity {
    return new FileIdentity(nodePath.join(nodePath.dirname(this.path), name));
  }

  equals(other: FileIdentity): boolean {
    return this === other || this.uri === other.uri;
  }

  toString(): string {
    return this.uri;
  }
}
