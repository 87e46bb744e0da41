/**
 * Content Type Database
 *
 * Reference-counted, explicitly created database of content types.
 * Name rules come from the bundled suffix table, caller overrides and
 * the mime-types extension table; files that match no name rule are
 * sniffed.
 *
 * Lifetime: the creator holds one reference and gives it up with
 * `shutdown()`. Every live handle holds another, so the intern table is
 * only torn down once the last descriptor has released its content type.
 *
 * @module content-types/database
 */

import { closeSync, openSync, readSync } from 'fs';
import * as nodePath from 'path';
import mime from 'mime-types';
import {
  DisposedError,
  silentLogger,
  type ContentTypeHandle,
  type ContentTypeSource,
  type Logger,
} from '@filemeta/core';
import {
  ContentTypeRulesSchema,
  loadBundledRules,
  type ContentTypeRules,
  type ContentTypeRulesInput,
} from './rules.js';
import { OCTET_STREAM, SNIFF_LENGTH, TEXT_PLAIN, sniffContent } from './sniff.js';

/**
 * Interned content type. One instance per name while referenced.
 */
class ContentType implements ContentTypeHandle {
  private refs = 0;

  constructor(
    readonly name: string,
    private readonly database: ContentTypeDatabase
  ) {}

  ref(): ContentTypeHandle {
    if (this.refs <= 0 && this.database.isDisposed) {
      throw new DisposedError(`Content type ${this.name}`);
    }
    this.refs++;
    this.database.acquire();
    return this;
  }

  unref(): void {
    if (this.refs <= 0) {
      throw new DisposedError(`Content type ${this.name}`);
    }
    this.refs--;
    if (this.refs === 0) {
      this.database.forget(this);
    }
    this.database.release();
  }

  get referenceCount(): number {
    return this.refs;
  }
}

export interface ContentTypeDatabaseOptions {
  /** Extra suffix rules (e.g. `{ ".conf": "text/plain" }`), checked first */
  overrides?: Record<string, string>;
  /** Replace the bundled rules entirely */
  rules?: ContentTypeRulesInput;
  logger?: Logger;
}

export class ContentTypeDatabase implements ContentTypeSource {
  private refCount = 1;
  private closed = false;
  private readonly types = new Map<string, ContentType>();
  private readonly rules: ContentTypeRules;
  private readonly overrides: ReadonlyMap<string, string>;
  private readonly logger: Logger;

  constructor(options: ContentTypeDatabaseOptions = {}) {
    this.rules = options.rules
      ? ContentTypeRulesSchema.parse(options.rules)
      : loadBundledRules();
    this.overrides = new Map(Object.entries(options.overrides ?? {}));
    this.logger = options.logger ?? silentLogger;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Lifetime
  // ─────────────────────────────────────────────────────────────────────────

  /** @internal Called by handles. */
  acquire(): void {
    this.refCount++;
  }

  /** @internal Called by handles and by `shutdown()`. */
  release(): void {
    this.refCount--;
    if (this.refCount === 0) {
      this.types.clear();
      this.logger.debug('Content type database torn down');
    }
  }

  /** @internal Drop an unreferenced handle from the intern table. */
  forget(type: ContentType): void {
    if (this.types.get(type.name) === type) {
      this.types.delete(type.name);
    }
  }

  /**
   * Give up the creator's reference. Handles held by live descriptors
   * stay valid; new lookups are rejected.
   */
  shutdown(): void {
    if (this.closed) {
      throw new DisposedError('ContentTypeDatabase');
    }
    this.closed = true;
    this.release();
  }

  get isDisposed(): boolean {
    return this.refCount <= 0;
  }

  get isShutDown(): boolean {
    return this.closed;
  }

  get referenceCount(): number {
    return this.refCount;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Lookups
  // ─────────────────────────────────────────────────────────────────────────

  lookupByName(name: string): ContentTypeHandle {
    this.assertOpen();
    const canonical = this.canonicalName(name);
    let type = this.types.get(canonical);
    if (!type) {
      type = new ContentType(canonical, this);
      this.types.set(canonical, type);
    }
    return type.ref();
  }

  lookupForFile(path: string, displayName: string): ContentTypeHandle {
    this.assertOpen();
    const byName = this.matchName(displayName);
    if (byName) {
      return this.lookupByName(byName);
    }
    return this.lookupByName(this.sniff(path));
  }

  ancestorsOf(handle: ContentTypeHandle): string[] {
    const start = this.canonicalName(handle.name);
    const result: string[] = [handle.name];
    if (start !== handle.name) result.push(start);

    const queue = [start];
    while (queue.length > 0) {
      const current = queue.shift() ?? start;
      for (const parent of this.parentsOf(current)) {
        if (!result.includes(parent)) {
          result.push(parent);
          queue.push(parent);
        }
      }
    }
    return result;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Private Helpers
  // ─────────────────────────────────────────────────────────────────────────

  private assertOpen(): void {
    if (this.closed || this.isDisposed) {
      throw new DisposedError('ContentTypeDatabase');
    }
  }

  private canonicalName(name: string): string {
    const lower = name.toLowerCase();
    return this.rules.aliases[lower] ?? lower;
  }

  private parentsOf(name: string): string[] {
    const explicit = this.rules.subclasses[name];
    if (explicit) return explicit;
    // Every text type without its own parents is a kind of text/plain
    if (name.startsWith('text/') && name !== TEXT_PLAIN) return [TEXT_PLAIN];
    return [];
  }

  /**
   * Type from the file name alone, or undefined when no rule matches.
   */
  private matchName(displayName: string): string | undefined {
    const suffix = nodePath.extname(displayName);
    if (!suffix) {
      return undefined;
    }
    const override = this.overrides.get(suffix) ?? this.overrides.get(suffix.toLowerCase());
    if (override) return override;

    const bundled = this.rules.suffixes[suffix] ?? this.rules.suffixes[suffix.toLowerCase()];
    if (bundled) return bundled;

    return mime.lookup(displayName) || undefined;
  }

  private sniff(path: string): string {
    let fd: number;
    try {
      fd = openSync(path, 'r');
    } catch (error) {
      this.logger.debug(
        `Cannot sniff ${path}: ${error instanceof Error ? error.message : String(error)}`
      );
      return OCTET_STREAM;
    }
    try {
      const buffer = Buffer.alloc(SNIFF_LENGTH);
      const length = readSync(fd, buffer, 0, SNIFF_LENGTH, 0);
      return sniffContent(buffer.subarray(0, length), this.rules);
    } catch (error) {
      this.logger.debug(
        `Cannot sniff ${path}: ${error instanceof Error ? error.message : String(error)}`
      );
      return OCTET_STREAM;
    } finally {
      closeSync(fd);
    }
  }
}

/**
 * Create a content-type database. The caller owns one reference and
 * must call `shutdown()` when done.
 */
export function createContentTypeDatabase(options: ContentTypeDatabaseOptions = {}): ContentTypeDatabase {
  return new ContentTypeDatabase(options);
}
