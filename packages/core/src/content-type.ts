/**
 * Content Type Interfaces
 *
 * The content-type database is supplied by the platform package.
 * Descriptors only see it through these interfaces.
 *
 * @module @filemeta/core/content-type
 */

/** Content type of desktop entries. */
export const DESKTOP_ENTRY_TYPE = 'application/x-desktop';

/** Content types that may be marked executable when their permissions allow it. */
export const EXECUTABLE_TYPES: readonly string[] = [
  'application/x-executable',
  'application/x-shellscript',
];

/**
 * Counted reference to an interned content type.
 * Handles for the same name are the same object, so identity
 * comparison is name comparison.
 */
export interface ContentTypeHandle {
  readonly name: string;
  /** Take another reference; returns the same handle. */
  ref(): ContentTypeHandle;
  /** Drop a reference. */
  unref(): void;
}

/**
 * Lookup side of a content-type database. Every returned handle carries
 * one reference owned by the caller.
 */
export interface ContentTypeSource {
  /** Handle for an exact type name. */
  lookupByName(name: string): ContentTypeHandle;

  /**
   * Classify a regular file by its name, falling back to sniffing its contents.
   */
  lookupForFile(path: string, displayName: string): ContentTypeHandle;

  /**
   * Names of `handle`'s type, its canonical form, and every parent type,
   * nearest first.
   */
  ancestorsOf(handle: ContentTypeHandle): string[];
}

export function isDesktopEntry(handle: ContentTypeHandle): boolean {
  return handle.name === DESKTOP_ENTRY_TYPE;
}
