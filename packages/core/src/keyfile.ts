/**
 * Key File Format
 *
 * Reader and writer for the `[Group]` / `Key=Value` / `Key[locale]=Value`
 * format used by desktop entries. Every line of the input is kept, so a
 * file written back after `setString()` differs from the original only in
 * the entries that were set.
 *
 * @module @filemeta/core/keyfile
 */

import { KeyFileParseError } from './errors.js';

/** Group holding the fields of a desktop entry. */
export const DESKTOP_ENTRY_GROUP = 'Desktop Entry';

type KeyFileLine =
  | { type: 'blank'; raw: string }
  | { type: 'comment'; raw: string }
  | { type: 'group'; raw: string; name: string }
  | { type: 'entry'; raw: string; key: string; value: string };

interface KeyFileGroup {
  name: string;
  /** Header line followed by the group's body lines */
  lines: KeyFileLine[];
}

const GROUP_HEADER = /^\[([^\[\]]+)\]\s*$/;

/**
 * Decode the escape sequences of a value (`\s \n \t \r \\`).
 * Unknown sequences are kept as written.
 */
export function unescapeValue(value: string): string {
  let result = '';
  for (let i = 0; i < value.length; i++) {
    const ch = value[i];
    if (ch !== '\\' || i === value.length - 1) {
      result += ch;
      continue;
    }
    const next = value[++i];
    switch (next) {
      case 's': result += ' '; break;
      case 'n': result += '\n'; break;
      case 't': result += '\t'; break;
      case 'r': result += '\r'; break;
      case '\\': result += '\\'; break;
      default: result += '\\' + next;
    }
  }
  return result;
}

/**
 * Encode a value for writing. Leading spaces become `\s` so they survive
 * the whitespace trimming around `=`.
 */
export function escapeValue(value: string): string {
  let result = '';
  let leading = true;
  for (const ch of value) {
    if (leading && ch === ' ') {
      result += '\\s';
      continue;
    }
    leading = false;
    switch (ch) {
      case '\\': result += '\\\\'; break;
      case '\n': result += '\\n'; break;
      case '\t': result += '\\t'; break;
      case '\r': result += '\\r'; break;
      default: result += ch;
    }
  }
  return result;
}

export class KeyFile {
  private constructor(
    /** Comments and blank lines before the first group */
    private readonly preamble: KeyFileLine[],
    private readonly groups: KeyFileGroup[],
    private readonly eol: string,
    private readonly finalNewline: boolean
  ) {}

  /**
   * Parse key file text.
   *
   * @throws KeyFileParseError on a key outside any group, a line without
   *   `=`, or a malformed group header
   */
  static parse(text: string): KeyFile {
    const eol = text.includes('\r\n') ? '\r\n' : '\n';
    const rawLines = text.split(/\r?\n/);
    const finalNewline = rawLines.length > 1 && rawLines[rawLines.length - 1] === '';
    if (finalNewline) {
      rawLines.pop();
    }

    const preamble: KeyFileLine[] = [];
    const groups: KeyFileGroup[] = [];
    let current: KeyFileGroup | undefined;

    rawLines.forEach((raw, index) => {
      const lineNumber = index + 1;
      const trimmed = raw.trim();
      let line: KeyFileLine;

      if (trimmed === '') {
        line = { type: 'blank', raw };
      } else if (trimmed.startsWith('#')) {
        line = { type: 'comment', raw };
      } else if (trimmed.startsWith('[')) {
        const match = trimmed.match(GROUP_HEADER);
        if (!match) {
          throw new KeyFileParseError(`Malformed group header: ${trimmed}`, lineNumber);
        }
        current = { name: match[1], lines: [] };
        groups.push(current);
        line = { type: 'group', raw, name: match[1] };
      } else {
        const separator = raw.indexOf('=');
        if (separator < 0) {
          throw new KeyFileParseError(`Expected "key=value": ${trimmed}`, lineNumber);
        }
        if (!current) {
          throw new KeyFileParseError('Key/value pair outside of any group', lineNumber);
        }
        const key = raw.slice(0, separator).trim();
        if (key === '') {
          throw new KeyFileParseError('Empty key name', lineNumber);
        }
        line = { type: 'entry', raw, key, value: raw.slice(separator + 1).trimStart() };
      }

      (current ? current.lines : preamble).push(line);
    });

    return new KeyFile(preamble, groups, eol, finalNewline);
  }

  /**
   * Create an empty key file.
   */
  static empty(): KeyFile {
    return new KeyFile([], [], '\n', true);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Reading
  // ─────────────────────────────────────────────────────────────────────────

  getGroups(): string[] {
    return this.groups.map((group) => group.name);
  }

  hasGroup(group: string): boolean {
    return this.findGroup(group) !== undefined;
  }

  /**
   * Whether `group` has an entry named exactly `key` (locale suffix included).
   */
  hasKey(group: string, key: string): boolean {
    return this.findEntry(group, key) !== undefined;
  }

  /**
   * Keys of `group` in file order, without duplicates.
   */
  getKeys(group: string): string[] {
    const keys = new Set<string>();
    for (const line of this.findGroup(group)?.lines ?? []) {
      if (line.type === 'entry') keys.add(line.key);
    }
    return [...keys];
  }

  /**
   * Unescaped value of `key`, ignoring translations.
   */
  getString(group: string, key: string): string | undefined {
    const entry = this.findEntry(group, key);
    return entry ? unescapeValue(entry.value) : undefined;
  }

  /**
   * Value of the first `key[locale]` present for `locales` (in order),
   * falling back to the untranslated `key`.
   */
  getLocaleString(group: string, key: string, locales: readonly string[]): string | undefined {
    for (const locale of locales) {
      const value = this.getString(group, `${key}[${locale}]`);
      if (value !== undefined) {
        return value;
      }
    }
    return this.getString(group, key);
  }

  /**
   * Boolean value of `key`; `defaultValue` when missing or not a boolean.
   */
  getBoolean(group: string, key: string, defaultValue: boolean): boolean {
    const value = this.getString(group, key)?.trim();
    if (value === 'true' || value === '1') return true;
    if (value === 'false' || value === '0') return false;
    return defaultValue;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Writing
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Set `key` in `group`, replacing its value where it already exists and
   * otherwise appending it after the group's last entry. A missing group
   * is created at the end of the file.
   */
  setString(group: string, key: string, value: string): void {
    const raw = `${key}=${escapeValue(value)}`;
    const line: KeyFileLine = { type: 'entry', raw, key, value: escapeValue(value) };

    let target = this.findGroup(group);
    if (!target) {
      target = { name: group, lines: [{ type: 'group', raw: `[${group}]`, name: group }] };
      const previous = this.groups[this.groups.length - 1]?.lines ?? this.preamble;
      const last = previous[previous.length - 1];
      if (last && last.type !== 'blank') {
        previous.push({ type: 'blank', raw: '' });
      }
      this.groups.push(target);
    }

    const existing = this.lastIndexOf(target, key);
    if (existing >= 0) {
      target.lines[existing] = line;
      return;
    }

    let insertAt = target.lines.length;
    for (let i = target.lines.length - 1; i >= 0; i--) {
      const candidate = target.lines[i];
      if (candidate.type === 'entry' || candidate.type === 'group') {
        insertAt = i + 1;
        break;
      }
    }
    target.lines.splice(insertAt, 0, line);
  }

  /**
   * Serialize the file. Untouched lines are written exactly as read.
   */
  toString(): string {
    const lines = [
      ...this.preamble,
      ...this.groups.flatMap((group) => group.lines),
    ].map((line) => line.raw);
    const body = lines.join(this.eol);
    return this.finalNewline && lines.length > 0 ? body + this.eol : body;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Private Helpers
  // ─────────────────────────────────────────────────────────────────────────

  private findGroup(name: string): KeyFileGroup | undefined {
    return this.groups.find((group) => group.name === name);
  }

  private findEntry(group: string, key: string): Extract<KeyFileLine, { type: 'entry' }> | undefined {
    const target = this.findGroup(group);
    if (!target) return undefined;
    const index = this.lastIndexOf(target, key);
    const line = index >= 0 ? target.lines[index] : undefined;
    return line?.type === 'entry' ? line : undefined;
  }

  // Later duplicates override earlier ones
  private lastIndexOf(group: KeyFileGroup, key: string): number {
    for (let i = group.lines.length - 1; i >= 0; i--) {
      const line = group.lines[i];
      if (line.type === 'entry' && line.key === key) {
        return i;
      }
    }
    return -1;
  }
}
