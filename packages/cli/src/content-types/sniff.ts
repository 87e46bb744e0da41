/**
 * Content Sniffing
 *
 * Classifies a file from its first bytes when its name matched no rule.
 *
 * @module content-types/sniff
 */

import type { ContentTypeRules, MagicRule } from './rules.js';

/** Bytes read from the start of a file for sniffing. */
export const SNIFF_LENGTH = 512;

export const OCTET_STREAM = 'application/octet-stream';
export const TEXT_PLAIN = 'text/plain';
export const ZERO_SIZE = 'application/x-zerosize';

const ELF_MAGIC = [0x7f, 0x45, 0x4c, 0x46];

// e_type values
const ET_REL = 1;
const ET_CORE = 4;

function startsWith(bytes: Uint8Array, signature: readonly number[], offset = 0): boolean {
  if (bytes.length < offset + signature.length) return false;
  return signature.every((byte, i) => bytes[offset + i] === byte);
}

function hexToBytes(hex: string): number[] {
  const bytes: number[] = [];
  for (let i = 0; i < hex.length; i += 2) {
    bytes.push(parseInt(hex.slice(i, i + 2), 16));
  }
  return bytes;
}

function sniffElf(bytes: Uint8Array): string {
  // e_type is a 16-bit field at offset 16; byte 5 gives the endianness
  const bigEndian = bytes[5] === 2;
  const eType = bytes.length >= 18
    ? (bigEndian ? (bytes[16] << 8) | bytes[17] : bytes[16] | (bytes[17] << 8))
    : 0;
  if (eType === ET_REL) return 'application/x-object';
  if (eType === ET_CORE) return 'application/x-core';
  return 'application/x-executable';
}

/**
 * Interpreter named by a `#!` line, with its directory and version stripped.
 * `#!/usr/bin/env -S python3 -u` → `python`.
 */
export function shebangInterpreter(firstLine: string): string | undefined {
  const words = firstLine.slice(2).trim().split(/\s+/).filter(Boolean);
  let program = words.shift();
  if (program && program.split('/').pop() === 'env') {
    program = words.find((word) => !word.startsWith('-') && !word.includes('='));
  }
  if (!program) return undefined;
  const base = program.split('/').pop() ?? program;
  return base.match(/^[a-z]+/i)?.[0].toLowerCase();
}

function decodeText(bytes: Uint8Array): string | undefined {
  if (bytes.includes(0)) return undefined;
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes, { stream: true });
  } catch {
    return undefined;
  }
}

function isDesktopEntryText(text: string): boolean {
  for (const line of text.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (trimmed === '' || trimmed.startsWith('#')) continue;
    return trimmed === '[Desktop Entry]' || trimmed === '[KDE Desktop Entry]';
  }
  return false;
}

function matchMagic(bytes: Uint8Array, rules: readonly MagicRule[]): string | undefined {
  return rules.find((rule) => startsWith(bytes, hexToBytes(rule.bytes), rule.offset))?.type;
}

/**
 * Classify file contents. `bytes` is the start of the file
 * (at most SNIFF_LENGTH bytes); an empty array means an empty file.
 */
export function sniffContent(bytes: Uint8Array, rules: ContentTypeRules): string {
  if (bytes.length === 0) {
    return ZERO_SIZE;
  }
  if (startsWith(bytes, ELF_MAGIC)) {
    return sniffElf(bytes);
  }

  const magic = matchMagic(bytes, rules.magic);
  if (magic) {
    return magic;
  }

  const text = decodeText(bytes);
  if (text === undefined) {
    return OCTET_STREAM;
  }

  if (text.startsWith('#!')) {
    const interpreter = shebangInterpreter(text.split(/\r?\n/, 1)[0]);
    const type = interpreter ? rules.interpreters[interpreter] : undefined;
    return type ?? TEXT_PLAIN;
  }
  if (isDesktopEntryText(text)) {
    return 'application/x-desktop';
  }
  return TEXT_PLAIN;
}
