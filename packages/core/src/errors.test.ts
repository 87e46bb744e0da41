/**
 * Tests for File Info Error Classes
 */

import { describe, it, expect } from 'vitest';
import {
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

describe('FileInfoError', () => {
  it('creates error with code, message, and path', () => {
    const error = new FileInfoError('TEST_CODE', 'Test message', '/test/path');

    expect(error.code).toBe('TEST_CODE');
    expect(error.message).toBe('Test message');
    expect(error.path).toBe('/test/path');
    expect(error.name).toBe('FileInfoError');
  });

  it('toUserMessage returns the message', () => {
    const error = new FileInfoError('TEST_CODE', 'Test message');
    expect(error.toUserMessage()).toBe('Test message');
  });

  it('is instanceof Error', () => {
    expect(new FileInfoError('TEST_CODE', 'Test message')).toBeInstanceOf(Error);
  });
});

describe('IoError', () => {
  it('carries the OS error code and errno', () => {
    const error = new IoError('ENOENT', 'no such file', '/missing', -2);

    expect(error.code).toBe('IO_ERROR');
    expect(error.osCode).toBe('ENOENT');
    expect(error.errno).toBe(-2);
    expect(error.path).toBe('/missing');
    expect(error.name).toBe('IoError');
  });

  it('renders permission failures distinctly', () => {
    expect(new IoError('EACCES', 'denied', '/root/x').toUserMessage()).toBe(
      'Permission denied: /root/x'
    );
    expect(new IoError('ENOENT', 'gone', '/gone').toUserMessage()).toBe(
      'No such file or directory: /gone'
    );
  });

  it('falls back to the raw message for other codes', () => {
    expect(new IoError('EIO', 'i/o error', '/x').toUserMessage()).toBe('i/o error');
  });
});

describe('InvalidNameError', () => {
  it('explains empty names', () => {
    const error = new InvalidNameError('');
    expect(error.code).toBe('INVALID_NAME');
    expect(error.toUserMessage()).toBe('The file name must not be empty.');
  });

  it('quotes the rejected name', () => {
    expect(new InvalidNameError('a/b').toUserMessage()).toBe('"a/b" is not a valid file name.');
  });
});

describe('AlreadyExistsError', () => {
  it('tells the user the name is taken', () => {
    const error = new AlreadyExistsError('/tmp/b.txt');
    expect(error.code).toBe('ALREADY_EXISTS');
    expect(error.message).toBe('File already exists: /tmp/b.txt');
    expect(error.toUserMessage()).toBe('The name is already in use: /tmp/b.txt');
  });
});

describe('launcher errors', () => {
  it('MissingExecFieldError names the file', () => {
    const error = new MissingExecFieldError('/apps/x.desktop');
    expect(error.code).toBe('MISSING_EXEC_FIELD');
    expect(error.message).toBe('No Exec field specified in /apps/x.desktop');
  });

  it('UnreadableLauncherError includes the reason when given', () => {
    expect(new UnreadableLauncherError('/a.desktop', 'Line 1: bad').message).toBe(
      'Unable to parse file /a.desktop: Line 1: bad'
    );
    expect(new UnreadableLauncherError('/a.desktop').message).toBe('Unable to parse file /a.desktop');
  });

  it('InvalidFormatError includes the path in the user message', () => {
    const error = new InvalidFormatError('missing [Desktop Entry] group', '/a.desktop');
    expect(error.code).toBe('INVALID_FORMAT');
    expect(error.toUserMessage()).toBe('Invalid desktop file /a.desktop: missing [Desktop Entry] group');
  });

  it('TemplateParseError keeps the template', () => {
    const error = new TemplateParseError('Unknown field code "%x"', 'app %x');
    expect(error.code).toBe('TEMPLATE_PARSE_ERROR');
    expect(error.template).toBe('app %x');
    expect(error.toUserMessage()).toBe('Cannot parse command "app %x": Unknown field code "%x"');
  });
});

describe('KeyFileParseError', () => {
  it('prefixes the line number', () => {
    const error = new KeyFileParseError('Empty key name', 4);
    expect(error.line).toBe(4);
    expect(error.message).toBe('Line 4: Empty key name');
  });
});

describe('isFileInfoError', () => {
  it('returns true for every subclass', () => {
    expect(isFileInfoError(new IoError('EIO', 'x'))).toBe(true);
    expect(isFileInfoError(new InvalidNameError(''))).toBe(true);
    expect(isFileInfoError(new EncodingError('x'))).toBe(true);
    expect(isFileInfoError(new DisposedError('FileInfo'))).toBe(true);
  });

  it('returns false for other values', () => {
    expect(isFileInfoError(new Error('msg'))).toBe(false);
    expect(isFileInfoError(null)).toBe(false);
    expect(isFileInfoError({ code: 'FAKE' })).toBe(false);
  });
});

describe('toIoError', () => {
  it('converts system errors', () => {
    const systemError = Object.assign(new Error('ENOENT: no such file'), {
      code: 'ENOENT',
      errno: -2,
    });
    const error = toIoError(systemError, '/missing');

    expect(error).toBeInstanceOf(IoError);
    expect(error.osCode).toBe('ENOENT');
    expect(error.errno).toBe(-2);
    expect(error.path).toBe('/missing');
  });

  it('passes IoErrors through', () => {
    const original = new IoError('EIO', 'x', '/a');
    expect(toIoError(original, '/b')).toBe(original);
  });

  it('rethrows anything else', () => {
    const plain = new TypeError('not a system error');
    expect(() => toIoError(plain, '/a')).toThrow(plain);
  });
});
