/**
 * Tests for FileInfo reference counting and matching
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { FileInfo, matches, unrefAll, type FileInfoInit } from './file-info.js';
import { FileIdentity } from './file-identity.js';
import { FileFlags, type FileAttributes } from './file-types.js';
import type { ContentTypeHandle } from './content-type.js';
import { DisposedError } from './errors.js';

class FakeContentType implements ContentTypeHandle {
  refs = 1;
  constructor(readonly name: string) {}
  ref(): ContentTypeHandle {
    this.refs++;
    return this;
  }
  unref(): void {
    this.refs--;
  }
}

const ATTRIBUTES: FileAttributes = {
  mode: 0o100644,
  uid: 1000,
  gid: 1000,
  size: 42,
  atime: 1_700_000_000_000,
  ctime: 1_700_000_001_000,
  mtime: 1_700_000_002_000,
  inode: 1234n,
  device: 2049n,
};

describe('FileInfo', () => {
  let plain: FakeContentType;

  beforeEach(() => {
    plain = new FakeContentType('text/plain');
  });

  function create(overrides: Partial<FileInfoInit> = {}): FileInfo {
    return new FileInfo({
      identity: FileIdentity.forPath('/home/user/notes.txt'),
      kind: 'regular',
      attributes: ATTRIBUTES,
      flags: FileFlags.NONE,
      contentType: plain.ref(),
      ...overrides,
    });
  }

  describe('accessors', () => {
    it('exposes the attributes it was created with', () => {
      const info = create();

      expect(info.path).toBe('/home/user/notes.txt');
      expect(info.displayName).toBe('notes.txt');
      expect(info.kind).toBe('regular');
      expect(info.mode).toBe(0o644);
      expect(info.size).toBe(42);
      expect(info.inode).toBe(1234n);
      expect(info.contentType.name).toBe('text/plain');
      expect(info.hints).toBeUndefined();
      expect(info.getHint('icon')).toBeUndefined();
    });

    it('returns individual hints', () => {
      const info = create({ hints: { icon: 'utilities-terminal', name: undefined } });

      expect(info.getHint('icon')).toBe('utilities-terminal');
      expect(info.getHint('name')).toBeUndefined();
    });

    it('serializes to a snapshot', () => {
      const info = create({ flags: FileFlags.SYMLINK | FileFlags.EXECUTABLE });

      expect(info.toJSON()).toEqual({
        path: '/home/user/notes.txt',
        uri: 'file:///home/user/notes.txt',
        displayName: 'notes.txt',
        kind: 'regular',
        mode: '0644',
        flags: ['SYMLINK', 'EXECUTABLE'],
        uid: 1000,
        gid: 1000,
        size: 42,
        atime: '2023-11-14T22:13:20.000Z',
        ctime: '2023-11-14T22:13:21.000Z',
        mtime: '2023-11-14T22:13:22.000Z',
        inode: '1234',
        device: '2049',
        contentType: 'text/plain',
      });
    });
  });

  describe('reference counting', () => {
    it('starts with one reference', () => {
      expect(create().referenceCount).toBe(1);
    });

    it('releases the content type when the last reference goes', () => {
      const info = create();
      expect(plain.refs).toBe(2);

      info.ref();
      info.unref();
      expect(plain.refs).toBe(2);
      expect(info.isDisposed).toBe(false);

      info.unref();
      expect(plain.refs).toBe(1);
      expect(info.isDisposed).toBe(true);
    });

    it('rejects use after release', () => {
      const info = create();
      info.unref();

      expect(() => info.size).toThrow(DisposedError);
      expect(() => info.unref()).toThrow('FileInfo has already been released');
      expect(() => info.ref()).toThrow(DisposedError);
      expect(plain.refs).toBe(1);
    });

    it('unrefAll releases every descriptor in a list', () => {
      const infos = [create(), create(), create()];
      expect(plain.refs).toBe(4);

      unrefAll(infos);
      expect(infos.every((info) => info.isDisposed)).toBe(true);
      expect(plain.refs).toBe(1);
    });
  });

  describe('applyChange', () => {
    it('swaps the content type and releases the old one', () => {
      const info = create();
      const script = new FakeContentType('application/x-shellscript');

      info.applyChange({
        identity: FileIdentity.forPath('/home/user/run.sh'),
        displayName: 'run.sh',
        contentType: script,
        flags: FileFlags.EXECUTABLE,
      });

      expect(info.path).toBe('/home/user/run.sh');
      expect(info.displayName).toBe('run.sh');
      expect(info.contentType).toBe(script);
      expect(info.flags).toBe(FileFlags.EXECUTABLE);
      expect(info.size).toBe(42);
      expect(plain.refs).toBe(1);
    });

    it('clears hints with null', () => {
      const info = create({ hints: { icon: 'x', name: 'y' } });
      info.applyChange({ hints: null });
      expect(info.hints).toBeUndefined();
    });
  });
});

describe('matches', () => {
  const type = new FakeContentType('text/plain');

  function create(attributes: Partial<FileAttributes> = {}, path = '/data/a.txt'): FileInfo {
    return new FileInfo({
      identity: FileIdentity.forPath(path),
      kind: 'regular',
      attributes: { ...ATTRIBUTES, ...attributes },
      flags: FileFlags.NONE,
      contentType: type.ref(),
    });
  }

  it('is reflexive', () => {
    const a = create();
    expect(matches(a, a)).toBe(true);
  });

  it('is symmetric', () => {
    const a = create();
    const b = create();
    expect(matches(a, b)).toBe(true);
    expect(matches(b, a)).toBe(true);
  });

  it('fails when only the size differs', () => {
    const a = create();
    const b = create({ size: 43 });
    expect(matches(a, b)).toBe(false);
    expect(matches(b, a)).toBe(false);
  });

  it('fails when the identity differs', () => {
    expect(matches(create(), create({}, '/data/b.txt'))).toBe(false);
  });

  it('fails when the content type differs', () => {
    const a = create();
    const b = new FileInfo({
      identity: FileIdentity.forPath('/data/a.txt'),
      kind: 'regular',
      attributes: ATTRIBUTES,
      flags: FileFlags.NONE,
      contentType: new FakeContentType('text/markdown'),
    });
    expect(matches(a, b)).toBe(false);
  });

  it('ignores display name and hints', () => {
    const a = create();
    const b = create();
    b.applyChange({ displayName: 'Renamed', hints: { icon: 'x', name: 'y' } });
    expect(matches(a, b)).toBe(true);
  });
});
