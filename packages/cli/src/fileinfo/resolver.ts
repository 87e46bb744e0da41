/**
 * Attribute Resolver
 *
 * Reads the POSIX attributes of a path. Symbolic links are followed when
 * their target exists; a dangling link reports its own attributes.
 */

import { lstatSync, statSync, type BigIntStats } from "fs";
import { toIoError, type FileAttributes } from "@filemeta/core";

/**
 * How the attributes were obtained.
 * - none: the path is not a symbolic link
 * - followed: the path is a link and the attributes are its target's
 * - dangling: the path is a link whose target could not be read
 */
export type LinkState = "none" | "followed" | "dangling";

export interface ResolvedAttributes {
  stats: FileAttributes;
  link: LinkState;
}

function toAttributes(stats: BigIntStats): FileAttributes {
  return {
    mode: Number(stats.mode),
    uid: Number(stats.uid),
    gid: Number(stats.gid),
    size: Number(stats.size),
    atime: Number(stats.atimeMs),
    ctime: Number(stats.ctimeMs),
    mtime: Number(stats.mtimeMs),
    inode: stats.ino,
    device: stats.dev,
  };
}

/**
 * Stat `path` without following it first, then follow it if it is a link.
 *
 * @throws IoError when the path itself cannot be stat'ed
 */
export function resolveAttributes(path: string): ResolvedAttributes {
  let linkStats: BigIntStats;
  try {
    linkStats = lstatSync(path, { bigint: true });
  } catch (error) {
    throw toIoError(error, path);
  }

  if (!linkStats.isSymbolicLink()) {
    return { stats: toAttributes(linkStats), link: "none" };
  }

  try {
    return { stats: toAttributes(statSync(path, { bigint: true })), link: "followed" };
  } catch {
    // Target missing, unreadable or looping: keep the link's own attributes
    return { stats: toAttributes(linkStats), link: "dangling" };
  }
}
