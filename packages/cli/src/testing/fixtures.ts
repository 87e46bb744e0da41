/**
 * Test Fixtures
 *
 * Temporary directories, files with exact permissions, and a logger that
 * records what it is given.
 */

import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import type { Logger } from "@filemeta/core";

export async function createTempDir(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), `${prefix}-`));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

/**
 * Write `content` to `dir/name` and chmod it to `mode`, bypassing the umask.
 */
export async function writeFixture(
  dir: string,
  name: string,
  content: string | Uint8Array,
  mode = 0o644
): Promise<string> {
  const filePath = path.join(dir, name);
  await fs.writeFile(filePath, content);
  await fs.chmod(filePath, mode);
  return filePath;
}

export interface LogEntry {
  level: "debug" | "info" | "warn";
  message: string;
}

export class RecordingLogger implements Logger {
  readonly entries: LogEntry[] = [];

  debug(message: string): void {
    this.entries.push({ level: "debug", message });
  }

  info(message: string): void {
    this.entries.push({ level: "info", message });
  }

  warn(message: string): void {
    this.entries.push({ level: "warn", message });
  }
}

/**
 * A desktop entry with the given keys in its `[Desktop Entry]` group.
 */
export function desktopEntry(entries: Record<string, string>): string {
  const lines = Object.entries(entries).map(([key, value]) => `${key}=${value}`);
  return ["[Desktop Entry]", ...lines, ""].join("\n");
}
