/**
 * Configuration File
 *
 * Schema and loader for filemeta.config.yaml files.
 */

import { z } from "zod";
import * as fs from "fs/promises";
import * as path from "path";
import * as yaml from "js-yaml";

export const LogLevelSchema = z.enum(["silent", "warn", "info", "debug"]);

/**
 * Complete configuration schema.
 */
export const FileMetaConfigSchema = z.object({
  /** Locale preference list; replaces LANGUAGE, LC_ALL, LC_MESSAGES and LANG */
  locales: z.array(z.string().min(1)).optional(),
  /** Command prefix for launchers with Terminal=true */
  terminal: z.array(z.string().min(1)).min(1).optional(),
  /** Display target for launch plans; replaces $DISPLAY */
  display: z.string().min(1).optional(),
  logLevel: LogLevelSchema.optional(),
  /** Extra suffix → content type rules, checked before the bundled ones */
  mimeOverrides: z.record(
    z.string().regex(/^\.[^/]+$/, "Suffix must start with a dot"),
    z.string().regex(/^[\w.+-]+\/[\w.+-]+$/, "Expected a type/subtype name")
  ).optional(),
}).strict();

export type FileMetaConfig = z.infer<typeof FileMetaConfigSchema>;

/**
 * Configuration file names to look for, in order.
 */
export const CONFIG_FILE_NAMES = [
  "filemeta.config.yaml",
  "filemeta.config.yml",
];

/**
 * Load configuration from a YAML file. An empty file is an empty config.
 *
 * @throws Error if the file can't be read, parsed or validated
 */
export async function loadConfigFile(configPath: string): Promise<FileMetaConfig> {
  const content = await fs.readFile(configPath, "utf-8");
  const parsed = yaml.load(content) ?? {};

  const result = FileMetaConfigSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `  - ${issue.path.join(".") || "(root)"}: ${issue.message}`
    ).join("\n");
    throw new Error(`Invalid config in ${configPath}:\n${issues}`);
  }

  return result.data;
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch {
    return false;
  }
}

/**
 * Find and load configuration.
 *
 * Searches for filemeta.config.yaml in the given directory and its
 * parents. A file that exists but is invalid is an error, not a miss.
 *
 * @returns Config and path if found, null otherwise
 */
export async function findConfig(
  startDir: string
): Promise<{ config: FileMetaConfig; configPath: string } | null> {
  let currentDir = path.resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const configPath = path.join(currentDir, fileName);
      if (await isFile(configPath)) {
        return { config: await loadConfigFile(configPath), configPath };
      }
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
}
