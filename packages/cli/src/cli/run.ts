#!/usr/bin/env node
/**
 * CLI Entry Point
 *
 * Inspect, rename and plan launches of files from the command line.
 */

import { Command, CommanderError, InvalidArgumentError } from "commander";
import { realpathSync } from "fs";
import * as path from "path";
import { fileURLToPath } from "url";
import {
  FileIdentity,
  LOG_LEVELS,
  isFileInfoError,
  unrefAll,
  type FileInfo,
  type LogLevel,
} from "@filemeta/core";
import {
  createFileInfoContext,
  findConfig,
  loadConfigFile,
  type ConfiguredContext,
  type FileMetaConfig,
} from "../config/index.js";
import {
  buildLaunchPlan,
  renameFileInfo,
  resolveFileInfo,
} from "../fileinfo/index.js";
import { formatFileInfoJson, formatFileInfoPanel, formatLaunchPlan } from "./format.js";

/**
 * Global options from the command line.
 */
interface GlobalOptions {
  config?: string;
  locale?: string[];
  logLevel?: LogLevel;
}

interface InfoOptions {
  json?: boolean;
}

/**
 * Where the CLI reads its environment and writes its output.
 */
export interface CLIEnvironment {
  cwd: string;
  env: NodeJS.ProcessEnv;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

const processEnvironment: CLIEnvironment = {
  cwd: process.cwd(),
  env: process.env,
  stdout: (text) => console.log(text),
  stderr: (text) => console.error(text),
};

function parseLogLevel(value: string): LogLevel {
  const level = LOG_LEVELS.find((candidate) => candidate === value);
  if (!level) {
    throw new InvalidArgumentError(`Log level must be one of: ${LOG_LEVELS.join(", ")}`);
  }
  return level;
}

async function loadConfig(options: GlobalOptions, io: CLIEnvironment): Promise<FileMetaConfig> {
  if (options.config) {
    return loadConfigFile(path.resolve(io.cwd, options.config));
  }
  const found = await findConfig(io.cwd);
  return found?.config ?? {};
}

/**
 * Run `action` with a context built from the options, then release the
 * descriptors it returns and shut the database down.
 */
async function withContext(
  options: GlobalOptions,
  io: CLIEnvironment,
  action: (context: ConfiguredContext) => FileInfo[]
): Promise<void> {
  const config = await loadConfig(options, io);
  const context = createFileInfoContext(config, io.env, {
    locales: options.locale,
    logLevel: options.logLevel,
    logSink: io.stderr,
  });
  context.logger.debug(`Locales: ${context.locales.join(", ")}`);

  const infos: FileInfo[] = [];
  try {
    infos.push(...action(context));
  } finally {
    unrefAll(infos);
    context.database.shutdown();
  }
}

/**
 * Resolve every path, releasing the ones already resolved if one fails.
 */
function resolveAll(paths: string[], context: ConfiguredContext, io: CLIEnvironment): FileInfo[] {
  const infos: FileInfo[] = [];
  try {
    for (const target of paths) {
      infos.push(resolveFileInfo(path.resolve(io.cwd, target), context));
    }
  } catch (error) {
    unrefAll(infos);
    throw error;
  }
  return infos;
}

function formatError(error: unknown): string {
  if (isFileInfoError(error)) {
    return error.toUserMessage();
  }
  return error instanceof Error ? error.message : String(error);
}

function createProgram(io: CLIEnvironment): Command {
  const program = new Command();

  program
    .name("filemeta")
    .description("Inspect file metadata, rename files and plan launches")
    .version("0.1.0")
    .option("-c, --config <path>", "Config file (default: nearest filemeta.config.yaml)")
    .option("-l, --locale <locale...>", "Preferred locales for translated names")
    .option("-v, --log-level <level>", `Log level: ${LOG_LEVELS.join(", ")}`, parseLogLevel)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout(text.trimEnd()),
      writeErr: (text) => io.stderr(text.trimEnd()),
    });

  program
    .command("info")
    .description("Show the attributes, type and hints of files")
    .argument("<paths...>", "Files to describe")
    .option("--json", "Print JSON instead of panels")
    .action(async (paths: string[], options: InfoOptions) => {
      await withContext(program.opts<GlobalOptions>(), io, (context) => {
        const infos = resolveAll(paths, context, io);
        if (options.json) {
          io.stdout(formatFileInfoJson(infos));
        } else {
          for (const info of infos) {
            io.stdout(formatFileInfoPanel(info));
          }
        }
        return infos;
      });
    });

  program
    .command("rename")
    .description("Rename a file, or change the display name of a desktop entry")
    .argument("<path>", "File to rename")
    .argument("<name>", "New name")
    .action(async (target: string, name: string) => {
      await withContext(program.opts<GlobalOptions>(), io, (context) => {
        const info = resolveFileInfo(path.resolve(io.cwd, target), context);
        try {
          renameFileInfo(info, name, context);
        } catch (error) {
          info.unref();
          throw error;
        }
        context.logger.info(`Renamed ${target} to ${name}`);
        io.stdout(info.path);
        return [info];
      });
    });

  program
    .command("plan")
    .description("Print the command that would launch a file")
    .argument("<path>", "Executable or desktop entry")
    .argument("[targets...]", "Files to pass to it")
    .action(async (target: string, targets: string[]) => {
      await withContext(program.opts<GlobalOptions>(), io, (context) => {
        const info = resolveFileInfo(path.resolve(io.cwd, target), context);
        try {
          const identities = targets.map((file) => FileIdentity.forPath(path.resolve(io.cwd, file)));
          io.stdout(formatLaunchPlan(buildLaunchPlan(info, identities, context)));
        } catch (error) {
          info.unref();
          throw error;
        }
        return [info];
      });
    });

  return program;
}

/**
 * Main CLI execution. Resolves to the process exit code.
 */
export async function runCLI(
  argv: string[] = process.argv,
  io: CLIEnvironment = processEnvironment
): Promise<number> {
  try {
    await createProgram(io).parseAsync(argv);
    return 0;
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    io.stderr(`Error: ${formatError(err)}`);
    return 1;
  }
}

function isMainModule(): boolean {
  try {
    return fileURLToPath(import.meta.url) === realpathSync(process.argv[1]);
  } catch {
    return false;
  }
}

// The bin entry may be a symlink, so compare real paths; tests import this module
if (!process.env.VITEST && isMainModule()) {
  runCLI().then((code) => {
    process.exitCode = code;
  }).catch((err) => {
    console.error(err);
    process.exit(1);
  });
}
