/**
 * Exec Template Expansion
 *
 * Turns the `Exec` field of a desktop entry into an argument vector,
 * substituting the field codes with the launch targets.
 *
 * Field codes:
 * - `%f` / `%F`: first / every target as a local path
 * - `%u` / `%U`: first / every target as a URI
 * - `%i`: `--icon <Icon>` when the entry has an icon
 * - `%c`: the entry's (translated) name
 * - `%k`: path of the desktop file itself
 * - `%%`: a literal percent sign
 * - `%d %D %n %N %v %m`: deprecated, expand to nothing
 *
 * @module @filemeta/core/exec-template
 */

import * as shlex from 'shlex';
import { TemplateParseError } from './errors.js';

/**
 * A file handed to the launched program.
 */
export interface ExecTarget {
  path: string;
  uri: string;
}

export interface ExecTemplateOptions {
  targets?: readonly ExecTarget[];
  icon?: string;
  name?: string;
  /** Path of the desktop file, for `%k` */
  desktopFile?: string;
  /** Run inside a terminal emulator */
  terminal?: boolean;
  /** Command prefix used when `terminal` is set. Default: `['xterm', '-e']` */
  terminalCommand?: readonly string[];
}

export const DEFAULT_TERMINAL_COMMAND: readonly string[] = ['xterm', '-e'];

const DEPRECATED_CODES = new Set(['d', 'D', 'n', 'N', 'v', 'm']);

/**
 * Split a template into arguments.
 *
 * @throws TemplateParseError on unbalanced quoting
 */
function tokenize(template: string): string[] {
  try {
    return shlex.split(template);
  } catch (error) {
    throw new TemplateParseError(
      error instanceof Error ? error.message : String(error),
      template
    );
  }
}

/**
 * Expand the field codes of a single argument.
 * Returns the resulting arguments; a field code standing alone that has
 * nothing to expand to yields no argument at all.
 */
function expandArgument(arg: string, options: ExecTemplateOptions, template: string): string[] {
  const targets = options.targets ?? [];

  // Codes that stand alone may expand to zero or several arguments
  switch (arg) {
    case '%F':
      return targets.map((target) => target.path);
    case '%U':
      return targets.map((target) => target.uri);
    case '%f':
      return targets.length > 0 ? [targets[0].path] : [];
    case '%u':
      return targets.length > 0 ? [targets[0].uri] : [];
    case '%i':
      return options.icon ? ['--icon', options.icon] : [];
    case '%c':
      return options.name ? [options.name] : [];
    case '%k':
      return options.desktopFile ? [options.desktopFile] : [];
  }
  if (arg.length === 2 && arg[0] === '%' && DEPRECATED_CODES.has(arg[1])) {
    return [];
  }

  let result = '';
  for (let i = 0; i < arg.length; i++) {
    const ch = arg[i];
    if (ch !== '%') {
      result += ch;
      continue;
    }
    if (i === arg.length - 1) {
      throw new TemplateParseError('Trailing "%" at end of argument', template);
    }
    const code = arg[++i];
    switch (code) {
      case '%':
        result += '%';
        break;
      case 'f':
        result += targets[0]?.path ?? '';
        break;
      case 'F':
        result += targets.map((target) => target.path).join(' ');
        break;
      case 'u':
        result += targets[0]?.uri ?? '';
        break;
      case 'U':
        result += targets.map((target) => target.uri).join(' ');
        break;
      case 'i':
        result += options.icon ? `--icon ${options.icon}` : '';
        break;
      case 'c':
        result += options.name ?? '';
        break;
      case 'k':
        result += options.desktopFile ?? '';
        break;
      default:
        if (!DEPRECATED_CODES.has(code)) {
          throw new TemplateParseError(`Unknown field code "%${code}"`, template);
        }
    }
  }
  return [result];
}

/**
 * Expand an Exec template into an argument vector.
 *
 * @example
 * expandExecTemplate('gimp %F', { targets: [{ path: '/tmp/a b.png', uri: 'file:///tmp/a%20b.png' }] })
 * // → ['gimp', '/tmp/a b.png']
 *
 * @throws TemplateParseError on bad quoting, an unknown field code or an
 *   empty command
 */
export function expandExecTemplate(template: string, options: ExecTemplateOptions = {}): string[] {
  const argv = tokenize(template).flatMap((arg) => expandArgument(arg, options, template));

  if (argv.length === 0) {
    throw new TemplateParseError('Empty command', template);
  }

  if (options.terminal) {
    return [...(options.terminalCommand ?? DEFAULT_TERMINAL_COMMAND), ...argv];
  }
  return argv;
}

/**
 * Quote a path so it survives `expandExecTemplate` as a single literal argument.
 */
export function quoteExecArgument(value: string): string {
  return shlex.quote(value.replace(/%/g, '%%'));
}
