import { spawnSync } from 'node:child_process';
import { accessSync, constants, existsSync, statSync } from 'node:fs';
import { homedir } from 'node:os';
import { delimiter, join, resolve } from 'node:path';

/** Words the shell handles itself; never looked up on the search path */
const SHELL_BUILTINS = new Set([
  '[', '[[', 'test', 'cd', 'true', 'false', 'echo', 'printf', 'exit',
  'export', 'set', 'unset', ':', '.', 'source', 'eval', 'exec',
  'if', 'for', 'while', 'until', 'case', '{', '(', '!', 'command', 'type',
]);

/** Environment assignment prefix, e.g. `HOMEBREW_NO_ENV_HINTS=1` */
const ENV_ASSIGNMENT = /^[A-Za-z_][A-Za-z0-9_]*=\S*$/;

/**
 * A command name or path with nothing for the shell to interpret:
 * no quotes, subshells, globs, redirections or substitutions.
 */
const PLAIN_WORD = /^(?:~|\$HOME|\$\{HOME\})?[\w.+@%,/-]+$/;

/** sudo options whose value is the next word */
const SUDO_SHORT_WITH_ARG = new Set(['-u', '-g', '-h', '-p', '-C', '-D', '-r', '-t', '-U']);
const SUDO_LONG_WITH_ARG = new Set([
  '--user', '--group', '--host', '--prompt', '--close-from', '--chdir', '--role', '--type', '--other-user',
]);

function skipAssignments(words: readonly string[], from: number): number {
  let i = from;
  while (i < words.length && ENV_ASSIGNMENT.test(words[i] ?? '')) i++;
  return i;
}

function skipSudo(words: readonly string[], from: number): number {
  let i = from + 1;
  while (i < words.length) {
    const word = words[i] ?? '';
    if (word === '--') return i + 1;
    if (!word.startsWith('-')) break;
    i += SUDO_SHORT_WITH_ARG.has(word) || SUDO_LONG_WITH_ARG.has(word) ? 2 : 1;
  }
  return skipAssignments(words, i);
}

/**
 * Find the binary a command string targets, so its absence can be
 * detected before spawning.
 * Steps over environment assignments and a leading `sudo` with its options.
 * Returns null when there is no plain first word to check: an empty
 * command, or one starting with shell syntax (subshell, quotes, a glob).
 * Such commands are left to the shell.
 */
export function targetBinary(command: string): string | null {
  const words = command.trim().split(/\s+/).filter(Boolean);
  let i = skipAssignments(words, 0);
  if (words[i] === 'sudo') i = skipSudo(words, i);

  const word = words[i];
  if (word === undefined || !PLAIN_WORD.test(word)) return null;
  return word;
}

/** Expand a leading `~`, `$HOME` or `${HOME}` */
export function expandHome(path: string, home: string = homedir()): string {
  if (path === '~' || path.startsWith('~/')) return home + path.slice(1);
  if (path.startsWith('$HOME')) return home + path.slice('$HOME'.length);
  if (path.startsWith('${HOME}')) return home + path.slice('${HOME}'.length);
  return path;
}

function isExecutableFile(path: string): boolean {
  try {
    if (!statSync(path).isFile()) return false;
    accessSync(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Whether the binary is available on this host.
 * Builtins are always present; paths are checked directly (relative
 * ones against `cwd`); bare names are searched in every directory of
 * `searchPath`.
 */
export function isBinaryAvailable(
  binary: string,
  searchPath: string = process.env.PATH ?? '',
  cwd: string = process.cwd(),
): boolean {
  if (SHELL_BUILTINS.has(binary)) return true;

  if (binary.includes('/')) {
    return isExecutableFile(resolve(cwd, expandHome(binary)));
  }

  return searchPath
    .split(delimiter)
    .filter(Boolean)
    .some((dir) => isExecutableFile(join(expandHome(dir), binary)));
}

/**
 * Whether a full Xcode is installed. `xcrun` also ships with the
 * Command Line Tools, which lack simctl; only a developer directory
 * (from `xcode-select -p`) holding `usr/bin/simctl` counts.
 */
export function isXcodeAvailable(searchPath: string = process.env.PATH ?? ''): boolean {
  const result = spawnSync('xcode-select', ['-p'], {
    encoding: 'utf-8',
    env: { ...process.env, PATH: searchPath },
    timeout: 5000,
  });
  if (result.error || result.status !== 0) return false;

  const devDir = result.stdout.trim();
  return devDir !== '' && existsSync(devDir) && existsSync(join(devDir, 'usr', 'bin', 'simctl'));
}
