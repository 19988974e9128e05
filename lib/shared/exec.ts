// Copyright 2024 The node-webcodecs Authors
// SPDX-License-Identifier: MIT

import {spawnSync, type StdioOptions} from 'node:child_process';
import {CommandFailedError} from '../errors';

export interface CommandResult {
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number;
}

/**
 * `stderr` forwards the child's stdout and stderr to our stderr, keeping
 * stdout free for the manifest.
 */
export type StdioMode = 'inherit' | 'pipe' | 'stderr';

export interface CommandOptions {
  readonly cwd?: string;
  readonly env?: NodeJS.ProcessEnv;
  readonly stdio?: StdioMode;
  /** Written to the child's stdin. */
  readonly input?: string;
  /**
   * Run through the system shell, for tools shipped as batch files on Windows.
   * Arguments are quoted with `quoteShellArg`.
   */
  readonly shell?: boolean;
}

const SHELL_SAFE = /^[\w@%+=:,./\\-]+$/;

/**
 * Quotes one argument for a shell command line, following the Windows C
 * runtime rules: backslashes are literal unless they precede a quote.
 */
export function quoteShellArg(arg: string): string {
  if (SHELL_SAFE.test(arg)) {
    return arg;
  }
  const escaped = arg.replace(/(\\*)"/g, '$1$1\\"').replace(/(\\+)$/, '$1$1');
  return `"${escaped}"`;
}

function resolveStdio(mode: StdioMode, hasInput: boolean): StdioOptions {
  const stdin = hasInput ? 'pipe' : 'inherit';
  if (mode === 'stderr') {
    return [stdin, 2, 2];
  }
  if (mode === 'inherit') {
    return [stdin, 'inherit', 'inherit'];
  }
  return 'pipe';
}

export function runCommand(
  command: string,
  args: string[],
  options: CommandOptions = {},
): CommandResult {
  const shell = options.shell ?? false;
  const result = spawnSync(command, shell ? args.map(quoteShellArg) : args, {
    cwd: options.cwd,
    shell,
    env: options.env,
    input: options.input,
    stdio: resolveStdio(options.stdio ?? 'pipe', options.input !== undefined),
    encoding: 'utf8',
  });

  if (result.error) {
    throw result.error;
  }

  return {
    stdout: typeof result.stdout === 'string' ? result.stdout : '',
    stderr: typeof result.stderr === 'string' ? result.stderr : '',
    exitCode: result.status ?? 1,
  };
}

export function runCommandOrThrow(
  command: string,
  args: string[],
  options: CommandOptions = {},
): CommandResult {
  const result = runCommand(command, args, options);
  if (result.exitCode !== 0) {
    throw new CommandFailedError(command, args, result.exitCode);
  }
  return result;
}
