// Copyright 2024 The node-webcodecs Authors
// SPDX-License-Identifier: MIT

import {
  runCommand,
  runCommandOrThrow,
  type CommandOptions,
  type CommandResult,
} from './exec';

export interface CommandRunner {
  readonly run: (command: string, args: string[], options?: CommandOptions) => CommandResult;
  readonly runOrThrow: (command: string, args: string[], options?: CommandOptions) => CommandResult;
}

export const DEFAULT_RUNNER: CommandRunner = {
  run: runCommand,
  runOrThrow: runCommandOrThrow,
};
