// Copyright 2024 The node-webcodecs Authors
// SPDX-License-Identifier: MIT

import {UsageError} from '../errors';

export interface ParsedArgs {
  readonly positional: string[];
  readonly flags: Record<string, string>;
}

/**
 * Parses `--key=value`, `--key value` and bare `--flag` (stored as 'true').
 * `aliases` maps single-dash short names to long keys, e.g. `{c: 'configuration'}`.
 */
export function parseArgs(argv: string[], aliases: Record<string, string> = {}): ParsedArgs {
  const positional: string[] = [];
  const flags: Record<string, string> = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    let body: string;
    if (arg.startsWith('--')) {
      body = arg.slice(2);
    } else if (arg.startsWith('-') && arg.length > 1) {
      const [short, ...rest] = arg.slice(1).split('=');
      const long = aliases[short] ?? short;
      body = rest.length > 0 ? `${long}=${rest.join('=')}` : long;
    } else {
      positional.push(arg);
      continue;
    }

    const separator = body.indexOf('=');
    if (separator >= 0) {
      flags[body.slice(0, separator)] = body.slice(separator + 1);
      continue;
    }

    const next = argv[i + 1];
    if (next !== undefined && !next.startsWith('-')) {
      flags[body] = next;
      i++;
    } else {
      flags[body] = 'true';
    }
  }

  return {positional, flags};
}

export function requireFlag(flags: Record<string, string>, key: string): string {
  const value = flags[key];
  if (!value) {
    throw new UsageError(`Option '${key}' must be specified`);
  }
  return value;
}
