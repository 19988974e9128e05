// Copyright 2024 The node-webcodecs Authors
// SPDX-License-Identifier: MIT

import {existsSync, readdirSync, realpathSync, statSync} from 'node:fs';
import {join, relative} from 'node:path';

/**
 * A filename suffix (`'.h'`, `'LICENSE'`) or a pattern tested against the bare
 * filename.
 */
export type FileMatcher = string | RegExp;

export function matchesAny(filename: string, matchers: readonly FileMatcher[]): boolean {
  return matchers.some(matcher =>
    typeof matcher === 'string' ? filename.endsWith(matcher) : matcher.test(filename),
  );
}

function isDirectory(pathname: string): boolean {
  try {
    return statSync(pathname).isDirectory();
  } catch {
    // Broken or self-referencing links count as files.
    return false;
  }
}

function walk(
  rootDir: string,
  dir: string,
  matchers: readonly FileMatcher[],
  ancestors: Set<string>,
  found: string[],
): void {
  // A directory already on the current path is a loop. Aliases elsewhere are walked.
  const real = realpathSync(dir);
  if (ancestors.has(real)) {
    return;
  }
  ancestors.add(real);

  for (const entry of readdirSync(dir, {withFileTypes: true})) {
    const pathname = join(dir, entry.name);
    const directory = entry.isSymbolicLink() ? isDirectory(pathname) : entry.isDirectory();
    if (directory) {
      walk(rootDir, pathname, matchers, ancestors, found);
      continue;
    }
    if (matchesAny(entry.name, matchers)) {
      found.push(relative(rootDir, pathname));
    }
  }
  ancestors.delete(real);
}

/**
 * Recursively collects files under `rootDir` whose name matches at least one
 * matcher. Symbolic links are followed. Paths are relative to `rootDir` and come
 * back in traversal order; a directory reachable through several links is
 * reported under each of them.
 */
export function collectFiles(rootDir: string, matchers: readonly FileMatcher[]): string[] {
  if (!existsSync(rootDir)) {
    return [];
  }
  const found: string[] = [];
  walk(rootDir, rootDir, matchers, new Set(), found);
  return found;
}

export function excludeMarked(paths: readonly string[], marker: string): string[] {
  return paths.filter(pathname => !pathname.includes(marker));
}
