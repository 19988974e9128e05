// Copyright 2024 The node-webcodecs Authors
// SPDX-License-Identifier: MIT

import {copyFileSync} from 'node:fs';
import {basename, dirname, join} from 'node:path';
import {ensureDir} from './shared/fs';
import {logDebug, logWarn} from './logger';

/**
 * Copies `files` (relative to `srcDir`) into `dstDir`. With `keepSrcPath` unset
 * only the basename is kept. A file that cannot be copied is reported and
 * skipped; the returned list holds the paths that made it.
 */
export function copyFiles(
  srcDir: string,
  dstDir: string,
  files: readonly string[],
  keepSrcPath = true,
): string[] {
  const copied: string[] = [];
  for (const file of files) {
    const source = join(srcDir, file);
    const dest = join(dstDir, keepSrcPath ? file : basename(file));
    try {
      ensureDir(dirname(dest));
      copyFileSync(source, dest);
      copied.push(file);
    } catch (error) {
      // e.g. third_party/libxslt/COPYING is a link to itself
      const message = error instanceof Error ? error.message : String(error);
      logWarn(`Could not copy "${source}"; skipping...`);
      logDebug(message);
    }
  }
  return copied;
}
