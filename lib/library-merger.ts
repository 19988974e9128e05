// Copyright 2024 The node-webcodecs Authors
// SPDX-License-Identifier: MIT
//
// Merge many object files or static libraries into one static library using
// the platform's archiver. Input order is kept exactly as given.

import {mkdtempSync, writeFileSync} from 'node:fs';
import {tmpdir} from 'node:os';
import {dirname, join, resolve} from 'node:path';
import {ensureDir} from './shared/fs';
import type {CommandRunner} from './shared/runner';
import type {MergeStrategy} from './platform';
import {logInfo} from './logger';

/**
 * Script fed to `ar -M` on stdin.
 */
export function archiverScript(libs: readonly string[], srcDir: string, destination: string): string {
  const lines = [`create ${destination}`];
  for (const lib of libs) {
    lines.push(`addmod ${join(srcDir, lib)}`);
  }
  lines.push('save', 'end');
  return `${lines.join('\n')}\n`;
}

function mergeWithArchiverScript(
  runner: CommandRunner,
  libs: readonly string[],
  srcDir: string,
  destination: string,
): void {
  runner.runOrThrow('ar', ['-M'], {
    input: archiverScript(libs, srcDir, destination),
    stdio: 'stderr',
  });
}

/**
 * Writes the `-filelist` response file for libtool. It lives in its own temp
 * directory and is left for the OS to clean up.
 */
export function writeResponseFile(libs: readonly string[], srcDir: string): string {
  const rspDir = mkdtempSync(join(tmpdir(), 'webrtc-merge-'));
  const rspPath = join(rspDir, 'inputs.rsp');
  writeFileSync(rspPath, libs.map(lib => resolve(srcDir, lib)).join('\n'));
  return rspPath;
}

function mergeWithFileList(
  runner: CommandRunner,
  libs: readonly string[],
  srcDir: string,
  destination: string,
): void {
  const rspPath = writeResponseFile(libs, srcDir);
  runner.runOrThrow('libtool', ['-static', '-o', destination, '-filelist', rspPath], {
    stdio: 'stderr',
  });
}

function mergeWithDirectArguments(
  runner: CommandRunner,
  libs: readonly string[],
  srcDir: string,
  destination: string,
): void {
  runner.runOrThrow('lib.exe', [`/OUT:${destination}`, ...libs.map(lib => join(srcDir, lib))], {
    stdio: 'stderr',
  });
}

/**
 * Produces one static library at `destination` from `libs` (relative to
 * `srcDir`). Throws `CommandFailedError` when the archiver fails.
 */
export function mergeLibraries(
  runner: CommandRunner,
  strategy: MergeStrategy,
  libs: readonly string[],
  srcDir: string,
  destination: string,
): void {
  ensureDir(dirname(destination));
  logInfo(`Merging ${libs.length} files into ${destination} (${strategy})`);

  switch (strategy) {
    case 'archiver-script':
      mergeWithArchiverScript(runner, libs, srcDir, destination);
      return;
    case 'file-list':
      mergeWithFileList(runner, libs, srcDir, destination);
      return;
    case 'direct-argument':
      mergeWithDirectArguments(runner, libs, srcDir, destination);
      return;
  }
}
