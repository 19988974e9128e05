// Copyright 2024 The node-webcodecs Authors
// SPDX-License-Identifier: MIT
//
// Recover link libraries and compiler defines from a generated .ninja file
// and print them as CMake variables for the consuming project.

import {readFileSync, readdirSync, type Dirent} from 'node:fs';
import {join} from 'node:path';
import {matchesAny, type FileMatcher} from './file-collector';
import type {Configuration, Platform} from './platform';
import type {PackageDescriptor} from './packager';
import {logDebug, logInfo} from './logger';

export interface BuildManifest {
  readonly libraries: string[];
  /** Full `-D...` strings that appear to be used by the sources. */
  readonly defines: string[];
  readonly unusedDefines: string[];
}

const CONTINUATION = '$';

const LIBRARY_MATCHERS: readonly FileMatcher[] = ['.lib', '.dll', '.a', '.so'];

const DEFINES_PATTERN = /^\s*defines\s*=\s*(.*)/;

export const CMAKE_LIBS_VARIABLE = 'webrtc_LIBS';
export const CMAKE_DEFS_VARIABLE = 'webrtc_DEFS';

export function descriptorPath(buildRoot: string, platform: Platform, configuration: Configuration): string {
  const file =
    platform === 'osx'
      ? join('obj', 'webrtc', 'webrtc_common.ninja')
      : join('obj', 'webrtc', 'examples', 'peerconnection_client.ninja');
  const config = configuration === 'Both' ? 'Release' : configuration;
  return join(buildRoot, config, file);
}

/**
 * Joins physical lines ending in `$` with the lines that follow, up to and
 * including the first line without the marker.
 */
export function joinContinuationLines(lines: readonly string[]): string[] {
  const logical: string[] = [];
  let acc: string | null = null;
  for (const line of lines) {
    const continues = line.endsWith(CONTINUATION);
    const text = continues ? line.slice(0, -CONTINUATION.length) : line;
    acc = acc === null ? text : acc + text;
    if (!continues) {
      logical.push(acc);
      acc = null;
    }
  }
  if (acc !== null) {
    logical.push(acc);
  }
  return logical;
}

function tokens(line: string): string[] {
  return line.split(/\s+/).filter(token => token.length > 0);
}

/**
 * Any token that looks like a library file, which also catches libraries
 * passed through ldflags. Works on raw lines, not joined ones.
 */
export function extractLibraries(lines: readonly string[]): string[] {
  const libs = new Set<string>();
  for (const line of lines) {
    for (const token of tokens(line)) {
      if (matchesAny(token, LIBRARY_MATCHERS)) {
        libs.add(token);
      }
    }
  }
  return [...libs];
}

export function extractDefines(logicalLines: readonly string[]): string[] {
  const defines = new Set<string>();
  for (const line of logicalLines) {
    const match = DEFINES_PATTERN.exec(line);
    if (!match) {
      continue;
    }
    for (const token of tokens(match[1])) {
      defines.add(token);
    }
  }
  return [...defines];
}

/**
 * `-DFOO=1` -> `FOO`.
 */
export function defineName(define: string): string {
  return define.replace(/-D(\w+).*/, '$1');
}

function readText(pathname: string): string | null {
  try {
    return readFileSync(pathname, 'utf8');
  } catch {
    return null;
  }
}

function scanDirectory(dir: string, remaining: Map<string, string>, used: Set<string>): void {
  let entries: Dirent[];
  try {
    entries = readdirSync(dir, {withFileTypes: true});
  } catch {
    return;
  }
  for (const entry of entries) {
    if (remaining.size === 0) {
      return;
    }
    const pathname = join(dir, entry.name);
    if (entry.isDirectory()) {
      scanDirectory(pathname, remaining, used);
      continue;
    }
    const content = readText(pathname);
    if (content === null) {
      continue;
    }
    for (const [name, define] of remaining) {
      if (content.includes(name)) {
        used.add(define);
        remaining.delete(name);
      }
    }
  }
}

/**
 * Keeps the defines whose name occurs somewhere under `dirs`. A define counts
 * as used as soon as one file mentions it, and is not searched for again.
 * This is a textual heuristic; it does not prove the define affects the build.
 */
export function filterUsedDefines(
  dirs: readonly string[],
  defines: readonly string[],
): {used: string[]; unused: string[]} {
  // Later defines with the same name win.
  const remaining = new Map<string, string>();
  for (const define of defines) {
    remaining.set(defineName(define), define);
  }
  // Earlier duplicates are superseded and land in neither list.
  const winners = new Set(remaining.values());

  const usedSet = new Set<string>();
  for (const dir of dirs) {
    scanDirectory(dir, remaining, usedSet);
  }

  const used = defines.filter(define => usedSet.has(define));
  const unused = defines.filter(define => winners.has(define) && !usedSet.has(define));
  return {used, unused};
}

export function parseBuildDescriptor(content: string): {libraries: string[]; defines: string[]} {
  const lines = content.split(/\r?\n/);
  return {
    libraries: extractLibraries(lines),
    defines: extractDefines(joinContinuationLines(lines)),
  };
}

export function extractBuildSettings(
  descriptor: PackageDescriptor,
  mergedStaticLibrary: string | null,
): BuildManifest {
  const config = descriptor.configuration === 'Both' ? 'Release' : descriptor.configuration;
  logInfo(`Retrieving build settings configuration for ${config}`);

  const path = descriptorPath(descriptor.buildRoot, descriptor.platform, descriptor.configuration);
  logDebug(`build descriptor -> ${path}`);
  const parsed = parseBuildDescriptor(readFileSync(path, 'utf8'));

  const srcDir = join(descriptor.sourceRoot, 'src');
  const {used, unused} = filterUsedDefines([join(srcDir, 'third_party'), join(srcDir, 'webrtc')], parsed.defines);

  return {
    libraries: mergedStaticLibrary ? [mergedStaticLibrary] : parsed.libraries,
    defines: used,
    unusedDefines: unused,
  };
}

function cmakeList(variable: string, values: readonly string[]): string {
  return [`set(${variable}`, ...values.map(value => `  ${value}`), ')'].join('\n');
}

export function renderManifest(manifest: BuildManifest): string {
  return `${cmakeList(CMAKE_LIBS_VARIABLE, manifest.libraries)}\n${cmakeList(CMAKE_DEFS_VARIABLE, manifest.defines)}\n`;
}
