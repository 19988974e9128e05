// Copyright 2024 The node-webcodecs Authors
// SPDX-License-Identifier: MIT
//
// Assemble the package directory for one platform and archive it.
//
// Layout:
//   <versionName>/lib/          Release (or the single requested configuration)
//   <versionName>/debug_lib/    Debug, only when packaging Both
//   <versionName>/include/<subdir>/...
//   <versionName>/licenses/<subdir>/...

import {join} from 'node:path';
import {removeDir} from './shared/fs';
import type {CommandRunner} from './shared/runner';
import {collectFiles, excludeMarked, type FileMatcher} from './file-collector';
import {copyFiles} from './file-copier';
import {mergeLibraries} from './library-merger';
import {buildOutputDir} from './build-driver';
import {
  GENERIC_LIBRARY_MATCHERS,
  libraryProfile,
  type BuildConfiguration,
  type Configuration,
  type Platform,
} from './platform';
import {logInfo} from './logger';

export const PRODUCT_NAME = 'webrtc';

export interface PackageDescriptor {
  readonly platform: Platform;
  /** Conventionally `<date>_<source revision>`. */
  readonly version: string;
  readonly configuration: Configuration;
  /** Checkout root; sources live in its `src` directory. */
  readonly sourceRoot: string;
  /** Holds `Debug/` and `Release/` build output. */
  readonly buildRoot: string;
}

export interface PackageResult {
  readonly packageDir: string;
  readonly versionName: string;
  readonly archiveName: string;
  /** File name of the consolidated library, or null when none was produced. */
  readonly mergedStaticLibrary: string | null;
}

/** Source subdirectories whose headers and licenses ship in the package. */
export const SUPPORT_SUBDIRS = ['webrtc', 'third_party'] as const;

export const HEADER_MATCHERS: readonly FileMatcher[] = ['.h', '.hpp', '.h.def'];

export const LICENSE_MATCHERS: readonly FileMatcher[] = ['LICENSE', 'COPYING', 'LICENSE_THIRD_PARTY', 'PATENTS'];

const EXAMPLES_MARKER = 'examples';

export function versionName(version: string, configuration: Configuration): string {
  return configuration === 'Both' ? version : `${version}-${configuration}`;
}

export function archiveName(name: string, platform: Platform): string {
  return `${PRODUCT_NAME}-${name}-${platform}.tar.gz`;
}

/**
 * Fills `<packageDir>/<libSubdir>` from one configuration's build output.
 * Returns the merged library's file name, if the platform merges.
 */
export function packageLibraries(
  runner: CommandRunner,
  descriptor: PackageDescriptor,
  configuration: BuildConfiguration,
  packageDir: string,
  libSubdir: string,
): string | null {
  const outDir = buildOutputDir(descriptor.buildRoot, configuration);
  const libDir = join(packageDir, libSubdir);
  const profile = libraryProfile(descriptor.platform);

  if (!profile) {
    const libs = collectFiles(outDir, GENERIC_LIBRARY_MATCHERS);
    copyFiles(outDir, libDir, libs);
    return null;
  }

  let inputs = collectFiles(outDir, profile.mergeInputs);
  if (profile.excludeExamples) {
    inputs = excludeMarked(inputs, EXAMPLES_MARKER);
  }
  // One full archive instead of gn's thin ones; link order stops mattering too.
  mergeLibraries(runner, profile.mergeStrategy, inputs, outDir, join(libDir, profile.mergedLibraryName));

  copyFiles(outDir, libDir, collectFiles(outDir, profile.copied), false);
  return profile.mergedLibraryName;
}

/**
 * Copies headers into `include/` and license files into `licenses/`.
 */
export function packageSupportFiles(sourceRoot: string, packageDir: string): void {
  for (const subdir of SUPPORT_SUBDIRS) {
    const src = join(sourceRoot, 'src', subdir);

    const headers = collectFiles(src, HEADER_MATCHERS);
    copyFiles(src, join(packageDir, 'include', subdir), headers);

    const licenses = collectFiles(src, LICENSE_MATCHERS);
    copyFiles(src, join(packageDir, 'licenses', subdir), licenses);
  }
}

export function makePackageArchive(
  runner: CommandRunner,
  buildRoot: string,
  name: string,
  platform: Platform,
): string {
  const archive = archiveName(name, platform);
  logInfo(`Creating ${join(buildRoot, archive)}`);
  runner.runOrThrow('cmake', ['-E', 'tar', 'cvzf', archive, name], {
    cwd: buildRoot,
    stdio: 'stderr',
  });
  return archive;
}

export function buildPackage(runner: CommandRunner, descriptor: PackageDescriptor): PackageResult {
  const name = versionName(descriptor.version, descriptor.configuration);
  const packageDir = join(descriptor.buildRoot, name);
  removeDir(packageDir);

  let mergedStaticLibrary: string | null;
  if (descriptor.configuration === 'Both') {
    mergedStaticLibrary = packageLibraries(runner, descriptor, 'Release', packageDir, 'lib');
    packageLibraries(runner, descriptor, 'Debug', packageDir, 'debug_lib');
  } else {
    mergedStaticLibrary = packageLibraries(runner, descriptor, descriptor.configuration, packageDir, 'lib');
  }

  packageSupportFiles(descriptor.sourceRoot, packageDir);
  const archive = makePackageArchive(runner, descriptor.buildRoot, name, descriptor.platform);

  return {packageDir, versionName: name, archiveName: archive, mergedStaticLibrary};
}
