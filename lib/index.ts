// Copyright 2024 The node-webcodecs Authors
// SPDX-License-Identifier: MIT
//
// Programmatic entry point. The CLI in ./cli wires these steps together.

export {
  configurations,
  defaultPlatform,
  detectHostOs,
  expandConfiguration,
  isConfiguration,
  isKnownPlatform,
  knownPlatforms,
  libraryProfile,
  GENERIC_LIBRARY_MATCHERS,
  MERGED_LIBRARY_BASENAME,
} from './platform';
export type {
  BuildConfiguration,
  Configuration,
  HostOs,
  KnownPlatform,
  LibraryProfile,
  MergeStrategy,
  Platform,
} from './platform';

export {collectFiles, excludeMarked, matchesAny} from './file-collector';
export type {FileMatcher} from './file-collector';

export {copyFiles} from './file-copier';

export {archiverScript, mergeLibraries, writeResponseFile} from './library-merger';

export {buildOutputDir, gnArgs, runBuild} from './build-driver';
export type {BuildOptions} from './build-driver';

export {thirdPartyAllowList, trimThirdParty} from './third-party-trimmer';
export type {TrimOptions, TrimResult} from './third-party-trimmer';

export {
  archiveName,
  buildPackage,
  makePackageArchive,
  packageLibraries,
  packageSupportFiles,
  versionName,
  HEADER_MATCHERS,
  LICENSE_MATCHERS,
  PRODUCT_NAME,
  SUPPORT_SUBDIRS,
} from './packager';
export type {PackageDescriptor, PackageResult} from './packager';

export {
  defineName,
  descriptorPath,
  extractBuildSettings,
  extractDefines,
  extractLibraries,
  filterUsedDefines,
  joinContinuationLines,
  parseBuildDescriptor,
  renderManifest,
  CMAKE_DEFS_VARIABLE,
  CMAKE_LIBS_VARIABLE,
} from './build-descriptor';
export type {BuildManifest} from './build-descriptor';

export {main, resolveRunConfig, run} from './cli';
export type {CliEnvironment, RunConfig, RunOutcome} from './cli';

export {CommandFailedError, ErrorCode, PackagerError, UsageError, isPackagerError} from './errors';
export type {ErrorCodeType} from './errors';

export {DEFAULT_RUNNER} from './shared/runner';
export type {CommandRunner} from './shared/runner';
export type {CommandOptions, CommandResult, StdioMode} from './shared/exec';
