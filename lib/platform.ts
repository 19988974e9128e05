// Copyright 2024 The node-webcodecs Authors
// SPDX-License-Identifier: MIT
//
// Platform tags and per-platform library layout.

import type {FileMatcher} from './file-collector';

/**
 * Platforms with a dedicated library layout. Any other string is accepted and
 * packaged through the generic copy branch.
 */
export const knownPlatforms = ['linux-x64', 'win32', 'osx', 'linux-android-armeabi-v7a'] as const;

export type KnownPlatform = (typeof knownPlatforms)[number];

// `string & {}` keeps editor completion for the known tags.
export type Platform = KnownPlatform | (string & {});

export const configurations = ['Debug', 'Release', 'Both'] as const;

export type Configuration = (typeof configurations)[number];

export type BuildConfiguration = Exclude<Configuration, 'Both'>;

export type HostOs = 'windows' | 'linux' | 'mac' | 'other';

export type MergeStrategy = 'archiver-script' | 'file-list' | 'direct-argument';

export interface LibraryProfile {
  readonly mergeStrategy: MergeStrategy;
  /** Files merged into the consolidated static library. */
  readonly mergeInputs: readonly FileMatcher[];
  /** Drop merge inputs whose relative path contains `examples`. */
  readonly excludeExamples: boolean;
  readonly mergedLibraryName: string;
  /** Copied into the lib directory as-is, flattened. */
  readonly copied: readonly FileMatcher[];
}

/** Collected with paths preserved when a platform has no profile. */
export const GENERIC_LIBRARY_MATCHERS: readonly FileMatcher[] = ['.a', '.so', '.lib', '.dll'];

export const MERGED_LIBRARY_BASENAME = 'webrtc_all';

const LIBRARY_PROFILES: Record<KnownPlatform, LibraryProfile> = {
  'linux-x64': {
    mergeStrategy: 'archiver-script',
    mergeInputs: ['.o'],
    excludeExamples: true,
    mergedLibraryName: `${MERGED_LIBRARY_BASENAME}.a`,
    copied: ['.so'],
  },
  'linux-android-armeabi-v7a': {
    mergeStrategy: 'archiver-script',
    mergeInputs: ['.o'],
    excludeExamples: true,
    mergedLibraryName: `${MERGED_LIBRARY_BASENAME}.a`,
    copied: ['.so'],
  },
  osx: {
    mergeStrategy: 'file-list',
    mergeInputs: ['.o'],
    excludeExamples: true,
    mergedLibraryName: `${MERGED_LIBRARY_BASENAME}.a`,
    copied: ['.dylib'],
  },
  win32: {
    mergeStrategy: 'direct-argument',
    mergeInputs: ['.lib'],
    excludeExamples: false,
    mergedLibraryName: `${MERGED_LIBRARY_BASENAME}.lib`,
    // .dll plus .dll.lib, .dll.pdb and friends
    copied: [/.*\.dll.*/, '.pdb'],
  },
};

export function isKnownPlatform(platform: string): platform is KnownPlatform {
  return knownPlatforms.some(known => known === platform);
}

export function isConfiguration(value: string): value is Configuration {
  return configurations.some(known => known === value);
}

export function libraryProfile(platform: Platform): LibraryProfile | null {
  return isKnownPlatform(platform) ? LIBRARY_PROFILES[platform] : null;
}

export function detectHostOs(osName: NodeJS.Platform): HostOs {
  if (osName === 'win32') return 'windows';
  if (osName === 'linux') return 'linux';
  if (osName === 'darwin') return 'mac';
  return 'other';
}

/**
 * Default `--platform` for the machine the packager runs on.
 */
export function defaultPlatform(host: HostOs): Platform | null {
  if (host === 'windows') return 'win32';
  if (host === 'linux') return 'linux-x64';
  if (host === 'mac') return 'osx';
  return null;
}

/**
 * Configurations built and packaged for a requested configuration, in build order.
 */
export function expandConfiguration(configuration: Configuration): BuildConfiguration[] {
  return configuration === 'Both' ? ['Debug', 'Release'] : [configuration];
}
