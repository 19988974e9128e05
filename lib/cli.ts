#!/usr/bin/env tsx
// Copyright 2024 The node-webcodecs Authors
// SPDX-License-Identifier: MIT
//
// Build WebRTC and package it for the CMake side.
//
// - Aggregates the generated libraries into a single one (simpler to link).
// - Produces webrtc-<version>[-<config>]-<platform>.tar.gz in the build dir.
// - Prints set(webrtc_LIBS ...) / set(webrtc_DEFS ...) on stdout.
//
// Usage:
//   webrtc-packager --platform=linux-x64 --source_dir=~/webrtc-checkout -c Release \
//     --version=20170131_ac61b745df8eb918e8a39368fec7d7c3a890f221
//
// Use the date and the WebRTC source revision as <version>, and the same
// version string on every platform. A source checkout cannot be shared between
// platforms: third_party is trimmed per host.

import {join, resolve} from 'node:path';
import {parseArgs, requireFlag} from './shared/args';
import {isMainModule, resolvePackageRoot} from './shared/runtime';
import {DEFAULT_RUNNER, type CommandRunner} from './shared/runner';
import {CommandFailedError, UsageError} from './errors';
import {
  defaultPlatform,
  detectHostOs,
  expandConfiguration,
  isConfiguration,
  type HostOs,
} from './platform';
import {trimThirdParty} from './third-party-trimmer';
import {runBuild} from './build-driver';
import {buildPackage, type PackageDescriptor, type PackageResult} from './packager';
import {extractBuildSettings, renderManifest, type BuildManifest} from './build-descriptor';
import {logDebug, logError, logInfo} from './logger';

/**
 * Everything a run needs. Replaces process-wide directory globals so each
 * step can be pointed at a temp tree.
 */
export interface RunConfig extends PackageDescriptor {
  readonly host: HostOs;
}

export interface RunOutcome {
  readonly result: PackageResult;
  readonly manifest: BuildManifest;
}

export interface CliEnvironment {
  readonly runner: CommandRunner;
  readonly env: NodeJS.ProcessEnv;
  readonly host: HostOs;
  readonly cwd: string;
  /** Receives the manifest text. */
  readonly write: (text: string) => void;
}

const ALIASES: Record<string, string> = {c: 'configuration', h: 'help'};

const OPTION_KEYS = ['source_dir', 'build_dir', 'version', 'platform', 'configuration'] as const;

type OptionKey = (typeof OPTION_KEYS)[number];

function isOptionKey(key: string): key is OptionKey {
  return OPTION_KEYS.some(known => known === key);
}

function defaultEnvironment(): CliEnvironment {
  return {
    runner: DEFAULT_RUNNER,
    env: process.env,
    host: detectHostOs(process.platform),
    cwd: process.cwd(),
    write: text => {
      process.stdout.write(text);
    },
  };
}

/**
 * Default for --source_dir: `WEBRTC_SOURCE_DIR`, else the directory above
 * this package (the packager is normally checked out inside the WebRTC tree).
 */
export function defaultSourceDir(env: NodeJS.ProcessEnv): string {
  if (env.WEBRTC_SOURCE_DIR) {
    return resolve(env.WEBRTC_SOURCE_DIR);
  }
  return resolve(resolvePackageRoot(), '..');
}

export function printUsage(log: (line: string) => void = console.log): void {
  log('Usage: webrtc-packager [options]');
  log('Options:');
  log("  --source_dir=<dir>      WebRTC checkout (containing 'src')");
  log("  --build_dir=<dir>       Build directory (containing 'Debug' and/or 'Release'); default: cwd");
  log('  --version=<name>        Package version, e.g. <date>_<webrtc revision> (required)');
  log('  --platform=<name>       linux-x64, win32, osx, linux-android-armeabi-v7a, ...');
  log('  -c, --configuration=<c> Debug, Release or Both (default: Both)');
  log('  -h, --help              Show this message');
}

/**
 * Resolves command line options against defaults. Throws `UsageError` for
 * unknown options and for missing or invalid values.
 */
export function resolveRunConfig(
  args: string[],
  env: NodeJS.ProcessEnv,
  host: HostOs,
  cwd: string,
): RunConfig {
  const {flags} = parseArgs(args, ALIASES);
  for (const key of Object.keys(flags)) {
    if (!isOptionKey(key) && key !== 'help') {
      throw new UsageError(`Unknown option '--${key}'`);
    }
  }

  const merged: Record<string, string> = {
    source_dir: defaultSourceDir(env),
    build_dir: cwd,
    platform: defaultPlatform(host) ?? '',
    configuration: 'Both',
    ...flags,
  };

  const sourceDir = requireFlag(merged, 'source_dir');
  const version = requireFlag(merged, 'version');
  const platform = requireFlag(merged, 'platform');
  const configuration = merged.configuration;
  if (!isConfiguration(configuration)) {
    throw new UsageError(`Invalid configuration '${configuration}' (expected Debug, Release or Both)`);
  }

  logInfo('Options values:');
  for (const key of OPTION_KEYS) {
    logInfo(`--${key}=${merged[key]}`);
  }

  return {
    sourceRoot: resolve(cwd, sourceDir),
    buildRoot: resolve(cwd, merged.build_dir),
    version,
    platform,
    configuration,
    host,
  };
}

/**
 * Trim → build → package → extract. Throws on the first failing step.
 */
export function run(runner: CommandRunner, config: RunConfig, write: (text: string) => void): RunOutcome {
  const srcDir = join(config.sourceRoot, 'src');

  trimThirdParty({srcDir, host: config.host});

  for (const configuration of expandConfiguration(config.configuration)) {
    runBuild(runner, {buildRoot: config.buildRoot, configuration, host: config.host, srcDir});
  }

  const result = buildPackage(runner, config);
  logInfo(`Package ready: ${join(config.buildRoot, result.archiveName)}`);

  const manifest = extractBuildSettings(config, result.mergedStaticLibrary);
  write(renderManifest(manifest));
  logInfo(`Unused defs: ${manifest.unusedDefines.join(' ')}`);

  return {result, manifest};
}

export function main(args: string[], environment: CliEnvironment = defaultEnvironment()): number {
  const {flags} = parseArgs(args, ALIASES);
  if (flags.help) {
    printUsage();
    return 0;
  }

  try {
    const config = resolveRunConfig(args, environment.env, environment.host, environment.cwd);
    run(environment.runner, config, environment.write);
    return 0;
  } catch (error) {
    if (error instanceof UsageError) {
      logError(error.message);
      printUsage(console.error);
      return 2;
    }
    if (error instanceof CommandFailedError) {
      logError(error.message);
      return 1;
    }
    const message = error instanceof Error ? error.message : String(error);
    logError(message);
    if (error instanceof Error && error.stack) {
      logDebug(error.stack, environment.env);
    }
    return 1;
  }
}

if (isMainModule(import.meta.url)) {
  process.exit(main(process.argv.slice(2)));
}
