// Copyright 2024 The node-webcodecs Authors
// SPDX-License-Identifier: MIT
//
// Generate ninja files with gn and build them.

import {join} from 'node:path';
import type {CommandRunner} from './shared/runner';
import type {BuildConfiguration, HostOs} from './platform';
import {logInfo} from './logger';

export interface BuildOptions {
  /** Holds one output directory per configuration. */
  readonly buildRoot: string;
  readonly configuration: BuildConfiguration;
  readonly host: HostOs;
  /** The checkout's `src` directory; gn and ninja run from here. */
  readonly srcDir: string;
}

const NINJA_JOBS = 5;

export function gnArgs(configuration: BuildConfiguration, host: HostOs): string[] {
  const args = [
    `is_debug=${configuration === 'Debug' ? 'true' : 'false'}`,
    'rtc_include_tests=false',
    'use_rtti=true',
  ];

  if (host === 'mac') {
    args.push('is_component_build=false', 'libyuv_include_tests=false', 'rtc_enable_protobuf=false');
    return args;
  }

  args.push(
    'rtc_enable_protobuf=false',
    'rtc_use_openmax_dl=false',
    'is_clang=false',
    'use_sysroot=false',
    'rtc_use_gtk=false',
  );
  if (host === 'windows') {
    args.push('target_cpu="x86"');
  }
  return args;
}

export function buildOutputDir(buildRoot: string, configuration: BuildConfiguration): string {
  return join(buildRoot, configuration);
}

export function runBuild(runner: CommandRunner, options: BuildOptions): void {
  const outDir = buildOutputDir(options.buildRoot, options.configuration);
  const args = gnArgs(options.configuration, options.host);

  logInfo(`Generating ${options.configuration} build in ${outDir}`);
  // depot_tools ships gn as gn.bat on Windows, which only starts through the shell.
  runner.runOrThrow('gn', ['gen', outDir, `--args=${args.join(' ')}`], {
    cwd: options.srcDir,
    stdio: 'stderr',
    shell: options.host === 'windows',
  });

  logInfo(`Building ${options.configuration}`);
  runner.runOrThrow('ninja', [`-j${NINJA_JOBS}`, '-C', outDir], {
    cwd: options.srcDir,
    stdio: 'stderr',
  });
}
