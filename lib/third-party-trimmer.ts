// Copyright 2024 The node-webcodecs Authors
// SPDX-License-Identifier: MIT
//
// Reduce src/third_party to the libraries WebRTC actually links.
//
// Three directories take part: third_party, third_party.old and
// third_party.new. The copy into .new only happens while .old is absent, and
// the .new -> third_party rename runs on every call, so an interrupted run is
// finished by running again. third_party.old is never deleted.

import {copyFileSync, cpSync, existsSync, renameSync, statSync} from 'node:fs';
import {basename, join} from 'node:path';
import {ensureDir, removeDir} from './shared/fs';
import type {HostOs} from './platform';
import {logInfo} from './logger';

export interface TrimOptions {
  readonly srcDir: string;
  readonly host: HostOs;
}

export interface TrimResult {
  /** Allow-listed entries were copied into third_party.new. */
  readonly copied: boolean;
  /** third_party.new was renamed to third_party. */
  readonly renamed: boolean;
}

const BASE_ALLOW_LIST = [
  'boringssl',
  'expat',
  'gflags',
  'jsoncpp',
  'libjpeg_turbo',
  'libsrtp',
  'libvpx',
  'libyuv',
  'opus',
  'protobuf',
  'usrsctp',
  'yasm',
];

const BUILD_FILE = 'BUILD.gn';

export function thirdPartyAllowList(host: HostOs): string[] {
  if (host === 'mac') {
    return [...BASE_ALLOW_LIST, 'llvm-build', 'openmax_dl', 'ocmock'];
  }
  if (host === 'windows') {
    return [...BASE_ALLOW_LIST, 'winsdk_samples'];
  }
  return [...BASE_ALLOW_LIST];
}

function isDirectory(pathname: string): boolean {
  return existsSync(pathname) && statSync(pathname).isDirectory();
}

function copyEntry(src: string, destDir: string): void {
  const dest = join(destDir, basename(src));
  if (isDirectory(src)) {
    cpSync(src, dest, {recursive: true, verbatimSymlinks: true});
  } else {
    copyFileSync(src, dest);
  }
}

export function trimThirdParty(options: TrimOptions): TrimResult {
  const thirdPartyDir = join(options.srcDir, 'third_party');
  const oldDir = join(options.srcDir, 'third_party.old');
  const newDir = join(options.srcDir, 'third_party.new');

  let copied = false;
  if (!isDirectory(oldDir) && isDirectory(thirdPartyDir)) {
    // Either a first run, or an earlier run died while filling .new.
    logInfo(`Trimming ${thirdPartyDir}`);
    removeDir(newDir);
    ensureDir(newDir);

    copyEntry(join(thirdPartyDir, BUILD_FILE), newDir);
    for (const lib of thirdPartyAllowList(options.host)) {
      copyEntry(join(thirdPartyDir, lib), newDir);
    }

    renameSync(thirdPartyDir, oldDir);
    copied = true;
  }

  let renamed = false;
  if (isDirectory(newDir)) {
    renameSync(newDir, thirdPartyDir);
    renamed = true;
  }

  return {copied, renamed};
}
