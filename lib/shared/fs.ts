// Copyright 2024 The node-webcodecs Authors
// SPDX-License-Identifier: MIT

import {mkdirSync, rmSync} from 'node:fs';

export function ensureDir(pathname: string): void {
  mkdirSync(pathname, {recursive: true});
}

// Missing directories are fine.
export function removeDir(pathname: string): void {
  rmSync(pathname, {recursive: true, force: true});
}
