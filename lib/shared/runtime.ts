// Copyright 2024 The node-webcodecs Authors
// SPDX-License-Identifier: MIT

import {realpathSync} from 'node:fs';
import {fileURLToPath} from 'node:url';
import {dirname, resolve} from 'node:path';

function realpathOrSelf(pathname: string): string {
  try {
    return realpathSync(pathname);
  } catch {
    return pathname;
  }
}

export function isMainModule(importMetaUrl: string): boolean {
  if (!process.argv[1]) {
    return false;
  }
  // npm links bin entries through a symlink
  const entry = realpathOrSelf(resolve(process.argv[1]));
  const current = realpathOrSelf(resolve(fileURLToPath(importMetaUrl)));
  return entry === current;
}

/** Directory holding this package's package.json. */
export function resolvePackageRoot(): string {
  return resolve(dirname(fileURLToPath(import.meta.url)), '..', '..');
}
