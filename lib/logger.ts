// Copyright 2024 The node-webcodecs Authors
// SPDX-License-Identifier: MIT
//
// All log output goes to stderr. stdout carries the CMake manifest and
// nothing else, so it can be redirected straight into a .cmake file.

export const LOG_PREFIX = '[webrtc-packager]';

export function logInfo(message: string): void {
  console.error(`${LOG_PREFIX} ${message}`);
}

export function logWarn(message: string): void {
  console.error(`${LOG_PREFIX} WARN ${message}`);
}

export function logError(message: string): void {
  console.error(`${LOG_PREFIX} ERROR ${message}`);
}

export function logDebug(message: string, env: NodeJS.ProcessEnv = process.env): void {
  if (env.DEBUG) {
    console.error(`${LOG_PREFIX} [DEBUG] ${message}`);
  }
}
