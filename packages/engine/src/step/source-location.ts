/**
 * Source Location
 *
 * Best-effort capture of where a step was declared. Any failure yields
 * undefined; a missing location never blocks registration.
 *
 * @module @stepgraph/engine/step/source-location
 */

import { existsSync } from 'node:fs';
import { dirname, isAbsolute, join, relative, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { StepGraphConfig } from '@stepgraph/core';
import type { SourceLocation } from './types.js';

const FRAME_PATTERN = /^\s*at (?:.*?\()?(.+?):(\d+):(\d+)\)?$/;

const ROOT_MARKERS = ['.git', 'package.json'];

/**
 * Location of whoever called `entry`
 *
 * @param entry - Public function the author called; its frame and everything
 *   above it are dropped from the trace
 */
export function captureSourceLocation(
  entry: (...args: never[]) => unknown
): SourceLocation | undefined {
  const holder: { stack?: string } = {};
  Error.captureStackTrace(holder, entry);

  const frame = holder.stack?.split('\n').find((line) => FRAME_PATTERN.test(line));
  return frame ? parseFrame(frame) : undefined;
}

/**
 * Parse one V8 stack frame line
 */
export function parseFrame(frame: string): SourceLocation | undefined {
  const match = FRAME_PATTERN.exec(frame);
  if (!match) {
    return undefined;
  }
  const [, location, line] = match;
  const filePath = toFilePath(location);
  if (!filePath) {
    return undefined;
  }
  return { filePath: toProjectRelative(filePath), line: Number(line) };
}

function toFilePath(location: string): string | undefined {
  if (location.startsWith('file://')) {
    try {
      return fileURLToPath(location);
    } catch {
      return undefined;
    }
  }
  return isAbsolute(location) ? location : undefined;
}

/**
 * Relative to the configured project root, else to the nearest ancestor
 * holding a root marker. Absolute when neither contains the file.
 */
export function toProjectRelative(filePath: string, projectRoot?: string): string {
  const root = projectRoot ?? configuredProjectRoot() ?? findProjectRoot(dirname(filePath));
  if (!root) {
    return filePath;
  }
  const relativePath = relative(resolve(root), filePath);
  return relativePath.startsWith('..') || isAbsolute(relativePath) ? filePath : relativePath;
}

/**
 * Reads only STEPGRAPH_PROJECT_ROOT, so an invalid unrelated variable cannot
 * block step registration
 */
function configuredProjectRoot(): string | undefined {
  return StepGraphConfig.shape.projectRoot.parse(process.env.STEPGRAPH_PROJECT_ROOT || undefined);
}

export function findProjectRoot(start: string): string | undefined {
  let current = resolve(start);
  for (;;) {
    if (ROOT_MARKERS.some((marker) => existsSync(join(current, marker)))) {
      return current;
    }
    const parent = dirname(current);
    if (parent === current) {
      return undefined;
    }
    current = parent;
  }
}
