/**
 * @fileoverview Source discovery
 *
 * Turns the CLI target into the list of files a run owns. A directory is
 * scanned with the configured include globs; excludes are matched against
 * the path relative to the target. Each resolved path appears once.
 */

import type { Stats } from 'node:fs';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { glob } from 'glob';
import { minimatch } from 'minimatch';
import { TargetNotFoundError } from '../core/errors.js';
import { logDebug } from '../telemetry/logger.js';
import { getErrorMessage, toError } from '../utils/errors.js';

const ALWAYS_IGNORED = ['**/node_modules/**', '**/.git/**'];

export interface DiscoveredFile {
  /** Path relative to the discovery root, `/`-separated. */
  fileId: string;
  /** Resolved absolute path. */
  filePath: string;
}

export interface DiscoveryResult {
  root: string;
  files: DiscoveredFile[];
}

export interface DiscoveryOptions {
  include: readonly string[];
  exclude: readonly string[];
}

function toPosix(relative: string): string {
  return relative.split(path.sep).join('/');
}

export function isExcluded(fileId: string, exclude: readonly string[]): boolean {
  return exclude.some((pattern) => minimatch(fileId, pattern, { dot: true, matchBase: !pattern.includes('/') }));
}

export async function discoverSources(target: string, options: DiscoveryOptions): Promise<DiscoveryResult> {
  const absolute = path.resolve(target);
  let stat: Stats;
  try {
    stat = await fs.stat(absolute);
  } catch (error) {
    throw new TargetNotFoundError(target, `not found: ${getErrorMessage(error)}`, toError(error));
  }

  if (stat.isFile()) {
    const filePath = await fs.realpath(absolute);
    return { root: path.dirname(absolute), files: [{ fileId: path.basename(absolute), filePath }] };
  }
  if (!stat.isDirectory()) {
    throw new TargetNotFoundError(target, 'is neither a file nor a directory');
  }

  const matches = await glob([...options.include], {
    cwd: absolute,
    ignore: ALWAYS_IGNORED,
    nodir: true,
    posix: true,
  });

  const seen = new Set<string>();
  const files: DiscoveredFile[] = [];
  for (const match of matches.sort()) {
    const fileId = toPosix(path.normalize(match));
    if (isExcluded(fileId, options.exclude)) continue;
    const filePath = await fs.realpath(path.join(absolute, fileId));
    if (seen.has(filePath)) continue;
    seen.add(filePath);
    files.push({ fileId, filePath });
  }

  logDebug('Discovery: sources found', { root: absolute, files: files.length });
  return { root: absolute, files };
}
