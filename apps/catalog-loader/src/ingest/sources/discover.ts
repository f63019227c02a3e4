import type { Stats } from 'node:fs';
import { readdir, stat } from 'node:fs/promises';
import path from 'node:path';

import { NoInputFiles } from '../errors.js';

export const PRODUCT_FILE_PATTERN = /^products_(.+)\.json$/;

/**
 * Lists the input files for a run.
 *
 * A file path is returned as-is. A directory yields its `products_*.json`
 * entries, numeric suffixes in numeric order (products_2 before products_10),
 * then any other suffixes by name. Symlinks to regular files are followed;
 * dangling links are skipped.
 */
export async function discoverProductFiles(dataPath: string): Promise<string[]> {
  const resolved = path.resolve(dataPath);

  let info: Stats;
  try {
    info = await stat(resolved);
  } catch (err) {
    if (isMissingPathError(err)) {
      throw new NoInputFiles(resolved, 'not_found');
    }
    throw err;
  }

  if (info.isFile()) {
    return [resolved];
  }

  const entries = await readdir(resolved, { withFileTypes: true });
  const names: string[] = [];
  for (const entry of entries) {
    if (!PRODUCT_FILE_PATTERN.test(entry.name)) continue;
    if (entry.isFile() || (entry.isSymbolicLink() && (await isLinkToFile(path.join(resolved, entry.name))))) {
      names.push(entry.name);
    }
  }
  names.sort(compareProductFileNames);

  if (names.length === 0) {
    throw new NoInputFiles(resolved, 'no_matching_files');
  }

  return names.map((name) => path.join(resolved, name));
}

export function compareProductFileNames(a: string, b: string): number {
  const sa = PRODUCT_FILE_PATTERN.exec(a)?.[1] ?? a;
  const sb = PRODUCT_FILE_PATTERN.exec(b)?.[1] ?? b;
  const na = /^\d+$/.test(sa) ? Number(sa) : null;
  const nb = /^\d+$/.test(sb) ? Number(sb) : null;

  if (na !== null && nb !== null && na !== nb) return na - nb;
  if (na !== null && nb === null) return -1;
  if (na === null && nb !== null) return 1;
  return a < b ? -1 : a > b ? 1 : 0;
}

async function isLinkToFile(linkPath: string): Promise<boolean> {
  try {
    return (await stat(linkPath)).isFile();
  } catch (err) {
    if (isMissingPathError(err)) return false;
    throw err;
  }
}

function isMissingPathError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  const code: unknown = Reflect.get(err, 'code');
  return code === 'ENOENT' || code === 'ENOTDIR';
}
