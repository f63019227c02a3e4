import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import type { Logger } from '@app/logger';
import type { CatalogProduct } from '@app/types';

export type FixtureDir = Readonly<{
  dir: string;
  file: (name: string) => string;
  cleanup: () => Promise<void>;
}>;

/** Writes `files` (name → content) into a fresh temp directory. */
export async function createFixtureDir(files: Record<string, string>): Promise<FixtureDir> {
  const dir = await mkdtemp(path.join(os.tmpdir(), 'catalog-loader-'));
  for (const [name, content] of Object.entries(files)) {
    await writeFile(path.join(dir, name), content, 'utf8');
  }
  return {
    dir,
    file: (name) => path.join(dir, name),
    cleanup: () => rm(dir, { recursive: true, force: true }),
  };
}

export function ndjson(records: readonly unknown[]): string {
  return `${records.map((r) => JSON.stringify(r)).join('\n')}\n`;
}

export type LogEntry = Readonly<{
  level: 'debug' | 'info' | 'warn' | 'error' | 'fatal';
  context: Record<string, unknown>;
  message: string;
}>;

export type RecordingLogger = Logger & Readonly<{ entries: LogEntry[] }>;

export function createRecordingLogger(
  entries: LogEntry[] = [],
  base: Record<string, unknown> = {}
): RecordingLogger {
  const push =
    (level: LogEntry['level']) =>
    (context: Record<string, unknown>, message: string): void => {
      entries.push({ level, context: { ...base, ...context }, message });
    };

  return {
    entries,
    debug: push('debug'),
    info: push('info'),
    warn: push('warn'),
    error: push('error'),
    fatal: push('fatal'),
    child: (ctx) => createRecordingLogger(entries, { ...base, ...ctx }),
  };
}

export function makeProduct(
  id: number,
  overrides: Partial<Omit<CatalogProduct, 'id'>> = {}
): CatalogProduct {
  const images = overrides.images ?? [];
  return {
    id,
    name: `Product ${id}`,
    urlKey: `product-${id}`,
    price: '10.00',
    description: null,
    images,
    imagesDocument: [...images],
    sourceFile: 'products_0.json',
    ...overrides,
  };
}
