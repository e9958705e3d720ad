/**
 * Move processed originals into an archive directory.
 */

import { copyFileSync, existsSync, mkdirSync, renameSync, unlinkSync } from 'node:fs';
import { basename, extname, join } from 'node:path';
import type { CollisionPolicy } from './types.js';

export interface ArchiveOptions {
  collision?: CollisionPolicy;
  /** Clock used for the collision suffix. */
  now?: () => Date;
}

/** Local-time stamp in YYYYMMDD_HHMMSS form. */
export function formatTimestamp(date: Date): string {
  const p = (n: number) => String(n).padStart(2, '0');
  return `${date.getFullYear()}${p(date.getMonth() + 1)}${p(date.getDate())}`
    + `_${p(date.getHours())}${p(date.getMinutes())}${p(date.getSeconds())}`;
}

/**
 * Pick the archive path for `fileName`.
 *
 * `timestamp-suffix` turns a taken name into `<stem>_<timestamp><ext>`; if a
 * file from the same second already holds that name, `_2`, `_3`, … follow.
 */
export function resolveArchiveTarget(
  archiveDir: string,
  fileName: string,
  options: ArchiveOptions = {},
): string {
  const target = join(archiveDir, fileName);
  if (options.collision === 'overwrite' || !existsSync(target)) return target;

  const ext = extname(fileName);
  const stem = basename(fileName, ext);
  const stamp = formatTimestamp((options.now ?? (() => new Date()))());

  let candidate = join(archiveDir, `${stem}_${stamp}${ext}`);
  for (let n = 2; existsSync(candidate); n++) {
    candidate = join(archiveDir, `${stem}_${stamp}_${n}${ext}`);
  }
  return candidate;
}

/**
 * Move `sourcePath` into `archiveDir` and return where it landed.
 * Falls back to copy + delete when a rename crosses devices.
 */
export function moveToArchive(sourcePath: string, archiveDir: string, options: ArchiveOptions = {}): string {
  mkdirSync(archiveDir, { recursive: true });
  const target = resolveArchiveTarget(archiveDir, basename(sourcePath), options);

  try {
    renameSync(sourcePath, target);
  } catch (err) {
    if (!isCrossDeviceError(err)) throw err;
    copyFileSync(sourcePath, target);
    unlinkSync(sourcePath);
  }
  return target;
}

function isCrossDeviceError(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'EXDEV';
}
