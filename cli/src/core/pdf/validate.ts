/**
 * Validation of raw run options into an immutable BatchConfig.
 * Throws BatchConfigError with user-facing messages.
 */

import { resolve } from 'node:path';
import { DEFAULT_BLANK_CONFIG } from './classify.js';
import type { BatchConfig, BlankPageConfig, CollisionPolicy, FallbackPolicy } from './types.js';

export class BatchConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BatchConfigError';
  }
}

/** Options as they arrive from the command line. */
export interface BatchInput {
  inDir?: string;
  outDirSplit?: string;
  outDirClean?: string;
  every?: number;
  clean?: boolean;
  archiveDir?: string;
  minAlnum?: number;
  minAlnumRatio?: number;
  minBytes?: number;
  textLengthThreshold?: number;
  imageNonblank?: boolean;
  fallbackEmpty?: boolean;
  debugPages?: boolean;
  collision?: CollisionPolicy;
}

// ── Primitive validators ─────────────────────────────────────────

function requireDir(value: string | undefined, flag: string): string {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new BatchConfigError(`${flag} is required`);
  }
  return resolve(value.trim());
}

function optionalDir(value: string | undefined): string | undefined {
  return value && value.trim().length > 0 ? resolve(value.trim()) : undefined;
}

function requireInteger(value: number, name: string, min: number): number {
  if (!Number.isInteger(value) || value < min) {
    throw new BatchConfigError(`${name} must be an integer >= ${min} (got ${value})`);
  }
  return value;
}

function requireRatio(value: number, name: string): number {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new BatchConfigError(`${name} must be between 0 and 1 (got ${value})`);
  }
  return value;
}

// ── Config builders ──────────────────────────────────────────────

export function resolveBlankConfig(input: BatchInput): BlankPageConfig {
  return Object.freeze({
    minAlnum: requireInteger(input.minAlnum ?? DEFAULT_BLANK_CONFIG.minAlnum, 'min-alnum', 0),
    minAlnumRatio: requireRatio(input.minAlnumRatio ?? DEFAULT_BLANK_CONFIG.minAlnumRatio, 'min-alnum-ratio'),
    minBytes: requireInteger(input.minBytes ?? DEFAULT_BLANK_CONFIG.minBytes, 'min-bytes', 0),
    imageNonblank: input.imageNonblank ?? DEFAULT_BLANK_CONFIG.imageNonblank,
    textLengthThreshold: requireInteger(
      input.textLengthThreshold ?? DEFAULT_BLANK_CONFIG.textLengthThreshold,
      'text-length-threshold',
      0,
    ),
  });
}

/**
 * Build the run configuration. Cleaning is on only when a clean directory is
 * given and `clean` is not false.
 */
export function resolveBatchConfig(input: BatchInput): BatchConfig {
  const inDir = requireDir(input.inDir, '--in-dir');
  const splitDir = requireDir(input.outDirSplit, '--out-dir-split');
  const cleanTarget = optionalDir(input.outDirClean);
  const every = input.every ?? 0;
  if (!Number.isInteger(every)) {
    throw new BatchConfigError(`every must be an integer (got ${every})`);
  }

  const fallback: FallbackPolicy = input.fallbackEmpty === false ? 'emit-empty' : 'emit-original';

  return Object.freeze({
    inDir,
    splitDir,
    cleanDir: input.clean === false ? undefined : cleanTarget,
    every,
    archiveDir: optionalDir(input.archiveDir),
    blank: resolveBlankConfig(input),
    fallback,
    collision: input.collision ?? 'timestamp-suffix',
    debugPages: input.debugPages ?? false,
  });
}
