/**
 * Logger setup for pdfsweep.
 *
 * Console: pino-pretty on stderr, so stdout stays free for summaries and --json.
 * --log-file: records go to a size-rotated file instead (5 MiB × 5 files).
 */

import { mkdirSync } from 'node:fs';
import { basename, dirname, resolve } from 'node:path';
import { pino } from 'pino';
import type { Logger, LevelWithSilent } from 'pino';
import { PinoPretty } from 'pino-pretty';
import { createStream } from 'rotating-file-stream';

const LOGGER_NAME = 'pdfsweep';
const ROTATE_SIZE = '5M';
const ROTATE_KEEP = 5;

const LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

export interface LoggerOptions {
  /** Rotating log file; console output when absent. */
  logFile?: string;
  /** Force debug level (per-page diagnostics). */
  debug?: boolean;
  /** Level from the environment, e.g. process.env.LOG_LEVEL. */
  envLevel?: string;
}

export interface LoggerHandle {
  logger: Logger;
  /** Flush and close the underlying stream. */
  close(): Promise<void>;
}

export function resolveLevel(opts: LoggerOptions): LevelWithSilent {
  if (opts.debug) return 'debug';
  const env = opts.envLevel?.toLowerCase();
  return LEVELS.find((l) => l === env) ?? 'info';
}

export function createLogger(opts: LoggerOptions = {}): LoggerHandle {
  const level = resolveLevel(opts);
  const base = { name: LOGGER_NAME, level, timestamp: pino.stdTimeFunctions.isoTime };

  if (opts.logFile) {
    const path = resolve(opts.logFile);
    mkdirSync(dirname(path), { recursive: true });
    const stream = createStream(basename(path), {
      path: dirname(path),
      size: ROTATE_SIZE,
      maxFiles: ROTATE_KEEP,
    });
    return {
      logger: pino(base, stream),
      close: () => new Promise<void>((done) => { stream.end(() => done()); }),
    };
  }

  const prettyStream = PinoPretty({
    colorize: true,
    translateTime: 'SYS:standard',
    ignore: 'pid,hostname,name',
    destination: 2,
    sync: true,
  });
  return {
    logger: pino(base, prettyStream),
    close: async () => { /* sync stream, nothing buffered */ },
  };
}
