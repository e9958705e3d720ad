import { Command } from 'commander';
import { DEFAULT_BLANK_CONFIG } from '../core/pdf/index.js';
import { parseNonNegativeInt, parseRatio } from './parsers.js';

/** Classifier flags shared by `run` and `probe`. */
export interface ThresholdOptions {
  minAlnum?: number;
  minAlnumRatio?: number;
  minBytes?: number;
  textLengthThreshold?: number;
  imageNonblank?: boolean;
}

export function addThresholdOptions(cmd: Command): Command {
  const d = DEFAULT_BLANK_CONFIG;
  return cmd
    .option('--min-alnum <n>', `Pages with at least n alphanumeric chars are kept (default ${d.minAlnum})`, parseNonNegativeInt)
    .option('--min-alnum-ratio <r>', `Pages whose alphanumeric share reaches r are kept (default ${d.minAlnumRatio})`, parseRatio)
    .option('--min-bytes <n>', `Pages with content streams of at least n bytes are kept (default ${d.minBytes})`, parseNonNegativeInt)
    .option('--text-length-threshold <n>', `Pages with more than n text chars are kept (default ${d.textLengthThreshold})`, parseNonNegativeInt)
    .option('--image-nonblank', 'Never treat a page with an image as blank (default)')
    .option('--no-image-nonblank', 'Judge image pages by their text and content size only');
}
