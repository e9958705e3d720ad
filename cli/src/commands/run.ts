import chalk from 'chalk';
import { Command } from 'commander';
import { createLogger } from '../core/log/logger.js';
import { resolveBatchConfig, runBatch } from '../core/pdf/index.js';
import type { BatchConfig, BatchSummary, DocumentReport } from '../core/pdf/index.js';
import { parseInteger } from './parsers.js';
import { addThresholdOptions } from './thresholds.js';
import type { ThresholdOptions } from './thresholds.js';

interface RunOptions extends ThresholdOptions {
  inDir?: string;
  outDirSplit?: string;
  outDirClean?: string;
  every: number;
  clean: boolean;
  archiveDir?: string;
  fallbackEmpty: boolean;
  debugPages?: boolean;
  logFile?: string;
  json?: boolean;
}

export function registerRunCommand(program: Command): void {
  const run = program
    .command('run', { isDefault: true })
    .description(
      'Split every PDF in a directory into N-page parts and drop blank pages.\n' +
      'Blank = no image, almost no text and a near-empty content stream (all criteria must hold).',
    )
    .option('--in-dir <dir>', 'Directory with the input PDFs (required)')
    .option('--out-dir-split <dir>', 'Directory for the split parts (required)')
    .option('--out-dir-clean <dir>', 'Directory for cleaned parts; cleaning is skipped without it')
    .option('--every <n>', 'Split every n pages; 0 or less copies the file unsplit (default 0)', parseInteger, 0)
    .option('--no-clean', 'Skip blank-page removal even if --out-dir-clean is given')
    .option('--archive-dir <dir>', 'Move each original here once it has been processed');

  addThresholdOptions(run)
    .option('--no-fallback-empty', 'When every page is blank, write an empty PDF instead of the original')
    .option('--debug-pages', 'Log the measurements and decision for every page')
    .option('--log-file <path>', 'Write logs to a rotating file instead of the console')
    .option('--json', 'Output the summary as JSON')
    .action(async (opts: RunOptions) => {
      let config: BatchConfig;
      try {
        config = resolveBatchConfig({
          inDir: opts.inDir,
          outDirSplit: opts.outDirSplit,
          outDirClean: opts.outDirClean,
          every: opts.every,
          clean: opts.clean,
          archiveDir: opts.archiveDir,
          minAlnum: opts.minAlnum,
          minAlnumRatio: opts.minAlnumRatio,
          minBytes: opts.minBytes,
          textLengthThreshold: opts.textLengthThreshold,
          imageNonblank: opts.imageNonblank,
          fallbackEmpty: opts.fallbackEmpty,
          debugPages: opts.debugPages,
        });
      } catch (err) {
        console.error(chalk.red(`Error: ${err instanceof Error ? err.message : String(err)}`));
        console.error(chalk.dim('Usage: pdfsweep --in-dir ./inbox --out-dir-split ./parts --out-dir-clean ./clean --every 2'));
        process.exit(1);
      }

      const { logger, close } = createLogger({
        logFile: opts.logFile,
        debug: opts.debugPages,
        envLevel: process.env.LOG_LEVEL,
      });

      let summary: BatchSummary;
      try {
        summary = await runBatch(config, { logger });
      } catch (err) {
        logger.fatal({ err }, 'Batch aborted');
        await close();
        console.error(chalk.red(`Error: ${err instanceof Error ? err.message : String(err)}`));
        process.exit(1);
      }
      await close();

      if (opts.json) {
        console.log(JSON.stringify(summary, null, 2));
        return;
      }
      printSummary(summary, config);
    });
}

function printSummary(summary: BatchSummary, config: BatchConfig): void {
  const { totals } = summary;
  if (totals.documents === 0) {
    console.log(chalk.yellow(`No PDF files found in ${config.inDir}`));
    return;
  }

  console.log(chalk.bold(`\nPDF batch: ${totals.documents} file${totals.documents !== 1 ? 's' : ''}\n`));
  for (const doc of summary.documents) {
    console.log(`  ${statusLabel(doc)}  ${doc.file}  ${chalk.dim(detail(doc))}`);
  }

  const parts = config.every > 0 ? `${totals.chunks} part(s)` : `${totals.chunks} copied`;
  console.log(`\n  ${totals.processed} processed, ${totals.skipped} skipped, ${totals.failed} failed, ${parts}`);
  if (config.cleanDir) {
    console.log(`  ${totals.cleaned} cleaned: ${totals.pagesKept} pages kept, ${totals.pagesRemoved} blank pages removed`);
  }
}

function statusLabel(doc: DocumentReport): string {
  switch (doc.status) {
    case 'processed': return chalk.green('OK  ');
    case 'skipped': return chalk.yellow('SKIP');
    case 'failed': return chalk.red('FAIL');
  }
}

function detail(doc: DocumentReport): string {
  if (doc.status !== 'processed') return doc.error ?? '';
  const removed = doc.cleaned.reduce((sum, c) => sum + c.removed, 0);
  const bits = [`${doc.pageCount ?? 0} pages`, `${doc.chunks.length} part(s)`];
  if (doc.cleaned.length > 0) bits.push(`${removed} blank removed`);
  if (doc.archivedTo) bits.push(`→ ${doc.archivedTo}`);
  return bits.join(', ');
}
