import chalk from 'chalk';
import { readFileSync } from 'node:fs';
import { basename, resolve } from 'node:path';
import { Command } from 'commander';
import {
  BatchConfigError,
  classifyPage,
  loadPdf,
  probePages,
  resolveBlankConfig,
} from '../core/pdf/index.js';
import { addThresholdOptions } from './thresholds.js';
import type { ThresholdOptions } from './thresholds.js';

interface ProbeOptions extends ThresholdOptions {
  json?: boolean;
}

export function registerProbeCommand(program: Command): void {
  const probe = program
    .command('probe <file>')
    .description('Show per-page measurements and blank/keep decisions for one PDF without writing anything');

  addThresholdOptions(probe)
    .option('--json', 'Output as JSON')
    .action(async (file: string, opts: ProbeOptions) => {
      try {
        const config = resolveBlankConfig(opts);
        const filePath = resolve(file);
        const bytes = new Uint8Array(readFileSync(filePath));
        const doc = await loadPdf(bytes);
        const metrics = await probePages(doc, bytes);
        const rows = metrics.map((m) => ({ ...m, ...classifyPage(m, config) }));

        if (opts.json) {
          console.log(JSON.stringify({ file: basename(filePath), pageCount: rows.length, thresholds: config, pages: rows }, null, 2));
          return;
        }

        console.log(chalk.bold(`Blank-page probe`));
        console.log(`  File: ${basename(filePath)} (${rows.length} pages)\n`);
        for (const r of rows) {
          const label = r.blank ? chalk.red('BLANK    ') : chalk.green('NON-BLANK');
          console.log(
            `  Page ${String(r.pageIndex + 1).padStart(3)}  ${label}  ` +
            chalk.dim(`text=${r.textLength} alnum=${r.alnumCount} ratio=${r.alnumRatio.toFixed(3)} `
              + `bytes=${r.contentBytes} image=${r.hasImage ? 'yes' : 'no'}  (${r.reason})`),
          );
        }
        const blank = rows.filter((r) => r.blank).length;
        console.log(`\n  ${blank} of ${rows.length} pages would be removed.`);
      } catch (err) {
        const prefix = err instanceof BatchConfigError ? 'Invalid option' : 'Error';
        console.error(chalk.red(`${prefix}: ${err instanceof Error ? err.message : String(err)}`));
        process.exit(1);
      }
    });
}
