#!/usr/bin/env node
import { Command } from 'commander';
import { registerProbeCommand } from './commands/probe.js';
import { registerRunCommand } from './commands/run.js';

const program = new Command();

program
  .name('pdfsweep')
  .description('Batch-split scanned PDFs and remove blank pages')
  .version('0.1.0');

registerRunCommand(program);
registerProbeCommand(program);

await program.parseAsync(process.argv);
