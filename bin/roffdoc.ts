#!/usr/bin/env node

import { Command } from 'commander';
import { generateCommand } from '../src/cli/commands/generate.js';
import { checkCommand } from '../src/cli/commands/check.js';

const program = new Command();

program
  .name('roffdoc')
  .description('Generate man pages from documented C headers')
  .version('0.1.0')
  .option('-v, --verbose', 'Log pipeline progress')
  .option('-q, --quiet', 'Only log errors');

program
  .command('generate <files...>')
  .description('Write a man page for every documented declaration, group and file')
  .option('-f, --format <format>', 'Output format: terminal or json', 'terminal')
  .option('-c, --config <path>', 'Configuration file (default: .roffdocrc.*)')
  .option('-s, --section <n>', 'Manual section')
  .option('-o, --output <dir>', 'Directory pages are written to')
  .option('--include-undocumented', 'Also document declarations without a doc comment')
  .action(async (files: string[], opts) => {
    await generateCommand(files, { ...program.opts(), ...opts });
  });

program
  .command('check <files...>')
  .description('Report documentation problems without writing pages')
  .option('-f, --format <format>', 'Output format: terminal or json', 'terminal')
  .option('-c, --config <path>', 'Configuration file (default: .roffdocrc.*)')
  .option('-s, --section <n>', 'Manual section')
  .option('--include-undocumented', 'Also check declarations without a doc comment')
  .action(async (files: string[], opts) => {
    await checkCommand(files, { ...program.opts(), ...opts });
  });

await program.parseAsync();
