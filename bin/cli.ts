#!/usr/bin/env node
import yargs from 'yargs';
import {hideBin} from 'yargs/helpers';
import chalk from 'chalk';

import {logger, Level, parseLevel} from '../logger';
import {info, tile} from './commands';

function fail(exc: unknown): never {
  logger.error(chalk.red(exc instanceof Error ? exc.message : String(exc)));
  process.exit(1);
}

yargs(hideBin(process.argv))
  .scriptName('pdfcompose')
  .usage('Usage: $0 <command> [options]')
  .option('verbose', {
    alias: 'v',
    type: 'boolean',
    describe: 'print debug output (same as --log-level debug)',
  })
  .option('log-level', {
    choices: ['debug', 'info', 'warning', 'error', 'critical'] as const,
    default: 'info' as const,
    describe: 'least severe messages to print on stderr',
  })
  .middleware(argv => {
    logger.level = argv.verbose ? Level.debug : parseLevel(argv.logLevel);
  })
  .command('info <file>', 'Print page count, page sizes, and metadata as JSON', command => {
    return command.positional('file', {type: 'string', demandOption: true, describe: 'pdf file to open'});
  }, argv => info(argv.file).catch(fail))
  .command('tile <file>', 'Place pages of a PDF side by side on a single new page', command => {
    return command
      .positional('file', {type: 'string', demandOption: true, describe: 'pdf file to read pages from'})
      .option('output', {alias: 'o', type: 'string', demandOption: true, describe: 'pdf file to write'})
      .option('pages', {type: 'string', default: 'all', describe: 'pages to place, e.g., "1-4" or "1,3,5"'})
      .option('page-size', {choices: ['a4', 'letter'] as const, default: 'a4' as const, describe: 'size of the new page'})
      .option('layout', {choices: ['grid', 'vertical', 'horizontal'] as const, default: 'grid' as const})
      .option('columns', {type: 'number', default: 2})
      .option('gap', {type: 'number', default: 10, describe: 'space between pages, in points'})
      .option('cell', {type: 'number', describe: 'maximum width and height of each page, in points'})
      .option('margin', {type: 'number', default: 36, describe: 'distance from the page edges, in points'});
  }, argv => tile(argv.file, argv.output, {
    pages: argv.pages,
    pageSize: argv.pageSize,
    layout: argv.layout,
    columns: argv.columns,
    gap: argv.gap,
    cell: argv.cell,
    margin: argv.margin,
  }).catch(fail))
  .demandCommand(1)
  .strict()
  .help()
  .alias('help', 'h')
  .parseAsync()
  .catch(fail);
