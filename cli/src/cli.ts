#!/usr/bin/env node

import { Command, program } from 'commander';
import chalk from 'chalk';
import { buildCommand } from './commands/build';
import { identifyCommand } from './commands/identify';
import { experimentCommand } from './commands/experiment';
import { reportCommand } from './commands/report';
import { queriesCommand } from './commands/queries';
import { ncdCommand } from './commands/ncd';
import { collectList, collectNumbers, parseInteger, parseNumber, parsePositiveInteger } from './options';

const packageJson: { version: string } = require('../package.json');

function withCommonOptions(command: Command): Command {
  return command
    .option('-C, --config <path>', 'Path to config file (default: ./ncdmatch.config.json if present)')
    .option('-v, --verbose', 'Verbose output');
}

program
  .name('ncdmatch')
  .description('ncdmatch - identify audio clips by normalized compression distance')
  .version(packageJson.version);

// Build command
withCommonOptions(program
  .command('build')
  .description('Build the reference signature database')
  .option('-d, --database-dir <dir>', 'Directory with reference tracks')
  .option('-s, --signatures-dir <dir>', 'Directory for signatures and the index')
  .option('--win-size <n>', 'Extractor window size', parsePositiveInteger)
  .option('--shift <n>', 'Extractor window shift', parsePositiveInteger)
  .option('--down-sampling <n>', 'Extractor down-sampling factor', parsePositiveInteger)
  .option('--n-freqs <n>', 'Frequencies kept per window', parsePositiveInteger)
  .option('--rebuild', 'Replace an existing database without asking'))
  .action(buildCommand);

// Identify command
withCommonOptions(program
  .command('identify <file>')
  .description('Rank the database against one audio file')
  .option('-c, --compressor <name>', 'Compressor (gzip, bzip2, lzma, zstd)', 'gzip')
  .option('-n, --noise <level>', 'Add white noise of this level first', parseNumber)
  .option('-t, --top <k>', 'Number of matches to show', parsePositiveInteger)
  .option('-s, --signatures-dir <dir>', 'Directory holding the database index')
  .option('-j, --json', 'Output as JSON'))
  .action(identifyCommand);

// Experiment command
withCommonOptions(program
  .command('experiment')
  .description('Run every query against every compressor and noise level')
  .option('-q, --queries-dir <dir>', 'Directory with query audio')
  .option('-s, --signatures-dir <dir>', 'Directory holding the database index')
  .option('-r, --results-dir <dir>', 'Directory for CSV, JSON and report output')
  .option('--compressors <names...>', 'Compressors to test', collectList)
  .option('--noise-levels <levels...>', 'Noise levels to test', collectNumbers)
  .option('--max-queries <n>', 'Only use the first n queries', parsePositiveInteger)
  .option('--concurrency <n>', 'Cells processed at once', parsePositiveInteger)
  .option('--seed <n>', 'Seed for noise injection', parseInteger)
  .option('--ground-truth <file>', 'JSON map of query id to track id'))
  .action(experimentCommand);

// Report command
program
  .command('report <csv>')
  .description('Summarize a results CSV')
  .option('-o, --output <path>', 'Also write the report to a file')
  .option('-j, --json', 'Output the summary as JSON')
  .action(reportCommand);

// Queries command
withCommonOptions(program
  .command('queries')
  .description('Cut random query segments from the reference tracks')
  .option('-d, --database-dir <dir>', 'Directory with reference tracks')
  .option('-q, --queries-dir <dir>', 'Output directory for segments')
  .option('--segment-duration <seconds>', 'Segment length', parseNumber, 10)
  .option('--segments-per-song <n>', 'Segments cut from each track', parsePositiveInteger, 3)
  .option('--max-songs <n>', 'Only use the first n tracks', parsePositiveInteger)
  .option('--seed <n>', 'Seed for segment offsets and noise', parseInteger)
  .option('--add-noise', 'Also write noisy copies of every segment')
  .option('--noise-levels <levels...>', 'Noise levels for noisy copies', collectNumbers))
  .action(queriesCommand);

// NCD command
program
  .command('ncd <a> <b>')
  .description('NCD between two signature files')
  .option('-c, --compressor <name>', 'Only this compressor (default: all)')
  .option('-j, --json', 'Output as JSON')
  .action(ncdCommand);

// Global error handler
process.on('unhandledRejection', (error) => {
  console.error(chalk.red('Error:'), error);
  process.exit(1);
});

program.parse();
