import path from 'path';
import chalk from 'chalk';
import ora from 'ora';
import { errorMessage, generateQuerySegments, listAudioFiles, Sox, WavNoiseInjector } from '@ncdmatch/core';
import { loadConfig } from '../config';
import { createConsoleLogger } from '../logger';
import { CommonOptions } from '../options';

interface QueriesOptions extends CommonOptions {
  databaseDir?: string;
  queriesDir?: string;
  segmentDuration: number;
  segmentsPerSong: number;
  maxSongs?: number;
  seed?: number;
  addNoise?: boolean;
  noiseLevels?: number[];
}

export async function queriesCommand(options: QueriesOptions) {
  const spinner = ora('Generating query segments...');

  try {
    const config = await loadConfig(options.config, {
      databaseDir: options.databaseDir,
      queriesDir: options.queriesDir,
      seed: options.seed
    });
    const sources = (await listAudioFiles(config.databaseDir)).slice(0, options.maxSongs);
    if (sources.length === 0) {
      console.error(chalk.red(`No audio files found in ${config.databaseDir}`));
      process.exit(1);
    }

    const noiseLevels = (options.noiseLevels ?? config.noiseLevels).filter(level => level > 0);
    spinner.start(`Cutting ${options.segmentsPerSong} segment(s) of ${options.segmentDuration}s from ${sources.length} file(s)...`);

    const outcome = await generateQuerySegments(sources, config.queriesDir, new Sox(config.soxPath), {
      segmentDuration: options.segmentDuration,
      segmentsPerSong: options.segmentsPerSong,
      seed: config.seed,
      noise: options.addNoise ? new WavNoiseInjector() : undefined,
      noiseLevels,
      timeoutMs: config.toolTimeoutMs,
      logger: createConsoleLogger({ verbose: options.verbose, spinner: () => spinner })
    });
    spinner.stop();

    console.log(chalk.green(`\n✓ Generated ${outcome.segments.length} query file(s)\n`));
    console.log(chalk.gray('Output:'), path.resolve(config.queriesDir));
    if (options.addNoise) {
      console.log(chalk.gray('Noise levels:'), noiseLevels.join(', '));
    }
    if (outcome.failures.length > 0) {
      console.log('\n' + chalk.yellow(`⚠ ${outcome.failures.length} file(s) skipped:`));
      outcome.failures.forEach(failure => {
        console.log(chalk.yellow('  •'), `${path.basename(failure.source)}: ${failure.message}`);
      });
    }
    console.log();

  } catch (error) {
    spinner.fail(`Query generation failed: ${errorMessage(error)}`);
    process.exit(1);
  }
}
