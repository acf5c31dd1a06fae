import fs from 'fs-extra';
import path from 'path';
import chalk from 'chalk';
import ora from 'ora';
import { errorMessage, NcdMatch, RankedMatchList } from '@ncdmatch/core';
import { loadConfig } from '../config';
import { createConsoleLogger } from '../logger';
import { CommonOptions } from '../options';

interface IdentifyOptions extends CommonOptions {
  compressor: string;
  noise?: number;
  top?: number;
  signaturesDir?: string;
  json?: boolean;
}

export async function identifyCommand(file: string, options: IdentifyOptions) {
  const spinner = ora('Identifying...');

  try {
    if (!await fs.pathExists(file)) {
      console.error(chalk.red(`File not found: ${file}`));
      process.exit(1);
    }

    const config = await loadConfig(options.config, {
      signaturesDir: options.signaturesDir,
      topK: options.top
    });
    const ncdmatch = new NcdMatch({
      config,
      logger: createConsoleLogger({ verbose: options.verbose, spinner: () => spinner })
    });

    spinner.start(`Identifying ${path.basename(file)} with ${options.compressor}...`);
    const { result, ranking } = await ncdmatch.identify(file, options.compressor, { noiseLevel: options.noise });
    spinner.stop();

    if (options.json) {
      console.log(JSON.stringify({
        ...result,
        matches: ranking.matches.slice(0, config.topK).map(m => ({ trackId: m.track.id, ncd: m.ncd, similarity: m.similarity }))
      }, null, 2));
      return;
    }

    displayRanking(file, ranking, config.topK);
    if (result.trueTrack) {
      const verdict = result.correct ? chalk.green('✓ correct') : chalk.red('✗ incorrect');
      console.log(chalk.gray('Expected:'), result.trueTrack, verdict);
    }
    console.log(chalk.gray('Time:'), `${(result.processingTimeMs / 1000).toFixed(2)}s\n`);

  } catch (error) {
    spinner.fail(`Identification failed: ${errorMessage(error)}`);
    process.exit(1);
  }
}

function displayRanking(file: string, ranking: RankedMatchList, topK: number) {
  console.log('\n' + chalk.bold('='.repeat(60)));
  console.log(chalk.bold(`  Matches for ${path.basename(file)} (${ranking.algorithm})`));
  console.log(chalk.bold('='.repeat(60)) + '\n');

  ranking.matches.slice(0, topK).forEach((match, i) => {
    const line = `${String(i + 1).padStart(3)}. ${match.track.id.padEnd(30)} NCD ${match.ncd.toFixed(4)}  similarity ${match.similarity.toFixed(4)}`;
    console.log(i === 0 ? chalk.green.bold(line) : i < ranking.cutoff ? line : chalk.gray(line));
    if (i + 1 === ranking.cutoff && ranking.cutoff < Math.min(topK, ranking.matches.length)) {
      console.log(chalk.gray(`     ${'-'.repeat(20)} similarity stabilizes below here`));
    }
  });
  console.log();
  console.log(chalk.gray('Best match:'), chalk.bold(ranking.matches[0]?.track.id ?? 'none'));
  console.log(chalk.gray('Cutoff:'), `${ranking.cutoff} of ${ranking.matches.length}`);
}
