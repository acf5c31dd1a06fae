import fs from 'fs-extra';
import chalk from 'chalk';
import { ALGORITHMS, errorMessage, NcdCalculator, parseAlgorithm } from '@ncdmatch/core';

interface NcdOptions {
  compressor?: string;
  json?: boolean;
}

export async function ncdCommand(fileA: string, fileB: string, options: NcdOptions) {
  try {
    for (const file of [fileA, fileB]) {
      if (!await fs.pathExists(file)) {
        console.error(chalk.red(`File not found: ${file}`));
        process.exit(1);
      }
    }

    const calculator = new NcdCalculator();
    const values: Record<string, number> = {};
    if (options.compressor) {
      const algorithm = parseAlgorithm(options.compressor);
      values[algorithm] = await calculator.ncdFromFiles(fileA, fileB, algorithm);
    } else {
      const [a, b] = await Promise.all([fs.readFile(fileA), fs.readFile(fileB)]);
      Object.assign(values, await calculator.compareAll(a, b));
    }

    if (options.json) {
      console.log(JSON.stringify(values, null, 2));
      return;
    }

    console.log();
    for (const algorithm of ALGORITHMS) {
      const value = values[algorithm];
      if (value !== undefined) {
        console.log(`  ${chalk.bold(algorithm.padEnd(6))} ${value.toFixed(4)}`);
      }
    }
    console.log();

  } catch (error) {
    console.error(chalk.red('NCD failed:'), errorMessage(error));
    process.exit(1);
  }
}
