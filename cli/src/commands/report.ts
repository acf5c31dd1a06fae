import fs from 'fs-extra';
import chalk from 'chalk';
import { errorMessage, formatReport, readResultsCsv, summarize } from '@ncdmatch/core';

interface ReportOptions {
  output?: string;
  json?: boolean;
}

export async function reportCommand(file: string, options: ReportOptions) {
  try {
    if (!await fs.pathExists(file)) {
      console.error(chalk.red(`Results file not found: ${file}`));
      process.exit(1);
    }

    const summary = summarize(await readResultsCsv(file));

    if (options.json) {
      console.log(JSON.stringify(summary, null, 2));
    } else {
      console.log(formatReport(summary));
    }

    if (options.output) {
      await fs.outputFile(options.output, formatReport(summary) + '\n');
      console.log(chalk.gray('Report saved to:'), options.output);
    }

  } catch (error) {
    console.error(chalk.red('Report failed:'), errorMessage(error));
    process.exit(1);
  }
}
