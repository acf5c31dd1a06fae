import fs from 'fs-extra';
import path from 'path';
import chalk from 'chalk';
import ora from 'ora';
import {
  CsvResultWriter,
  errorMessage,
  formatReport,
  listAudioFiles,
  NcdMatch,
  summarize,
  toRow,
  writeResultsJson
} from '@ncdmatch/core';
import { loadConfig } from '../config';
import { createConsoleLogger } from '../logger';
import { CommonOptions } from '../options';

interface ExperimentOptions extends CommonOptions {
  queriesDir?: string;
  signaturesDir?: string;
  resultsDir?: string;
  compressors?: string[];
  noiseLevels?: number[];
  maxQueries?: number;
  concurrency?: number;
  seed?: number;
  groundTruth?: string;
}

export const RESULTS_CSV = 'identification_results.csv';
export const RESULTS_JSON = 'identification_results.json';
export const REPORT_FILE = 'evaluation_report.txt';

export async function experimentCommand(options: ExperimentOptions) {
  const spinner = ora('Preparing experiment...');
  const controller = new AbortController();
  const onInterrupt = () => {
    controller.abort();
    spinner.text = 'Stopping after the current cell...';
  };

  try {
    const config = await loadConfig(options.config, {
      queriesDir: options.queriesDir,
      signaturesDir: options.signaturesDir,
      resultsDir: options.resultsDir,
      concurrency: options.concurrency,
      seed: options.seed
    });
    const compressors = options.compressors ?? config.compressors;
    const noiseLevels = options.noiseLevels ?? config.noiseLevels;

    const queries = (await listAudioFiles(config.queriesDir)).slice(0, options.maxQueries);
    if (queries.length === 0) {
      console.error(chalk.red(`No query files found in ${config.queriesDir}`));
      process.exit(1);
    }

    const groundTruth = options.groundTruth ? await readGroundTruth(options.groundTruth) : undefined;
    const ncdmatch = new NcdMatch({
      config,
      logger: createConsoleLogger({ verbose: options.verbose, spinner: () => spinner })
    });

    const csvPath = path.join(config.resultsDir, RESULTS_CSV);
    let writer: CsvResultWriter | undefined;
    const total = queries.length * compressors.length * noiseLevels.length;

    console.log(chalk.gray('Queries:'), queries.length);
    console.log(chalk.gray('Compressors:'), compressors.join(', '));
    console.log(chalk.gray('Noise levels:'), noiseLevels.join(', '));
    console.log(chalk.gray('Press Ctrl-C to stop early and keep finished results.\n'));

    process.once('SIGINT', onInterrupt);
    spinner.start(`Processing 0/${total}...`);

    const outcome = await ncdmatch.runner(groundTruth).runBatch(queries, compressors, noiseLevels, {
      signal: controller.signal,
      // The previous table is only replaced once the batch is known to be runnable.
      onStart: async () => {
        writer = await CsvResultWriter.open(csvPath, { truncate: true });
      },
      onResult: result => {
        if (!writer) throw new Error(`${RESULTS_CSV} is not open`);
        return writer.append(result);
      },
      onProgress: (done, all) => {
        if (!controller.signal.aborted) spinner.text = `Processing ${done}/${all}...`;
      }
    });

    if (outcome.cancelled) {
      spinner.warn(`Stopped after ${outcome.results.length + outcome.failures.length} of ${total} cells`);
    } else {
      spinner.succeed(`Processed ${total} cells`);
    }

    const jsonPath = path.join(config.resultsDir, RESULTS_JSON);
    await writeResultsJson(jsonPath, outcome.results);

    const report = formatReport(summarize(outcome.results.map(toRow)));
    const reportPath = path.join(config.resultsDir, REPORT_FILE);
    await fs.outputFile(reportPath, report + '\n');

    console.log('\n' + report);
    if (outcome.failures.length > 0) {
      console.log(chalk.yellow(`⚠ ${outcome.failures.length} cell(s) failed and were skipped (see log above).`));
    }
    console.log(chalk.gray('Results:'), path.resolve(csvPath));
    console.log(chalk.gray('JSON:'), path.resolve(jsonPath));
    console.log(chalk.gray('Report:'), path.resolve(reportPath));
    console.log();

  } catch (error) {
    spinner.fail(`Experiment failed: ${errorMessage(error)}`);
    process.exit(1);
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
}

async function readGroundTruth(file: string): Promise<Record<string, string>> {
  const data: unknown = await fs.readJson(file);
  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    throw new Error(`Ground truth file must map query ids to track ids: ${file}`);
  }
  const truth: Record<string, string> = {};
  for (const [query, track] of Object.entries(data)) {
    if (typeof track !== 'string') {
      throw new Error(`Ground truth for ${query} is not a track id`);
    }
    truth[query] = track;
  }
  return truth;
}
