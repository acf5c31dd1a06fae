import fs from 'fs-extra';
import path from 'path';
import chalk from 'chalk';
import ora from 'ora';
import inquirer from 'inquirer';
import { errorMessage, NcdMatch } from '@ncdmatch/core';
import { loadConfig } from '../config';
import { createConsoleLogger } from '../logger';
import { CommonOptions } from '../options';

interface BuildOptions extends CommonOptions {
  databaseDir?: string;
  signaturesDir?: string;
  winSize?: number;
  shift?: number;
  downSampling?: number;
  nFreqs?: number;
  rebuild?: boolean;
}

export async function buildCommand(options: BuildOptions) {
  const spinner = ora('Loading configuration...');

  try {
    const base = await loadConfig(options.config, {
      databaseDir: options.databaseDir,
      signaturesDir: options.signaturesDir
    });
    const config = {
      ...base,
      signature: {
        windowSize: options.winSize ?? base.signature.windowSize,
        shift: options.shift ?? base.signature.shift,
        downSampling: options.downSampling ?? base.signature.downSampling,
        nFreqs: options.nFreqs ?? base.signature.nFreqs
      }
    };
    const ncdmatch = new NcdMatch({
      config,
      logger: createConsoleLogger({ verbose: options.verbose, spinner: () => spinner })
    });

    if (!await fs.pathExists(config.databaseDir)) {
      console.error(chalk.red(`Tracks directory not found: ${config.databaseDir}`));
      process.exit(1);
    }

    if (await ncdmatch.store.exists() && !options.rebuild) {
      if (!process.stdin.isTTY) {
        console.error(chalk.yellow(`A database already exists in ${config.signaturesDir}. Pass --rebuild to replace it.`));
        process.exit(1);
      }
      const { replace } = await inquirer.prompt<{ replace: boolean }>([{
        type: 'confirm',
        name: 'replace',
        message: `A database already exists in ${config.signaturesDir}. Replace it?`,
        default: false
      }]);
      if (!replace) {
        console.log(chalk.gray('Keeping the existing database.'));
        return;
      }
    }

    spinner.start(`Building signature database from ${config.databaseDir}...`);
    const { database, failures } = await ncdmatch.buildDatabase(config.databaseDir);
    spinner.stop();

    console.log(chalk.green(`\n✓ Database built with ${database.tracks.length} signatures\n`));
    console.log(chalk.gray('Index:'), path.resolve(ncdmatch.store.indexPath));
    const p = database.params;
    console.log(chalk.gray('Parameters:'), `ws=${p.windowSize} sh=${p.shift} ds=${p.downSampling} nf=${p.nFreqs}`);

    if (failures.length > 0) {
      console.log('\n' + chalk.yellow(`⚠ ${failures.length} file(s) skipped:`));
      failures.forEach(failure => {
        console.log(chalk.yellow('  •'), `${path.basename(failure.source)}: ${failure.message}`);
      });
    }
    console.log();

  } catch (error) {
    spinner.fail(`Build failed: ${errorMessage(error)}`);
    process.exit(1);
  }
}
