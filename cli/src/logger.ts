import chalk from 'chalk';
import ora from 'ora';
import { LogContext, Logger } from '@ncdmatch/core';

export interface ConsoleLoggerOptions {
  /** Show debug and info lines, with their context. */
  verbose?: boolean;
  /** Spinner to clear before a line is printed. */
  spinner?: () => ora.Ora | undefined;
  write?: (line: string) => void;
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const write = options.write ?? ((line: string) => console.error(line));

  const emit = (line: string) => {
    const spinner = options.spinner?.();
    if (spinner?.isSpinning) {
      spinner.clear();
      write(line);
      spinner.render();
    } else {
      write(line);
    }
  };

  const format = (message: string, context?: LogContext) =>
    options.verbose && context && Object.keys(context).length > 0
      ? `${message} ${chalk.gray(JSON.stringify(context))}`
      : message;

  return {
    debug: (message, context) => {
      if (options.verbose) emit(chalk.gray(format(message, context)));
    },
    info: (message, context) => {
      if (options.verbose) emit(format(message, context));
    },
    warn: (message, context) => emit(chalk.yellow(`⚠ ${format(message, context)}`)),
    error: (message, context) => emit(chalk.red(`✖ ${format(message, context)}`))
  };
}
