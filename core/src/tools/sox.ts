import { AudioFormatError, ExternalToolError } from '../errors';
import { runTool, ToolRunner, ToolRunOptions } from './process';

export interface AudioStandardizer {
  /** Convert any supported input to the fixed working format. */
  standardize(inputPath: string, outputPath: string, options?: ToolRunOptions): Promise<void>;
}

export interface SegmentExtractor {
  durationSeconds(inputPath: string, options?: ToolRunOptions): Promise<number>;
  extract(inputPath: string, outputPath: string, startSeconds: number, durationSeconds: number, options?: ToolRunOptions): Promise<void>;
}

export const STANDARD_SAMPLE_RATE = 44100;
export const STANDARD_CHANNELS = 2;

/**
 * sox based audio plumbing. sox rejecting an input surfaces as
 * AudioFormatError; a missing binary or a timeout stays ExternalToolError.
 */
export class Sox implements AudioStandardizer, SegmentExtractor {
  constructor(
    private readonly soxPath = 'sox',
    private readonly run: ToolRunner = runTool
  ) {}

  async standardize(inputPath: string, outputPath: string, options: ToolRunOptions = {}): Promise<void> {
    try {
      await this.run(this.soxPath, [
        inputPath,
        '-c', String(STANDARD_CHANNELS),
        '-r', String(STANDARD_SAMPLE_RATE),
        '-b', '16',
        outputPath
      ], options);
    } catch (error) {
      throw asFormatError(inputPath, error);
    }
  }

  async durationSeconds(inputPath: string, options: ToolRunOptions = {}): Promise<number> {
    const { stdout } = await this.run(this.soxPath, ['--i', '-D', inputPath], options);
    const seconds = Number.parseFloat(stdout.trim());
    if (!Number.isFinite(seconds) || seconds < 0) {
      throw new AudioFormatError(inputPath, `unreadable duration "${stdout.trim()}"`);
    }
    return seconds;
  }

  async extract(
    inputPath: string,
    outputPath: string,
    startSeconds: number,
    durationSeconds: number,
    options: ToolRunOptions = {}
  ): Promise<void> {
    try {
      await this.run(this.soxPath, [inputPath, outputPath, 'trim', startSeconds.toFixed(3), durationSeconds.toFixed(3)], options);
    } catch (error) {
      throw asFormatError(inputPath, error);
    }
  }
}

function asFormatError(inputPath: string, error: unknown): unknown {
  if (error instanceof ExternalToolError && typeof error.details.exitCode === 'number') {
    return new AudioFormatError(inputPath, error.message, { cause: error });
  }
  return error;
}
