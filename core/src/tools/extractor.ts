import fs from 'fs-extra';
import { SignatureParams } from '../types';
import { ExternalToolError } from '../errors';
import { runTool, ToolRunner, ToolRunOptions } from './process';

export interface SignatureExtractor {
  /** Write the signature of audioPath to outputPath. */
  extract(audioPath: string, outputPath: string, params: SignatureParams, options?: ToolRunOptions): Promise<void>;
}

/**
 * Wraps a GetMaxFreqs-style binary:
 *   <tool> -w <out> -ws <window> -sh <shift> -ds <downSampling> -nf <nFreqs> <audio>
 */
export class FrequencyExtractor implements SignatureExtractor {
  constructor(
    private readonly toolPath: string,
    private readonly run: ToolRunner = runTool
  ) {}

  async extract(audioPath: string, outputPath: string, params: SignatureParams, options: ToolRunOptions = {}): Promise<void> {
    await fs.remove(outputPath);
    await this.run(this.toolPath, [
      '-w', outputPath,
      '-ws', String(params.windowSize),
      '-sh', String(params.shift),
      '-ds', String(params.downSampling),
      '-nf', String(params.nFreqs),
      audioPath
    ], options);

    if (!await fs.pathExists(outputPath)) {
      throw new ExternalToolError(this.toolPath, `no signature written for ${audioPath}`);
    }
  }
}
