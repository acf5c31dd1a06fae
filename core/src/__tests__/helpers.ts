import os from 'os';
import path from 'path';
import fs from 'fs-extra';
import { CompressionBackend } from '../compression/backends';
import { Logger, SignatureParams } from '../types';
import { SignatureExtractor } from '../tools/extractor';
import { NoiseInjector } from '../tools/noise';
import { AudioStandardizer } from '../tools/sox';

/** Run-length coder counting one byte per run. */
export const runLengthBackend: CompressionBackend = {
  algorithm: 'rle',
  compressedSize(data: Uint8Array): number {
    let runs = 0;
    for (let i = 0; i < data.length; i++) {
      if (i === 0 || data[i] !== data[i - 1]) runs++;
    }
    return runs;
  }
};

export const bytes = (text: string): Uint8Array => new Uint8Array(Buffer.from(text, 'latin1'));

export const PARAMS: SignatureParams = { windowSize: 1024, shift: 256, downSampling: 4, nFreqs: 4 };

export function makeTempDir(prefix = 'ncdmatch-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export function recordingLogger(): Logger & { lines: { level: string; message: string }[] } {
  const lines: { level: string; message: string }[] = [];
  return {
    lines,
    debug: message => { lines.push({ level: 'debug', message }); },
    info: message => { lines.push({ level: 'info', message }); },
    warn: message => { lines.push({ level: 'warn', message }); },
    error: message => { lines.push({ level: 'error', message }); }
  };
}

/** Copies its input, standing in for sox. */
export class CopyStandardizer implements AudioStandardizer {
  readonly outputs: string[] = [];

  async standardize(inputPath: string, outputPath: string): Promise<void> {
    this.outputs.push(outputPath);
    await fs.copy(inputPath, outputPath);
  }
}

/**
 * Uses the audio file's bytes as its signature. Inputs whose content is
 * listed in failOn are rejected.
 */
export class CopyExtractor implements SignatureExtractor {
  readonly calls: { audioPath: string; params: SignatureParams }[] = [];

  constructor(private readonly failOn: string[] = []) {}

  async extract(audioPath: string, outputPath: string, params: SignatureParams): Promise<void> {
    this.calls.push({ audioPath, params });
    const content = await fs.readFile(audioPath, 'latin1');
    if (this.failOn.includes(content)) {
      throw new Error(`cannot extract ${path.basename(audioPath)}`);
    }
    await fs.writeFile(outputPath, content, 'latin1');
  }
}

export class RecordingNoise implements NoiseInjector {
  readonly calls: { level: number; seed: number }[] = [];

  async addNoise(inputPath: string, outputPath: string, level: number, seed: number): Promise<void> {
    this.calls.push({ level, seed });
    await fs.copy(inputPath, outputPath);
  }
}
