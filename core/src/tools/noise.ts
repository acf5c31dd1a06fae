import fs from 'fs-extra';
import { AudioFormatError, errorMessage } from '../errors';
import { createGaussian, createRng } from '../util/random';
import { decodeWav, encodeWav16, PcmAudio } from './wav';

export interface NoiseInjector {
  /**
   * Write a copy of inputPath perturbed by white noise of the given level.
   * The same seed always produces the same output.
   */
  addNoise(inputPath: string, outputPath: string, level: number, seed: number): Promise<void>;
}

/**
 * Adds zero-mean Gaussian noise with standard deviation `level` to every
 * sample, then rescales by the peak if the result leaves [-1, 1].
 */
export function applyNoise(samples: Float64Array, level: number, seed: number): Float64Array {
  const gaussian = createGaussian(createRng(seed));
  const out = new Float64Array(samples.length);
  let peak = 0;
  for (let i = 0; i < samples.length; i++) {
    out[i] = samples[i] + gaussian() * level;
    const a = Math.abs(out[i]);
    if (a > peak) peak = a;
  }
  if (peak > 1) {
    for (let i = 0; i < out.length; i++) out[i] /= peak;
  }
  return out;
}

export class WavNoiseInjector implements NoiseInjector {
  async addNoise(inputPath: string, outputPath: string, level: number, seed: number): Promise<void> {
    if (!(level >= 0)) {
      throw new RangeError(`Noise level must be >= 0, got ${level}`);
    }

    const buffer = await fs.readFile(inputPath);
    let audio: PcmAudio;
    try {
      audio = decodeWav(buffer);
    } catch (error) {
      throw new AudioFormatError(inputPath, errorMessage(error), { cause: error });
    }

    await fs.writeFile(outputPath, encodeWav16({ ...audio, samples: applyNoise(audio.samples, level, seed) }));
  }
}
