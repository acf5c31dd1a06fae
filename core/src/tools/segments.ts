import path from 'path';
import fs from 'fs-extra';
import { Logger } from '../types';
import { errorMessage } from '../errors';
import { silentLogger } from '../util/logger';
import { createRng, hashSeed } from '../util/random';
import { NoiseInjector } from './noise';
import { SegmentExtractor } from './sox';

export interface SegmentOptions {
  segmentDuration: number;
  segmentsPerSong: number;
  seed: number;
  /** Extra noisy copy of every segment per level. */
  noiseLevels?: number[];
  noise?: NoiseInjector;
  timeoutMs?: number;
  logger?: Logger;
}

export interface SegmentOutcome {
  segments: string[];
  failures: { source: string; message: string }[];
}

export function segmentFileName(stem: string, index: number): string {
  return `${stem}_segment_${String(index + 1).padStart(2, '0')}.wav`;
}

export function noisyFileName(segmentPath: string, level: number): string {
  return `${path.parse(segmentPath).name}_noise_${level.toFixed(3)}.wav`;
}

/**
 * Cut random excerpts from each source to use as identification queries.
 * Start offsets come from a PRNG seeded per source, so a rerun with the same
 * seed cuts the same excerpts.
 */
export async function generateQuerySegments(
  sources: string[],
  outputDir: string,
  extractor: SegmentExtractor,
  options: SegmentOptions
): Promise<SegmentOutcome> {
  const logger = options.logger ?? silentLogger;
  const outcome: SegmentOutcome = { segments: [], failures: [] };
  await fs.ensureDir(outputDir);

  for (const source of sources) {
    const stem = path.parse(source).name;
    try {
      const duration = await extractor.durationSeconds(source, { timeoutMs: options.timeoutMs });
      if (duration <= options.segmentDuration) {
        throw new Error(`too short for ${options.segmentDuration}s segments (${duration.toFixed(1)}s)`);
      }

      const rng = createRng(hashSeed(options.seed, stem));
      const maxStart = duration - options.segmentDuration;
      for (let i = 0; i < options.segmentsPerSong; i++) {
        const segmentPath = path.join(outputDir, segmentFileName(stem, i));
        await extractor.extract(source, segmentPath, rng() * maxStart, options.segmentDuration, {
          timeoutMs: options.timeoutMs
        });
        outcome.segments.push(segmentPath);

        if (options.noise) {
          for (const level of options.noiseLevels ?? []) {
            const noisyPath = path.join(outputDir, noisyFileName(segmentPath, level));
            await options.noise.addNoise(segmentPath, noisyPath, level, hashSeed(options.seed, stem, i, level));
            outcome.segments.push(noisyPath);
          }
        }
      }
      logger.info(`Generated segments for ${path.basename(source)}`, { source });
    } catch (error) {
      logger.warn(`Skipping ${path.basename(source)}: ${errorMessage(error)}`, { source });
      outcome.failures.push({ source, message: errorMessage(error) });
    }
  }

  return outcome;
}
