import path from 'path';
import fs from 'fs-extra';
import { Algorithm, ExperimentResult } from '../types';
import { AudioFormatError, DatabaseNotFoundError, UnsupportedAlgorithmError } from '../errors';
import { BackendRegistry, CompressionBackend } from '../compression/backends';
import { ExperimentRunner } from '../experiment/runner';
import { SignatureStore } from '../store/signatureStore';
import { hashSeed } from '../util/random';
import {
  CopyExtractor,
  CopyStandardizer,
  makeTempDir,
  PARAMS,
  RecordingNoise,
  recordingLogger,
  runLengthBackend
} from './helpers';

/** Run-length coder that refuses the five-byte "BBBBB" query on its own. */
const pickyBackend: CompressionBackend = {
  algorithm: 'picky',
  compressedSize(data: Uint8Array): number {
    if (data.length === 5 && data[0] === 66) throw new Error('refusing B query');
    return runLengthBackend.compressedSize(data);
  }
};

describe('ExperimentRunner', () => {
  let workDir: string;
  let store: SignatureStore;
  let queries: string[];
  let standardizer: CopyStandardizer;
  let noise: RecordingNoise;

  const backends = new BackendRegistry({ [Algorithm.GZIP]: runLengthBackend, [Algorithm.BZIP2]: pickyBackend }).provider();

  function runner(overrides: Partial<ConstructorParameters<typeof ExperimentRunner>[0]> = {}): ExperimentRunner {
    return new ExperimentRunner({
      store,
      tools: { standardizer, extractor: new CopyExtractor(['BROKEN']), noise },
      backends,
      ...overrides
    });
  }

  beforeEach(async () => {
    workDir = await makeTempDir();
    const tracksDir = path.join(workDir, 'tracks');
    await fs.ensureDir(tracksDir);
    await fs.writeFile(path.join(tracksDir, 'song1.wav'), 'AAAA');
    await fs.writeFile(path.join(tracksDir, 'song2.wav'), 'BBBB');
    await fs.writeFile(path.join(tracksDir, 'song3.wav'), 'ABAB');

    store = new SignatureStore(path.join(workDir, 'signatures'));
    await store.build(tracksDir, PARAMS, { extractor: new CopyExtractor(), standardizer: new CopyStandardizer() });

    const queriesDir = path.join(workDir, 'queries');
    await fs.ensureDir(queriesDir);
    queries = [path.join(queriesDir, 'song1_segment_01.wav'), path.join(queriesDir, 'song2_segment_01.wav')];
    await fs.writeFile(queries[0], 'AAAA');
    await fs.writeFile(queries[1], 'BBBBB');

    standardizer = new CopyStandardizer();
    noise = new RecordingNoise();
  });

  afterEach(async () => {
    await fs.remove(workDir);
  });

  const summary = (r: ExperimentResult) => [r.queryId, r.compressor, r.noiseLevel, r.bestMatch];

  describe('runBatch', () => {
    it('should run every cell in cross-product order', async () => {
      const outcome = await runner().runBatch(queries, ['gzip'], [0, 0.05]);

      expect(outcome.cancelled).toBe(false);
      expect(outcome.failures).toEqual([]);
      expect(outcome.results.map(summary)).toEqual([
        ['song1_segment_01', 'gzip', 0, 'song1'],
        ['song1_segment_01', 'gzip', 0.05, 'song1'],
        ['song2_segment_01', 'gzip', 0, 'song2'],
        ['song2_segment_01', 'gzip', 0.05, 'song2']
      ]);
    });

    it('should record ranking details for each result', async () => {
      const { results } = await runner({ topK: 2 }).runBatch([queries[0]], ['gzip'], [0]);
      const [result] = results;

      expect(result.ncd).toBe(0);
      expect(result.topMatches).toEqual([
        { trackId: 'song1', ncd: 0 },
        { trackId: 'song3', ncd: 0.75 }
      ]);
      expect(result.cutoff).toBe(3);
      expect(result.trueTrack).toBe('song1');
      expect(result.correct).toBe(true);
      expect(result.queryPath).toBe(queries[0]);
      expect(result.processingTimeMs).toBeGreaterThanOrEqual(0);
      expect(Object.isFrozen(result)).toBe(true);
    });

    it('should seed noise per query and level', async () => {
      await runner({ seed: 7 }).runBatch([queries[0]], ['gzip'], [0, 0.1]);

      expect(noise.calls).toEqual([{ level: 0.1, seed: hashSeed(7, 'song1_segment_01', 0.1) }]);
    });

    it('should isolate a failing cell from the others', async () => {
      const logger = recordingLogger();
      const outcome = await runner({ logger }).runBatch(queries, ['gzip', 'bzip2'], [0]);

      expect(outcome.results.map(summary)).toEqual([
        ['song1_segment_01', 'gzip', 0, 'song1'],
        ['song1_segment_01', 'bzip2', 0, 'song1'],
        ['song2_segment_01', 'gzip', 0, 'song2']
      ]);
      expect(outcome.failures).toEqual([
        {
          queryId: 'song2_segment_01',
          queryPath: queries[1],
          compressor: 'bzip2',
          noiseLevel: 0,
          kind: 'unknown',
          message: 'refusing B query'
        }
      ]);
      expect(logger.lines).toContainEqual({ level: 'error', message: 'Cell failed for song2_segment_01' });
    });

    it('should classify unreadable audio', async () => {
      const rejecting = {
        standardize: async (input: string) => {
          throw new AudioFormatError(input, 'not audio');
        }
      };
      const outcome = await runner({ tools: { standardizer: rejecting, extractor: new CopyExtractor(), noise } })
        .runBatch([queries[0]], ['gzip'], [0]);

      expect(outcome.results).toEqual([]);
      expect(outcome.failures.map(f => [f.kind, f.message])).toEqual([['audio_format', `${queries[0]}: not audio`]]);
    });

    it('should keep completed results when cancelled', async () => {
      const controller = new AbortController();
      const outcome = await runner().runBatch(queries, ['gzip'], [0, 0.05], {
        signal: controller.signal,
        onResult: () => controller.abort()
      });

      expect(outcome.cancelled).toBe(true);
      expect(outcome.results.map(summary)).toEqual([['song1_segment_01', 'gzip', 0, 'song1']]);
      expect(outcome.failures).toEqual([]);
    });

    it('should stop when the result callback fails', async () => {
      let calls = 0;
      const outcome = runner({ concurrency: 2 }).runBatch(queries, ['gzip'], [0, 0.05], {
        onResult: async () => {
          calls++;
          throw new Error('disk full');
        }
      });

      await expect(outcome).rejects.toThrow('disk full');
      expect(calls).toBeLessThanOrEqual(2);
    });

    it('should return results in cell order with several workers', async () => {
      const outcome = await runner({ concurrency: 3 }).runBatch(queries, ['gzip', 'bzip2'], [0, 0.02]);

      expect(outcome.results.map(r => `${r.queryId}/${r.compressor}/${r.noiseLevel}`)).toEqual([
        'song1_segment_01/gzip/0',
        'song1_segment_01/gzip/0.02',
        'song1_segment_01/bzip2/0',
        'song1_segment_01/bzip2/0.02',
        'song2_segment_01/gzip/0',
        'song2_segment_01/gzip/0.02'
      ]);
      expect(outcome.failures).toHaveLength(2);
    });

    it('should report progress for every cell', async () => {
      const progress: [number, number][] = [];
      await runner().runBatch(queries, ['gzip', 'bzip2'], [0], { onProgress: (done, total) => progress.push([done, total]) });

      expect(progress).toEqual([[1, 4], [2, 4], [3, 4], [4, 4]]);
    });

    it('should remove its working directories', async () => {
      await runner().runBatch(queries, ['gzip', 'bzip2'], [0]);

      const arenaRoots = new Set(standardizer.outputs.map(o => path.dirname(path.dirname(o))));
      expect(arenaRoots.size).toBe(1);
      for (const root of arenaRoots) {
        expect(await fs.pathExists(root)).toBe(false);
      }
    });

    it('should call onStart once before the first cell', async () => {
      const events: string[] = [];
      await runner().runBatch(queries, ['gzip'], [0], {
        onStart: total => { events.push(`start ${total}`); },
        onResult: result => { events.push(result.queryId); }
      });

      expect(events).toEqual(['start 2', 'song1_segment_01', 'song2_segment_01']);
    });

    it('should not start a batch with an unknown compressor or a missing database', async () => {
      const onStart = jest.fn();

      await expect(runner().runBatch(queries, ['gzip', 'brotli'], [0], { onStart }))
        .rejects.toThrow(UnsupportedAlgorithmError);
      await expect(runner({ store: new SignatureStore(path.join(workDir, 'none')) }).runBatch(queries, ['gzip'], [0], { onStart }))
        .rejects.toThrow(DatabaseNotFoundError);
      expect(onStart).not.toHaveBeenCalled();
    });

    it('should reject unknown compressors before loading anything', async () => {
      await expect(runner({ store: new SignatureStore(path.join(workDir, 'none')) }).runBatch(queries, ['gzip', 'zip'], [0]))
        .rejects.toThrow(UnsupportedAlgorithmError);
    });

    it('should fail when the database is missing', async () => {
      await expect(runner({ store: new SignatureStore(path.join(workDir, 'none')) }).runBatch(queries, ['gzip'], [0]))
        .rejects.toThrow(DatabaseNotFoundError);
    });
  });

  describe('identify', () => {
    it('should return the full ranking for one query', async () => {
      const { result, ranking } = await runner().identify(queries[1], 'gzip');

      expect(result.bestMatch).toBe('song2');
      expect(ranking.matches.map(m => m.track.id)).toEqual(['song2', 'song1', 'song3']);
      expect(ranking.algorithm).toBe('rle');
    });

    it('should use ground truth when given', async () => {
      const { result } = await runner({ groundTruth: { song2_segment_01: 'song3' } }).identify(queries[1], 'gzip');

      expect(result.trueTrack).toBe('song3');
      expect(result.correct).toBe(false);
    });
  });
});
