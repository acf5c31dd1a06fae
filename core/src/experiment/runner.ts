import path from 'path';
import { performance } from 'perf_hooks';
import fs from 'fs-extra';
import {
  Algorithm,
  BatchOutcome,
  CandidateSignature,
  CellFailure,
  ExperimentResult,
  Logger,
  RankedMatchList,
  SignatureDatabase
} from '../types';
import { EmptyDatabaseError, errorMessage, failureKind } from '../errors';
import { BackendProvider, BackendRegistry, CompressionBackend, parseAlgorithm, parseAlgorithms } from '../compression/backends';
import { CutoffOptions, rank } from '../ranking/rankingEngine';
import { SignatureStore } from '../store/signatureStore';
import { SignatureExtractor } from '../tools/extractor';
import { NoiseInjector } from '../tools/noise';
import { AudioStandardizer } from '../tools/sox';
import { silentLogger } from '../util/logger';
import { hashSeed } from '../util/random';
import { TempArena, withTempArena } from '../util/tempArena';
import { inferTrueTrack, isCorrect } from './evaluation';

export interface ExperimentTools {
  standardizer: AudioStandardizer;
  extractor: SignatureExtractor;
  noise: NoiseInjector;
}

export interface ExperimentRunnerOptions {
  store: SignatureStore;
  tools: ExperimentTools;
  backends?: BackendProvider;
  logger?: Logger;
  /** Matches kept per result. */
  topK?: number;
  cutoff?: CutoffOptions;
  toolTimeoutMs?: number;
  /** Base seed for noise injection. */
  seed?: number;
  /** Cells processed at once. */
  concurrency?: number;
  /** Query id -> true track id, consulted before name-based inference. */
  groundTruth?: Record<string, string>;
}

export interface RunBatchOptions {
  /** Checked before each cell; completed results are kept. */
  signal?: AbortSignal;
  /** Called once the batch is validated and the database loaded, before any cell. */
  onStart?: (totalCells: number) => void | Promise<void>;
  onResult?: (result: ExperimentResult) => void | Promise<void>;
  onFailure?: (failure: CellFailure) => void;
  onProgress?: (completed: number, total: number) => void;
}

export interface IdentifyOptions {
  noiseLevel?: number;
  signal?: AbortSignal;
}

export interface Identification {
  result: ExperimentResult;
  ranking: RankedMatchList;
}

interface Cell {
  queryId: string;
  queryPath: string;
  compressor: Algorithm;
  noiseLevel: number;
}

interface Session {
  database: SignatureDatabase;
  candidates: CandidateSignature[];
}

export function queryIdOf(queryPath: string): string {
  return path.parse(queryPath).name;
}

/**
 * Runs every (query, compressor, noise level) cell against one loaded
 * database. A failing cell is logged and recorded; the others go on.
 */
export class ExperimentRunner {
  private readonly logger: Logger;
  private readonly backends: BackendProvider;
  private readonly topK: number;
  private readonly seed: number;
  private readonly concurrency: number;

  constructor(private readonly options: ExperimentRunnerOptions) {
    this.logger = options.logger ?? silentLogger;
    this.backends = options.backends ?? new BackendRegistry().provider();
    this.topK = options.topK ?? 10;
    this.seed = options.seed ?? 42;
    this.concurrency = Math.max(1, Math.floor(options.concurrency ?? 1));
  }

  async runBatch(
    queries: readonly string[],
    compressorNames: readonly string[],
    noiseLevels: readonly number[],
    batchOptions: RunBatchOptions = {}
  ): Promise<BatchOutcome> {
    const compressors = parseAlgorithms(compressorNames);
    for (const level of noiseLevels) {
      if (!(level >= 0)) throw new RangeError(`Noise level must be >= 0, got ${level}`);
    }

    const session = await this.openSession();
    const backends = new Map<Algorithm, CompressionBackend>();
    for (const compressor of compressors) {
      backends.set(compressor, await this.backends(compressor));
    }

    const cells: Cell[] = [];
    for (const queryPath of queries) {
      for (const compressor of compressors) {
        for (const noiseLevel of noiseLevels) {
          cells.push({ queryId: queryIdOf(queryPath), queryPath, compressor, noiseLevel });
        }
      }
    }
    this.logger.info(`Running ${cells.length} cells`, {
      queries: queries.length,
      compressors,
      noiseLevels: [...noiseLevels]
    });
    await batchOptions.onStart?.(cells.length);

    const results: (ExperimentResult | undefined)[] = new Array(cells.length);
    const failures: (CellFailure | undefined)[] = new Array(cells.length);
    const { signal } = batchOptions;
    // fatal is set when a caller callback throws; it stops every worker.
    const state: { cancelled: boolean; fatal?: { error: unknown } } = { cancelled: false };
    let next = 0;
    let completed = 0;

    await withTempArena(async arena => {
      const worker = async () => {
        while (next < cells.length && !state.fatal) {
          if (signal?.aborted) {
            state.cancelled = true;
            return;
          }
          const index = next++;
          const cell = cells[index];
          const backend = backends.get(cell.compressor);
          try {
            if (!backend) throw new Error(`No backend loaded for ${cell.compressor}`);
            results[index] = (await this.runCell(arena, session, cell, backend, signal)).result;
          } catch (error) {
            if (signal?.aborted) {
              state.cancelled = true;
              return;
            }
            failures[index] = this.recordFailure(cell, error);
          }

          try {
            const result = results[index];
            const failure = failures[index];
            if (result) await batchOptions.onResult?.(result);
            if (failure) batchOptions.onFailure?.(failure);
          } catch (error) {
            state.fatal = { error };
            return;
          }
          batchOptions.onProgress?.(++completed, cells.length);
        }
      };
      await Promise.all(Array.from({ length: Math.min(this.concurrency, cells.length) }, worker));
    }, 'ncdmatch-run-');

    if (state.fatal) throw state.fatal.error;

    if (state.cancelled) {
      this.logger.warn(`Stopped after ${completed} of ${cells.length} cells`);
    }

    return {
      results: results.filter((r): r is ExperimentResult => r !== undefined),
      failures: failures.filter((f): f is CellFailure => f !== undefined),
      cancelled: state.cancelled
    };
  }

  /**
   * Rank a single query file. Errors propagate to the caller.
   */
  async identify(queryPath: string, compressorName: string, options: IdentifyOptions = {}): Promise<Identification> {
    const compressor = parseAlgorithm(compressorName);
    const noiseLevel = options.noiseLevel ?? 0;
    if (!(noiseLevel >= 0)) throw new RangeError(`Noise level must be >= 0, got ${noiseLevel}`);

    const session = await this.openSession();
    const backend = await this.backends(compressor);
    return withTempArena(
      arena => this.runCell(arena, session, { queryId: queryIdOf(queryPath), queryPath, compressor, noiseLevel }, backend, options.signal),
      'ncdmatch-identify-'
    );
  }

  private async openSession(): Promise<Session> {
    const database = await this.options.store.load();
    const candidates = await this.options.store.readSignatures(database);
    return { database, candidates };
  }

  private runCell(
    arena: TempArena,
    session: Session,
    cell: Cell,
    backend: CompressionBackend,
    signal?: AbortSignal
  ): Promise<Identification> {
    const { tools, toolTimeoutMs: timeoutMs, cutoff, groundTruth } = this.options;
    const { params } = session.database;

    return arena.scope(`${cell.queryId}-${cell.compressor}-${cell.noiseLevel}`, async dir => {
      const started = performance.now();

      const standardized = path.join(dir, 'query.wav');
      await tools.standardizer.standardize(cell.queryPath, standardized, { timeoutMs, signal });

      let input = standardized;
      if (cell.noiseLevel > 0) {
        input = path.join(dir, 'noisy.wav');
        await tools.noise.addNoise(standardized, input, cell.noiseLevel, hashSeed(this.seed, cell.queryId, cell.noiseLevel));
      }

      const signaturePath = path.join(dir, 'query.freqs');
      await tools.extractor.extract(input, signaturePath, params, { timeoutMs, signal });
      const bytes = await fs.readFile(signaturePath);

      const ranking = rank({ bytes, params }, session.candidates, backend, cutoff);
      const [best] = ranking.matches;
      if (!best) throw new EmptyDatabaseError();

      const trueTrack = inferTrueTrack(cell.queryId, groundTruth);
      const result: ExperimentResult = Object.freeze({
        queryId: cell.queryId,
        queryPath: cell.queryPath,
        compressor: cell.compressor,
        noiseLevel: cell.noiseLevel,
        bestMatch: best.track.id,
        ncd: best.ncd,
        topMatches: ranking.matches.slice(0, this.topK).map(m => Object.freeze({ trackId: m.track.id, ncd: m.ncd })),
        cutoff: ranking.cutoff,
        processingTimeMs: performance.now() - started,
        trueTrack,
        correct: isCorrect(best.track.id, trueTrack)
      });

      this.logger.debug(`${cell.queryId} [${cell.compressor}, noise ${cell.noiseLevel}] -> ${best.track.id}`, {
        ncd: best.ncd,
        cutoff: ranking.cutoff
      });
      return { result, ranking };
    });
  }

  private recordFailure(cell: Cell, error: unknown): CellFailure {
    const failure: CellFailure = Object.freeze({
      queryId: cell.queryId,
      queryPath: cell.queryPath,
      compressor: cell.compressor,
      noiseLevel: cell.noiseLevel,
      kind: failureKind(error),
      message: errorMessage(error)
    });
    this.logger.error(`Cell failed for ${cell.queryId}`, {
      compressor: cell.compressor,
      noiseLevel: cell.noiseLevel,
      kind: failure.kind,
      cause: failure.message
    });
    return failure;
  }
}
