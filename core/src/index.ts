export * from './types';
export * from './errors';
export * from './config';
export * from './compression/backends';
export * from './compression/ncd';
export * from './store/schema';
export * from './store/signatureStore';
export * from './ranking/rankingEngine';
export * from './experiment/evaluation';
export * from './experiment/artifacts';
export * from './experiment/runner';
export * from './tools/process';
export * from './tools/extractor';
export * from './tools/sox';
export * from './tools/noise';
export * from './tools/segments';
export * from './tools/wav';
export * from './util/random';
export * from './util/stats';
export * from './util/tempArena';
export * from './util/logger';

import { BuildOutcome, ExperimentResult, Logger } from './types';
import { DEFAULT_CONFIG, NcdMatchConfig } from './config';
import { BackendRegistry } from './compression/backends';
import { NcdCalculator } from './compression/ncd';
import { SignatureStore } from './store/signatureStore';
import { ExperimentRunner, ExperimentTools, Identification, IdentifyOptions, RunBatchOptions } from './experiment/runner';
import { ExperimentSummary, summarize, toRow } from './experiment/evaluation';
import { FrequencyExtractor } from './tools/extractor';
import { Sox } from './tools/sox';
import { WavNoiseInjector } from './tools/noise';
import { silentLogger } from './util/logger';

export interface NcdMatchOptions {
  config?: NcdMatchConfig;
  logger?: Logger;
  /** Replace the sox / extractor / noise collaborators. */
  tools?: Partial<ExperimentTools>;
  backends?: BackendRegistry;
}

/**
 * Main NcdMatch class.
 * Wires the store, runner and external tools from one configuration.
 */
export class NcdMatch {
  readonly config: NcdMatchConfig;
  readonly store: SignatureStore;
  readonly tools: ExperimentTools;
  readonly calculator: NcdCalculator;
  private readonly logger: Logger;
  private readonly backends: BackendRegistry;

  constructor(options: NcdMatchOptions = {}) {
    this.config = options.config ?? DEFAULT_CONFIG;
    this.logger = options.logger ?? silentLogger;
    this.backends = options.backends ?? new BackendRegistry();
    this.calculator = new NcdCalculator(this.backends);
    this.store = new SignatureStore(this.config.signaturesDir, { logger: this.logger });

    const sox = new Sox(this.config.soxPath);
    this.tools = {
      standardizer: options.tools?.standardizer ?? sox,
      extractor: options.tools?.extractor ?? new FrequencyExtractor(this.config.extractorPath),
      noise: options.tools?.noise ?? new WavNoiseInjector()
    };
  }

  /**
   * Build the reference database from the configured tracks directory.
   */
  buildDatabase(tracksDir: string = this.config.databaseDir): Promise<BuildOutcome> {
    return this.store.build(tracksDir, this.config.signature, {
      extractor: this.tools.extractor,
      standardizer: this.tools.standardizer,
      timeoutMs: this.config.toolTimeoutMs
    });
  }

  /**
   * Identify one audio file with one compressor.
   */
  identify(queryPath: string, compressor: string, options: IdentifyOptions = {}): Promise<Identification> {
    return this.runner().identify(queryPath, compressor, options);
  }

  /**
   * Run every query against every configured compressor and noise level.
   */
  async runExperiment(
    queries: readonly string[],
    options: RunBatchOptions & { groundTruth?: Record<string, string> } = {}
  ): Promise<{ results: ExperimentResult[]; summary: ExperimentSummary; cancelled: boolean }> {
    const outcome = await this.runner(options.groundTruth).runBatch(
      queries,
      this.config.compressors,
      this.config.noiseLevels,
      options
    );
    return {
      results: outcome.results,
      summary: summarize(outcome.results.map(toRow)),
      cancelled: outcome.cancelled
    };
  }

  runner(groundTruth?: Record<string, string>): ExperimentRunner {
    return new ExperimentRunner({
      store: this.store,
      tools: this.tools,
      backends: this.backends.provider(),
      logger: this.logger,
      topK: this.config.topK,
      cutoff: this.config.cutoff,
      toolTimeoutMs: this.config.toolTimeoutMs,
      seed: this.config.seed,
      concurrency: this.config.concurrency,
      groundTruth
    });
  }
}

export default NcdMatch;
