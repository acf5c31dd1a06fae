export enum Algorithm {
  GZIP = 'gzip',
  BZIP2 = 'bzip2',
  LZMA = 'lzma',
  ZSTD = 'zstd'
}

export interface SignatureParams {
  windowSize: number;
  shift: number;
  downSampling: number;
  nFreqs: number;
}

export interface Signature {
  bytes: Uint8Array;
  params: SignatureParams;
}

export interface Track {
  id: string;
  audioPath: string;
  signaturePath: string;
}

export interface SignatureDatabase {
  readonly version: number;
  readonly createdAt: string;
  readonly params: SignatureParams;
  readonly tracks: readonly Track[];
}

export interface CandidateSignature {
  track: Track;
  signature: Signature;
}

export interface RankedMatch {
  track: Track;
  ncd: number;
  similarity: number;
}

export interface RankedMatchList {
  algorithm: string;
  matches: RankedMatch[];
  /** Number of leading matches before the similarity curve flattens. */
  cutoff: number;
}

export interface MatchSummary {
  trackId: string;
  ncd: number;
}

export interface ExperimentResult {
  queryId: string;
  queryPath: string;
  compressor: Algorithm;
  noiseLevel: number;
  bestMatch: string;
  ncd: number;
  topMatches: MatchSummary[];
  cutoff: number;
  processingTimeMs: number;
  trueTrack?: string;
  correct?: boolean;
}

export type FailureKind =
  | 'external_tool'
  | 'audio_format'
  | 'mismatched_parameters'
  | 'unknown';

export interface CellFailure {
  queryId: string;
  queryPath: string;
  compressor: Algorithm;
  noiseLevel: number;
  kind: FailureKind;
  message: string;
}

export interface BatchOutcome {
  results: ExperimentResult[];
  failures: CellFailure[];
  cancelled: boolean;
}

export interface BuildOutcome {
  database: SignatureDatabase;
  failures: { source: string; message: string }[];
}

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}
