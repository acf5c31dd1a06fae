import { ExperimentResult } from '../types';
import { groupBy, max, mean, min, sampleStd } from '../util/stats';

/** One row of the result table, as written to and read back from CSV. */
export interface ResultRow {
  query: string;
  trueTrack?: string;
  noiseLevel: number;
  predicted: string;
  ncd: number;
  compressor: string;
  correct?: boolean;
  processingTimeMs: number;
  cutoff: number;
  topMatches: string[];
}

export interface NcdStats {
  mean: number;
  std: number;
  min: number;
  max: number;
}

export interface GroupSummary {
  cells: number;
  /** Share of cells with known truth whose best match was right; null without truth. */
  accuracy: number | null;
  ncd: NcdStats;
  meanProcessingTimeMs: number;
}

export interface CompressorSummary extends GroupSummary {
  compressor: string;
}

export interface NoiseSummary extends GroupSummary {
  noiseLevel: number;
  compressor: string;
}

export interface ExperimentSummary {
  totalCells: number;
  uniqueQueries: number;
  compressors: string[];
  noiseLevels: number[];
  overallAccuracy: number | null;
  topKAccuracy: { k: number; accuracy: number | null }[];
  ncd: NcdStats;
  meanProcessingTimeMs: number;
  byCompressor: CompressorSummary[];
  byNoise: NoiseSummary[];
}

export const TOP_K_LEVELS = [1, 3, 5];

/**
 * Work out which reference track a query was cut from. An explicit mapping
 * wins; otherwise the query name is expected to look like
 * `<track>_segment_<n>[...]` or `<track>_<anything>`.
 */
export function inferTrueTrack(queryId: string, groundTruth?: Record<string, string>): string | undefined {
  if (groundTruth && Object.prototype.hasOwnProperty.call(groundTruth, queryId)) {
    return groundTruth[queryId];
  }
  const segmentAt = queryId.indexOf('_segment_');
  if (segmentAt > 0) return queryId.slice(0, segmentAt);
  const underscore = queryId.indexOf('_');
  if (underscore > 0) return queryId.slice(0, underscore);
  return undefined;
}

/** A prediction counts as correct when it contains the true track id. */
export function isCorrect(predicted: string, trueTrack: string | undefined): boolean | undefined {
  if (!trueTrack) return undefined;
  return predicted.includes(trueTrack);
}

export function toRow(result: ExperimentResult): ResultRow {
  return {
    query: result.queryId,
    trueTrack: result.trueTrack,
    noiseLevel: result.noiseLevel,
    predicted: result.bestMatch,
    ncd: result.ncd,
    compressor: result.compressor,
    correct: result.correct,
    processingTimeMs: result.processingTimeMs,
    cutoff: result.cutoff,
    topMatches: result.topMatches.map(m => m.trackId)
  };
}

function ncdStats(rows: readonly ResultRow[]): NcdStats {
  const values = rows.map(r => r.ncd);
  return { mean: mean(values), std: sampleStd(values), min: min(values), max: max(values) };
}

function accuracy(rows: readonly ResultRow[]): number | null {
  const judged = rows.filter(r => r.correct !== undefined);
  if (judged.length === 0) return null;
  return judged.filter(r => r.correct).length / judged.length;
}

function topKAccuracy(rows: readonly ResultRow[], k: number): number | null {
  const judged = rows.filter(r => r.trueTrack);
  if (judged.length === 0) return null;
  const hits = judged.filter(r => {
    const truth = r.trueTrack ?? '';
    return r.topMatches.slice(0, k).some(m => m.includes(truth));
  });
  return hits.length / judged.length;
}

function groupSummary(rows: readonly ResultRow[]): GroupSummary {
  return {
    cells: rows.length,
    accuracy: accuracy(rows),
    ncd: ncdStats(rows),
    meanProcessingTimeMs: mean(rows.map(r => r.processingTimeMs))
  };
}

/**
 * Aggregate completed cells. Failed cells never reach the table, so they
 * are excluded by construction.
 */
export function summarize(rows: readonly ResultRow[]): ExperimentSummary {
  const byCompressor = [...groupBy(rows, r => r.compressor)].map(([compressor, group]) => ({
    compressor,
    ...groupSummary(group)
  }));

  const byNoise = [...groupBy(rows, r => `${r.noiseLevel}\u0000${r.compressor}`).values()]
    .map(group => ({ noiseLevel: group[0].noiseLevel, compressor: group[0].compressor, ...groupSummary(group) }))
    .sort((a, b) => a.noiseLevel - b.noiseLevel || a.compressor.localeCompare(b.compressor));

  return {
    totalCells: rows.length,
    uniqueQueries: new Set(rows.map(r => r.query)).size,
    compressors: byCompressor.map(c => c.compressor),
    noiseLevels: [...new Set(rows.map(r => r.noiseLevel))].sort((a, b) => a - b),
    overallAccuracy: accuracy(rows),
    topKAccuracy: TOP_K_LEVELS.map(k => ({ k, accuracy: topKAccuracy(rows, k) })),
    ncd: ncdStats(rows),
    meanProcessingTimeMs: mean(rows.map(r => r.processingTimeMs)),
    byCompressor,
    byNoise
  };
}

const pad = (s: string, n = 10) => s.padEnd(n);
const fmt = (v: number | null, digits = 3) => (v === null ? 'n/a' : v.toFixed(digits));

/**
 * Plain-text evaluation report.
 */
export function formatReport(summary: ExperimentSummary): string {
  const lines: string[] = [];
  lines.push('MUSIC IDENTIFICATION EVALUATION REPORT');
  lines.push('='.repeat(50));
  lines.push('');

  lines.push('BASIC STATISTICS:');
  lines.push(`Total cells: ${summary.totalCells}`);
  lines.push(`Unique queries: ${summary.uniqueQueries}`);
  lines.push(`Compressors tested: ${summary.compressors.join(', ')}`);
  lines.push(`Noise levels tested: ${summary.noiseLevels.join(', ')}`);
  lines.push('');

  if (summary.overallAccuracy !== null) {
    lines.push('ACCURACY RESULTS:');
    lines.push(`Overall accuracy: ${fmt(summary.overallAccuracy)}`);
    lines.push('Accuracy by compressor:');
    for (const c of summary.byCompressor) {
      lines.push(`  ${pad(c.compressor)}: ${fmt(c.accuracy)}`);
    }
    for (const { k, accuracy: acc } of summary.topKAccuracy) {
      lines.push(`Top-${k} accuracy: ${fmt(acc)}`);
    }
    lines.push('');
  }

  lines.push('NCD STATISTICS:');
  lines.push(`Mean NCD: ${fmt(summary.ncd.mean, 4)} ± ${fmt(summary.ncd.std, 4)}`);
  lines.push(`NCD range: [${fmt(summary.ncd.min, 4)}, ${fmt(summary.ncd.max, 4)}]`);
  lines.push('Mean NCD by compressor:');
  for (const c of summary.byCompressor) {
    lines.push(`  ${pad(c.compressor)}: ${fmt(c.ncd.mean, 4)} ± ${fmt(c.ncd.std, 4)}`);
  }
  lines.push('');

  lines.push('PERFORMANCE STATISTICS:');
  lines.push(`Mean processing time: ${fmt(summary.meanProcessingTimeMs / 1000)}s`);
  lines.push('Processing time by compressor:');
  for (const c of summary.byCompressor) {
    lines.push(`  ${pad(c.compressor)}: ${fmt(c.meanProcessingTimeMs / 1000)}s`);
  }
  lines.push('');

  if (summary.noiseLevels.length > 1) {
    lines.push('NOISE ROBUSTNESS:');
    lines.push(`  ${pad('noise', 8)}${pad('compressor')}${pad('cells', 7)}${pad('accuracy')}mean NCD`);
    for (const n of summary.byNoise) {
      lines.push(
        `  ${pad(n.noiseLevel.toFixed(3), 8)}${pad(n.compressor)}${pad(String(n.cells), 7)}${pad(fmt(n.accuracy))}${fmt(n.ncd.mean, 4)}`
      );
    }
    lines.push('');
  }

  return lines.join('\n');
}
