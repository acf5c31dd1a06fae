import { CandidateSignature, RankedMatch, RankedMatchList, Signature } from '../types';
import { MismatchedParametersError } from '../errors';
import { CompressionBackend } from '../compression/backends';
import { computeNcd } from '../compression/ncd';
import { sameParams } from '../store/signatureStore';

export const DEFAULT_CUTOFF_WINDOW = 3;
export const DEFAULT_CUTOFF_THRESHOLD = 0.03;

export interface CutoffOptions {
  window?: number;
  threshold?: number;
}

/**
 * Walk a similarity sequence and return the length of the prefix that still
 * carries signal: the first i where `window` consecutive differences
 * |s[k+1] - s[k]| (k = i .. i+window-1) are all below `threshold` gives i + 1.
 * Returns n when the sequence never settles or has n <= window entries.
 */
export function stabilizationIndex(
  similarities: readonly number[],
  window = DEFAULT_CUTOFF_WINDOW,
  threshold = DEFAULT_CUTOFF_THRESHOLD
): number {
  const n = similarities.length;
  if (n <= window) return n;

  const diffs: number[] = [];
  for (let i = 0; i < n - 1; i++) {
    diffs.push(Math.abs(similarities[i + 1] - similarities[i]));
  }

  for (let i = 0; i + window <= diffs.length; i++) {
    let stable = true;
    for (let k = i; k < i + window; k++) {
      if (diffs[k] >= threshold) {
        stable = false;
        break;
      }
    }
    if (stable) return i + 1;
  }
  return n;
}

export function stabilizationCutoff(matches: readonly RankedMatch[], options: CutoffOptions = {}): number {
  return stabilizationIndex(
    matches.map(m => 1 - m.ncd),
    options.window,
    options.threshold
  );
}

/**
 * Rank candidates by NCD to the query, lowest first. Candidates with equal
 * NCD keep their enumeration order.
 */
export function rank(
  query: Signature,
  candidates: readonly CandidateSignature[],
  backend: CompressionBackend,
  options: CutoffOptions = {}
): RankedMatchList {
  for (const candidate of candidates) {
    if (!sameParams(query.params, candidate.signature.params)) {
      throw new MismatchedParametersError(
        candidate.track.id,
        `signature params ${describeParams(candidate.signature.params)} differ from query params ${describeParams(query.params)}`
      );
    }
  }

  const scored = candidates.map((candidate, order) => {
    const ncd = computeNcd(query.bytes, candidate.signature.bytes, backend);
    return { order, match: { track: candidate.track, ncd, similarity: 1 - ncd } };
  });
  scored.sort((a, b) => a.match.ncd - b.match.ncd || a.order - b.order);

  const matches = scored.map(s => s.match);
  return {
    algorithm: backend.algorithm,
    matches,
    cutoff: stabilizationCutoff(matches, options)
  };
}

function describeParams(p: Signature['params']): string {
  return `ws=${p.windowSize} sh=${p.shift} ds=${p.downSampling} nf=${p.nFreqs}`;
}

export class RankingEngine {
  constructor(private readonly cutoff: CutoffOptions = {}) {}

  rank(query: Signature, candidates: readonly CandidateSignature[], backend: CompressionBackend): RankedMatchList {
    return rank(query, candidates, backend, this.cutoff);
  }

  stabilizationCutoff(matches: readonly RankedMatch[]): number {
    return stabilizationCutoff(matches, this.cutoff);
  }
}
