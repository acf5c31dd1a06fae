import fs from 'fs-extra';
import { Algorithm } from '../types';
import { clamp } from '../util/stats';
import { BackendRegistry, CompressionBackend } from './backends';

/**
 * Normalized compression distance between x and y.
 *
 *   NCD(x, y) = (C(xy) - min(C(x), C(y))) / max(C(x), C(y))
 *
 * The joint term always compresses x followed by y. Compressors do not
 * guarantee C(xy) == C(yx), so NCD(x, y) and NCD(y, x) can differ slightly.
 * The result is clamped to [0, 1].
 */
export function computeNcd(x: Uint8Array, y: Uint8Array, backend: CompressionBackend): number {
  const cx = backend.compressedSize(x);
  const cy = backend.compressedSize(y);
  const cxy = backend.compressedSize(concatBytes(x, y));

  const denominator = Math.max(cx, cy);
  if (denominator === 0) return 0;

  const ncd = (cxy - Math.min(cx, cy)) / denominator;
  return clamp(ncd, 0, 1);
}

/**
 * Mean of both concatenation orders. Not used for ranking: switching to it
 * would shift every stored NCD value.
 */
export function symmetricNcd(x: Uint8Array, y: Uint8Array, backend: CompressionBackend): number {
  return (computeNcd(x, y, backend) + computeNcd(y, x, backend)) / 2;
}

export function concatBytes(a: Uint8Array, b: Uint8Array): Uint8Array {
  const out = new Uint8Array(a.length + b.length);
  out.set(a, 0);
  out.set(b, a.length);
  return out;
}

export class NcdCalculator {
  constructor(private readonly registry: BackendRegistry = new BackendRegistry()) {}

  async ncd(x: Uint8Array, y: Uint8Array, algorithm: Algorithm | string): Promise<number> {
    const backend = await this.registry.get(algorithm);
    return computeNcd(x, y, backend);
  }

  async ncdFromFiles(fileA: string, fileB: string, algorithm: Algorithm | string): Promise<number> {
    const backend = await this.registry.get(algorithm);
    const [a, b] = await Promise.all([fs.readFile(fileA), fs.readFile(fileB)]);
    return computeNcd(a, b, backend);
  }

  /**
   * NCD of the same pair under every supported compressor.
   */
  async compareAll(x: Uint8Array, y: Uint8Array): Promise<Record<Algorithm, number>> {
    const [gzip, bzip2, lzma, zstd] = await Promise.all([
      this.ncd(x, y, Algorithm.GZIP),
      this.ncd(x, y, Algorithm.BZIP2),
      this.ncd(x, y, Algorithm.LZMA),
      this.ncd(x, y, Algorithm.ZSTD)
    ]);
    return {
      [Algorithm.GZIP]: gzip,
      [Algorithm.BZIP2]: bzip2,
      [Algorithm.LZMA]: lzma,
      [Algorithm.ZSTD]: zstd
    };
  }
}
