/// <reference path="../types/vendor.d.ts" />
/**
 * Compression backends used only to measure compressed size.
 *
 * Every backend runs with fixed parameters so that NCD values stay comparable
 * between runs:
 *
 *   gzip   zlib deflate inside a gzip container, level 9
 *   bzip2  compressjs Bzip2, 900k blocks
 *   lzma   LZMA-JS "lzma alone" stream, mode 6
 *   zstd   zstd-codec (WebAssembly build of libzstd), level 3
 */

import { gzipSync } from 'zlib';
import { Bzip2 } from 'compressjs';
import { compress as lzmaCompress } from 'lzma';
import { ZstdCodec } from 'zstd-codec';
import { Algorithm } from '../types';
import { UnsupportedAlgorithmError } from '../errors';

export const ALGORITHMS: readonly Algorithm[] = [
  Algorithm.GZIP,
  Algorithm.BZIP2,
  Algorithm.LZMA,
  Algorithm.ZSTD
];

export const COMPRESSION_SETTINGS = {
  [Algorithm.GZIP]: { level: 9 },
  [Algorithm.BZIP2]: { blockSize: 9 },
  [Algorithm.LZMA]: { mode: 6 },
  [Algorithm.ZSTD]: { level: 3 }
} as const;

export interface CompressionBackend {
  readonly algorithm: string;
  compressedSize(data: Uint8Array): number;
}

/**
 * Resolve a user-supplied compressor name, rejecting anything outside the
 * supported set.
 */
export function parseAlgorithm(name: string): Algorithm {
  const normalized = name.trim().toLowerCase();
  const match = ALGORITHMS.find(a => a === normalized);
  if (!match) {
    throw new UnsupportedAlgorithmError(name, ALGORITHMS);
  }
  return match;
}

export function parseAlgorithms(names: readonly string[]): Algorithm[] {
  return names.map(parseAlgorithm);
}

class GzipBackend implements CompressionBackend {
  readonly algorithm = Algorithm.GZIP;

  compressedSize(data: Uint8Array): number {
    return gzipSync(data, { level: COMPRESSION_SETTINGS[Algorithm.GZIP].level }).length;
  }
}

class Bzip2Backend implements CompressionBackend {
  readonly algorithm = Algorithm.BZIP2;

  compressedSize(data: Uint8Array): number {
    return Bzip2.compressFile(data, undefined, COMPRESSION_SETTINGS[Algorithm.BZIP2].blockSize).length;
  }
}

class LzmaBackend implements CompressionBackend {
  readonly algorithm = Algorithm.LZMA;

  compressedSize(data: Uint8Array): number {
    // Omitting the completion callback makes LZMA-JS run synchronously.
    return lzmaCompress(Array.from(data), COMPRESSION_SETTINGS[Algorithm.LZMA].mode).length;
  }
}

interface ZstdSimpleCodec {
  compress(data: Uint8Array, level?: number): Uint8Array | null;
}

class ZstdBackend implements CompressionBackend {
  readonly algorithm = Algorithm.ZSTD;

  constructor(private readonly codec: ZstdSimpleCodec) {}

  compressedSize(data: Uint8Array): number {
    const out = this.codec.compress(data, COMPRESSION_SETTINGS[Algorithm.ZSTD].level);
    if (!out) {
      throw new Error(`zstd compression failed for ${data.length} bytes`);
    }
    return out.length;
  }
}

let zstdCodec: Promise<ZstdSimpleCodec> | null = null;

function loadZstdCodec(): Promise<ZstdSimpleCodec> {
  if (!zstdCodec) {
    zstdCodec = new Promise(resolve => {
      ZstdCodec.run(zstd => resolve(new zstd.Simple()));
    });
  }
  return zstdCodec;
}

/**
 * Create the backend for an algorithm. The zstd codec is a WebAssembly module
 * and is initialised once per process.
 */
export async function loadBackend(algorithm: Algorithm): Promise<CompressionBackend> {
  switch (algorithm) {
    case Algorithm.GZIP:
      return new GzipBackend();
    case Algorithm.BZIP2:
      return new Bzip2Backend();
    case Algorithm.LZMA:
      return new LzmaBackend();
    case Algorithm.ZSTD:
      return new ZstdBackend(await loadZstdCodec());
  }
}

export type BackendProvider = (algorithm: Algorithm) => Promise<CompressionBackend>;

/**
 * Caches loaded backends. Overrides replace the built-in coder for an
 * algorithm name.
 */
export class BackendRegistry {
  private readonly loaded = new Map<Algorithm, Promise<CompressionBackend>>();

  constructor(private readonly overrides: Partial<Record<Algorithm, CompressionBackend>> = {}) {}

  get(algorithm: Algorithm | string): Promise<CompressionBackend> {
    const name = parseAlgorithm(algorithm);
    const override = this.overrides[name];
    if (override) return Promise.resolve(override);

    let backend = this.loaded.get(name);
    if (!backend) {
      backend = loadBackend(name);
      this.loaded.set(name, backend);
    }
    return backend;
  }

  provider(): BackendProvider {
    return algorithm => this.get(algorithm);
  }
}
