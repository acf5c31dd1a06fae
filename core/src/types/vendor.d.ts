// compressjs, lzma and zstd-codec publish no typings and have no @types packages.

declare module 'compressjs' {
  interface CompressJsAlgorithm {
    compressFile(input: Uint8Array | number[], output?: undefined, blockSizeMax?: number): ArrayLike<number>;
  }
  export const Bzip2: CompressJsAlgorithm;
}

declare module 'lzma' {
  export function compress(data: string | number[], mode: number): ArrayLike<number>;
}

declare module 'zstd-codec' {
  interface ZstdSimple {
    compress(data: Uint8Array, level?: number): Uint8Array | null;
  }
  interface ZstdBinding {
    Simple: new () => ZstdSimple;
  }
  export const ZstdCodec: {
    run(callback: (zstd: ZstdBinding) => void): void;
  };
}
