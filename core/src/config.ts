import { z } from 'zod';
import { Algorithm, SignatureParams } from './types';

export const DEFAULT_SIGNATURE_PARAMS: SignatureParams = {
  windowSize: 1024,
  shift: 256,
  downSampling: 4,
  nFreqs: 4
};

export const signatureParamsSchema = z.object({
  windowSize: z.number().int().positive(),
  shift: z.number().int().positive(),
  downSampling: z.number().int().positive(),
  nFreqs: z.number().int().positive()
});

export const configSchema = z.object({
  databaseDir: z.string().default('./database'),
  signaturesDir: z.string().default('./signatures'),
  queriesDir: z.string().default('./queries'),
  resultsDir: z.string().default('./results'),
  extractorPath: z.string().default('./GetMaxFreqs/bin/GetMaxFreqs'),
  soxPath: z.string().default('sox'),
  signature: signatureParamsSchema.default(DEFAULT_SIGNATURE_PARAMS),
  compressors: z
    .array(z.nativeEnum(Algorithm))
    .nonempty()
    .default([Algorithm.GZIP, Algorithm.BZIP2, Algorithm.LZMA, Algorithm.ZSTD]),
  noiseLevels: z.array(z.number().min(0).max(1)).nonempty().default([0, 0.02, 0.05, 0.1]),
  topK: z.number().int().positive().default(10),
  toolTimeoutMs: z.number().int().positive().default(120_000),
  seed: z.number().int().default(42),
  concurrency: z.number().int().positive().default(1),
  cutoff: z
    .object({
      window: z.number().int().positive().default(3),
      threshold: z.number().positive().default(0.03)
    })
    .default({})
});

/** Shape of `ncdmatch.config.json`: every key optional, unknown keys rejected. */
export const configFileSchema = configSchema.partial().strict();

export type NcdMatchConfig = z.infer<typeof configSchema>;
export type NcdMatchConfigInput = z.input<typeof configSchema>;

export const DEFAULT_CONFIG: NcdMatchConfig = configSchema.parse({});

export interface ConfigSources {
  file?: NcdMatchConfigInput;
  flags?: NcdMatchConfigInput;
  env?: NodeJS.ProcessEnv;
}

/**
 * Defaults, then the config file, then NCDMATCH_EXTRACTOR / NCDMATCH_SOX,
 * then command line flags. Undefined flag values do not override.
 */
export function resolveConfig(sources: ConfigSources = {}): NcdMatchConfig {
  const env = sources.env ?? process.env;
  const merged: NcdMatchConfigInput = { ...sources.file };
  if (env.NCDMATCH_EXTRACTOR) merged.extractorPath = env.NCDMATCH_EXTRACTOR;
  if (env.NCDMATCH_SOX) merged.soxPath = env.NCDMATCH_SOX;
  for (const [key, value] of Object.entries(sources.flags ?? {})) {
    if (value !== undefined) Object.assign(merged, { [key]: value });
  }
  return configSchema.parse(merged);
}
