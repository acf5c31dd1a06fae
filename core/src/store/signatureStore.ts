import path from 'path';
import { randomBytes } from 'crypto';
import fs from 'fs-extra';
import {
  BuildOutcome,
  CandidateSignature,
  Logger,
  SignatureDatabase,
  SignatureParams,
  Track
} from '../types';
import {
  DatabaseNotFoundError,
  EmptyDatabaseError,
  SignatureNotFoundError,
  errorMessage
} from '../errors';
import { silentLogger } from '../util/logger';
import { withTempArena } from '../util/tempArena';
import { SignatureExtractor } from '../tools/extractor';
import { AudioStandardizer } from '../tools/sox';
import { INDEX_VERSION, IndexFile, indexSchema } from './schema';

export const AUDIO_EXTENSIONS = ['.wav', '.flac', '.mp3'];
export const SIGNATURE_EXTENSION = '.freqs';
export const INDEX_FILE = 'index.json';
/** Below this many sources a build still runs but warns. */
export const RECOMMENDED_MIN_TRACKS = 25;

export interface BuildTools {
  extractor: SignatureExtractor;
  standardizer: AudioStandardizer;
  timeoutMs?: number;
}

export interface StoreOptions {
  logger?: Logger;
}

/**
 * List audio files directly inside dir, sorted by name.
 */
export async function listAudioFiles(dir: string, extensions: string[] = AUDIO_EXTENSIONS): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  return entries
    .filter(e => e.isFile() && extensions.includes(path.extname(e.name).toLowerCase()))
    .map(e => path.join(dir, e.name))
    .sort();
}

export function sameParams(a: SignatureParams, b: SignatureParams): boolean {
  return a.windowSize === b.windowSize
    && a.shift === b.shift
    && a.downSampling === b.downSampling
    && a.nFreqs === b.nFreqs;
}

/**
 * On-disk signature database.
 *
 *   <root>/index.json                      track id -> signature path, plus params
 *   <root>/database/<buildId>/<id>.freqs   reference signatures of one build
 *   <root>/queries/                        query signatures
 *
 * Each build writes a fresh signature directory and only becomes current
 * once the index pointing at it has been renamed into place.
 */
export class SignatureStore {
  readonly root: string;
  private readonly logger: Logger;

  constructor(root: string, options: StoreOptions = {}) {
    this.root = path.resolve(root);
    this.logger = options.logger ?? silentLogger;
  }

  get indexPath(): string {
    return path.join(this.root, INDEX_FILE);
  }

  get databaseDir(): string {
    return path.join(this.root, 'database');
  }

  get queriesDir(): string {
    return path.join(this.root, 'queries');
  }

  exists(): Promise<boolean> {
    return fs.pathExists(this.indexPath);
  }

  /**
   * Extract a signature for every audio file in tracksDir. Sources that fail
   * are logged and skipped; only a build with no signature at all fails.
   */
  async build(tracksDir: string, params: SignatureParams, tools: BuildTools): Promise<BuildOutcome> {
    const sources = await listAudioFiles(tracksDir);
    if (sources.length < RECOMMENDED_MIN_TRACKS) {
      this.logger.warn(`Only ${sources.length} audio files found in ${tracksDir} (recommended: ${RECOMMENDED_MIN_TRACKS})`);
    }
    this.logger.info(`Found ${sources.length} audio files`);

    const buildId = `${Date.now().toString(36)}-${randomBytes(4).toString('hex')}`;
    const buildDir = path.join(this.databaseDir, buildId);
    await fs.ensureDir(buildDir);

    const tracks: Track[] = [];
    const failures: BuildOutcome['failures'] = [];
    const seen = new Set<string>();

    try {
      await withTempArena(async arena => {
        for (const source of sources) {
          const id = path.parse(source).name;
          if (seen.has(id)) {
            this.logger.warn(`Skipping ${path.basename(source)}: duplicate track id ${id}`);
            failures.push({ source, message: `duplicate track id ${id}` });
            continue;
          }
          seen.add(id);

          const signaturePath = path.join(buildDir, `${id}${SIGNATURE_EXTENSION}`);
          try {
            await arena.scope(id, async dir => {
              const wav = path.join(dir, 'standardized.wav');
              await tools.standardizer.standardize(source, wav, { timeoutMs: tools.timeoutMs });
              await tools.extractor.extract(wav, signaturePath, params, { timeoutMs: tools.timeoutMs });
            });
            tracks.push({ id, audioPath: source, signaturePath });
            this.logger.info(`Generated signature for ${path.basename(source)}`);
          } catch (error) {
            this.logger.warn(`Failed to generate signature for ${path.basename(source)}: ${errorMessage(error)}`, {
              source,
              params
            });
            failures.push({ source, message: errorMessage(error) });
          }
        }
      }, 'ncdmatch-build-');

      if (tracks.length === 0) {
        throw new EmptyDatabaseError(`No signatures could be generated from ${tracksDir}`);
      }

      const database: SignatureDatabase = {
        version: INDEX_VERSION,
        createdAt: new Date().toISOString(),
        params: { ...params },
        tracks
      };
      await this.persist(database);
      await this.removeStaleBuilds(buildId);
      this.logger.info(`Successfully generated ${tracks.length} signatures`);
      return { database, failures };
    } catch (error) {
      await fs.remove(buildDir);
      throw error;
    }
  }

  /**
   * Read the index and keep the tracks whose signature file still exists.
   */
  async load(): Promise<SignatureDatabase> {
    let index: IndexFile;
    try {
      index = indexSchema.parse(await fs.readJson(this.indexPath));
    } catch (error) {
      throw new DatabaseNotFoundError(this.indexPath, { cause: error });
    }

    const tracks: Track[] = [];
    for (const entry of index.tracks) {
      const track = { ...entry, signaturePath: path.resolve(this.root, entry.signaturePath) };
      if (await fs.pathExists(track.signaturePath)) {
        tracks.push(Object.freeze(track));
      } else {
        this.logger.warn(new SignatureNotFoundError(track.id, track.signaturePath).message);
      }
    }

    if (tracks.length === 0) {
      throw new EmptyDatabaseError();
    }
    this.logger.info(`Loaded ${tracks.length} signatures`);

    return Object.freeze({
      version: index.version,
      createdAt: index.createdAt,
      params: Object.freeze({ ...index.params }),
      tracks: Object.freeze(tracks)
    });
  }

  /**
   * Replace the index atomically: write a temp file beside it, then rename.
   */
  async persist(database: SignatureDatabase): Promise<void> {
    const index: IndexFile = {
      version: INDEX_VERSION,
      createdAt: database.createdAt,
      params: { ...database.params },
      tracks: database.tracks.map(t => ({
        id: t.id,
        audioPath: t.audioPath,
        signaturePath: path.relative(this.root, path.resolve(this.root, t.signaturePath)).split(path.sep).join('/')
      }))
    };

    await fs.ensureDir(this.root);
    const tmp = `${this.indexPath}.${randomBytes(6).toString('hex')}.tmp`;
    try {
      await fs.writeJson(tmp, index, { spaces: 2 });
      await fs.rename(tmp, this.indexPath);
    } catch (error) {
      await fs.remove(tmp);
      throw error;
    }
  }

  /**
   * Read every track's signature bytes, tagged with the database params.
   */
  async readSignatures(database: SignatureDatabase): Promise<CandidateSignature[]> {
    return Promise.all(
      database.tracks.map(async track => {
        let bytes: Buffer;
        try {
          bytes = await fs.readFile(track.signaturePath);
        } catch {
          throw new SignatureNotFoundError(track.id, track.signaturePath);
        }
        return Object.freeze({ track, signature: Object.freeze({ bytes, params: database.params }) });
      })
    );
  }

  private async removeStaleBuilds(currentBuildId: string): Promise<void> {
    const entries = await fs.readdir(this.databaseDir);
    await Promise.all(
      entries.filter(name => name !== currentBuildId).map(name => fs.remove(path.join(this.databaseDir, name)))
    );
  }
}
