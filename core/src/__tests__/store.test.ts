import path from 'path';
import fs from 'fs-extra';
import { DatabaseNotFoundError, EmptyDatabaseError } from '../errors';
import { listAudioFiles, sameParams, SignatureStore } from '../store/signatureStore';
import { CopyExtractor, CopyStandardizer, makeTempDir, PARAMS, recordingLogger } from './helpers';

describe('SignatureStore', () => {
  let workDir: string;
  let tracksDir: string;

  beforeEach(async () => {
    workDir = await makeTempDir();
    tracksDir = path.join(workDir, 'tracks');
    await fs.ensureDir(tracksDir);
    await fs.writeFile(path.join(tracksDir, 'a.wav'), 'AAAA');
    await fs.writeFile(path.join(tracksDir, 'b.flac'), 'BBBB');
    await fs.writeFile(path.join(tracksDir, 'bad.mp3'), 'BAD');
    await fs.writeFile(path.join(tracksDir, 'notes.txt'), 'ignored');
  });

  afterEach(async () => {
    await fs.remove(workDir);
  });

  function tools(failOn: string[] = ['BAD']) {
    return { extractor: new CopyExtractor(failOn), standardizer: new CopyStandardizer() };
  }

  describe('listAudioFiles', () => {
    it('should list supported audio files sorted by name', async () => {
      const files = await listAudioFiles(tracksDir);
      expect(files.map(f => path.basename(f))).toEqual(['a.wav', 'b.flac', 'bad.mp3']);
    });
  });

  describe('build', () => {
    it('should skip sources that fail and keep the rest', async () => {
      const logger = recordingLogger();
      const store = new SignatureStore(path.join(workDir, 'signatures'), { logger });

      const { database, failures } = await store.build(tracksDir, PARAMS, tools());

      expect(database.tracks.map(t => t.id)).toEqual(['a', 'b']);
      expect(database.params).toEqual(PARAMS);
      expect(failures).toEqual([{ source: path.join(tracksDir, 'bad.mp3'), message: 'cannot extract standardized.wav' }]);
      expect(await fs.readFile(database.tracks[0].signaturePath, 'utf-8')).toBe('AAAA');
      expect(await store.exists()).toBe(true);
      expect(logger.lines).toContainEqual({ level: 'warn', message: `Only 3 audio files found in ${tracksDir} (recommended: 25)` });
    });

    it('should pass the requested parameters to the extractor', async () => {
      const store = new SignatureStore(path.join(workDir, 'signatures'));
      const buildTools = tools();
      const params = { ...PARAMS, nFreqs: 8 };

      await store.build(tracksDir, params, buildTools);

      expect(buildTools.extractor.calls.map(c => c.params)).toEqual([params, params, params]);
    });

    it('should fail with EmptyDatabaseError and leave nothing behind when every source fails', async () => {
      const store = new SignatureStore(path.join(workDir, 'signatures'));

      await expect(store.build(tracksDir, PARAMS, tools(['AAAA', 'BBBB', 'BAD']))).rejects.toThrow(EmptyDatabaseError);
      expect(await fs.readdir(store.databaseDir)).toEqual([]);
      expect(await store.exists()).toBe(false);
    });

    it('should replace the previous build', async () => {
      const store = new SignatureStore(path.join(workDir, 'signatures'));
      await store.build(tracksDir, PARAMS, tools());
      const { database } = await store.build(tracksDir, PARAMS, tools());

      const builds = await fs.readdir(store.databaseDir);
      expect(builds).toHaveLength(1);
      expect(path.dirname(database.tracks[0].signaturePath)).toBe(path.join(store.databaseDir, builds[0]));
    });
  });

  describe('load', () => {
    it('should round-trip track ids and parameters', async () => {
      const store = new SignatureStore(path.join(workDir, 'signatures'));
      const { database } = await store.build(tracksDir, PARAMS, tools());

      const loaded = await new SignatureStore(store.root).load();

      expect(loaded.tracks.map(t => t.id)).toEqual(['a', 'b']);
      expect(loaded.params).toEqual(PARAMS);
      expect(loaded.tracks.map(t => t.signaturePath)).toEqual(database.tracks.map(t => t.signaturePath));
      expect(Object.isFrozen(loaded)).toBe(true);
    });

    it('should load a database built under a relative root', async () => {
      const relativeRoot = path.relative(process.cwd(), path.join(workDir, 'signatures'));
      const store = new SignatureStore(relativeRoot);
      await store.build(path.relative(process.cwd(), tracksDir), PARAMS, tools());

      const index = await fs.readJson(store.indexPath);
      const loaded = await new SignatureStore(relativeRoot).load();

      expect(store.root).toBe(path.join(workDir, 'signatures'));
      expect(index.tracks[0].signaturePath).toMatch(/^database\/[^/]+\/a\.freqs$/);
      expect(loaded.tracks.map(t => t.id)).toEqual(['a', 'b']);
      expect(loaded.tracks[0].signaturePath).toBe(path.join(store.root, index.tracks[0].signaturePath));
    });

    it('should store signature paths relative to the root', async () => {
      const store = new SignatureStore(path.join(workDir, 'signatures'));
      await store.build(tracksDir, PARAMS, tools());

      const index = await fs.readJson(store.indexPath);
      expect(index.tracks[0].signaturePath).toMatch(/^database\/[^/]+\/a\.freqs$/);
    });

    it('should drop tracks whose signature file is missing', async () => {
      const logger = recordingLogger();
      const store = new SignatureStore(path.join(workDir, 'signatures'), { logger });
      const { database } = await store.build(tracksDir, PARAMS, tools());
      await fs.remove(database.tracks[0].signaturePath);

      const loaded = await store.load();

      expect(loaded.tracks.map(t => t.id)).toEqual(['b']);
      expect(logger.lines).toContainEqual({
        level: 'warn',
        message: `Signature for a not found at ${database.tracks[0].signaturePath}`
      });
    });

    it('should fail with EmptyDatabaseError when no signature file is left', async () => {
      const store = new SignatureStore(path.join(workDir, 'signatures'));
      await store.build(tracksDir, PARAMS, tools());
      await fs.remove(store.databaseDir);

      await expect(store.load()).rejects.toThrow(EmptyDatabaseError);
    });

    it('should fail with DatabaseNotFoundError without an index', async () => {
      const store = new SignatureStore(path.join(workDir, 'missing'));
      await expect(store.load()).rejects.toThrow(DatabaseNotFoundError);
    });

    it('should fail with DatabaseNotFoundError on a malformed index', async () => {
      const store = new SignatureStore(path.join(workDir, 'signatures'));
      await fs.outputJson(store.indexPath, { version: 1, tracks: 'nope' });

      await expect(store.load()).rejects.toThrow(DatabaseNotFoundError);
    });
  });

  describe('readSignatures', () => {
    it('should tag every signature with the database parameters', async () => {
      const store = new SignatureStore(path.join(workDir, 'signatures'));
      const { database } = await store.build(tracksDir, PARAMS, tools());

      const candidates = await store.readSignatures(database);

      expect(candidates.map(c => [c.track.id, Buffer.from(c.signature.bytes).toString('utf-8')])).toEqual([
        ['a', 'AAAA'],
        ['b', 'BBBB']
      ]);
      expect(candidates.every(c => sameParams(c.signature.params, PARAMS))).toBe(true);
    });
  });

  describe('persist', () => {
    it('should not leave temporary index files behind', async () => {
      const store = new SignatureStore(path.join(workDir, 'signatures'));
      const { database } = await store.build(tracksDir, PARAMS, tools());
      await store.persist(database);

      const entries = await fs.readdir(store.root);
      expect(entries.sort()).toEqual(['database', 'index.json']);
    });
  });
});
