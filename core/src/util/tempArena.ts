import os from 'os';
import path from 'path';
import fs from 'fs-extra';

/**
 * A temporary directory that owns every working file created under it.
 * Directories handed out by {@link TempArena.scope} are removed when the
 * scoped callback settles, whatever the outcome.
 */
export class TempArena {
  private counter = 0;

  private constructor(readonly root: string) {}

  static async create(prefix = 'ncdmatch-'): Promise<TempArena> {
    const root = await fs.mkdtemp(path.join(os.tmpdir(), prefix));
    return new TempArena(root);
  }

  async scope<T>(label: string, fn: (dir: string) => Promise<T>): Promise<T> {
    const dir = path.join(this.root, `${String(++this.counter).padStart(4, '0')}-${safeName(label)}`);
    await fs.ensureDir(dir);
    try {
      return await fn(dir);
    } finally {
      await fs.remove(dir);
    }
  }

  async dispose(): Promise<void> {
    await fs.remove(this.root);
  }
}

/**
 * Run fn with a fresh arena and remove it afterwards.
 */
export async function withTempArena<T>(fn: (arena: TempArena) => Promise<T>, prefix?: string): Promise<T> {
  const arena = await TempArena.create(prefix);
  try {
    return await fn(arena);
  } finally {
    await arena.dispose();
  }
}

export function safeName(label: string): string {
  return label.replace(/[^A-Za-z0-9._-]+/g, '_').slice(0, 64);
}
