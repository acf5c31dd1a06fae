import path from 'path';
import fs from 'fs-extra';
import { configFileSchema, NcdMatchConfig, NcdMatchConfigInput, resolveConfig } from '@ncdmatch/core';

export const DEFAULT_CONFIG_FILE = 'ncdmatch.config.json';

/**
 * Read and validate a config file. Without an explicit path the default file
 * is optional.
 */
export async function readConfigFile(configPath?: string, cwd = process.cwd()): Promise<NcdMatchConfigInput | undefined> {
  const file = path.resolve(cwd, configPath ?? DEFAULT_CONFIG_FILE);
  if (!await fs.pathExists(file)) {
    if (configPath) throw new Error(`Config file not found: ${file}`);
    return undefined;
  }

  const parsed = configFileSchema.safeParse(await fs.readJson(file));
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new Error(`Invalid config file ${file}: ${issues.join('; ')}`);
  }
  return parsed.data;
}

export async function loadConfig(
  configPath: string | undefined,
  flags: NcdMatchConfigInput = {},
  env: NodeJS.ProcessEnv = process.env
): Promise<NcdMatchConfig> {
  return resolveConfig({ file: await readConfigFile(configPath), flags, env });
}
