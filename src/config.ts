import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';

export interface DataFlashConfig {
  schemaFile: string;
  flagsFile: string;
  debug: boolean;
}

// Sources live one level below the package root, the build output two levels.
const findDataDir = (): string => {
  const candidates = ['../data/', '../../data/'].map((rel: string): string => fileURLToPath(new URL(rel, import.meta.url)));
  return candidates.find((dir: string): boolean => existsSync(dir)) ?? candidates[0] ?? 'data';
};

export const isTruthyFlag = (v: string | undefined): boolean => v === '1' || v === 'true';

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): DataFlashConfig => {
  const dataDir = findDataDir();
  return {
    schemaFile: env.DATAFLASH_SCHEMA || join(dataDir, 'data_descriptions.csv'),
    flagsFile: env.DATAFLASH_FLAGS || join(dataDir, 'register_flags.json'),
    debug: isTruthyFlag(env.DATAFLASH_DEBUG),
  };
};
