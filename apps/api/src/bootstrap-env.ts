import { Logger } from '@nestjs/common';
import { mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { applyFileBackedEnv } from './security/secret-source';

export type BootstrapEnv = {
  dataDir: string;
};

/** Resolve `*_FILE` secrets and make sure APP_DATA_DIR exists before the app module loads. */
export async function ensureBootstrapEnv(env: NodeJS.ProcessEnv = process.env): Promise<BootstrapEnv> {
  const logger = new Logger('Bootstrap');
  const loaded = applyFileBackedEnv(env);
  if (loaded.length) logger.log(`Loaded from *_FILE: ${loaded.join(', ')}`);

  const dataDir = env.APP_DATA_DIR?.trim() || join(process.cwd(), 'data');
  env.APP_DATA_DIR = dataDir;
  await mkdir(dataDir, { recursive: true });

  return { dataDir };
}
