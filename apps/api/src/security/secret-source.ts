import { Logger } from '@nestjs/common';
import { readFileSync } from 'node:fs';

type EnvLike = Record<string, string | undefined>;

const logger = new Logger('SecretSource');

function errToMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Docker/Kubernetes secrets: `SERVER_API_TOKEN_FILE=/run/secrets/token` fills
 * `SERVER_API_TOKEN` from the file unless it is already set. One trailing newline is dropped.
 * Returns the keys that were filled.
 */
export function applyFileBackedEnv(env: EnvLike = process.env): string[] {
  const loaded: string[] = [];
  for (const [fileKey, rawPath] of Object.entries(env)) {
    if (!fileKey.endsWith('_FILE')) continue;
    const targetKey = fileKey.slice(0, -'_FILE'.length);
    if (!targetKey || env[targetKey]?.trim()) continue;
    const filePath = rawPath?.trim();
    if (!filePath) continue;

    try {
      env[targetKey] = readFileSync(filePath, 'utf8').replace(/\r\n/g, '\n').replace(/\n$/, '');
      loaded.push(targetKey);
    } catch (err) {
      // The config loader reports the value as missing if it was required.
      logger.warn(`Could not read ${fileKey}: ${errToMessage(err)}`);
    }
  }
  return loaded;
}
