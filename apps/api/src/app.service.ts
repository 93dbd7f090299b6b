import { Inject, Injectable } from '@nestjs/common';
import { constants as fsConstants, existsSync } from 'node:fs';
import { access, stat } from 'node:fs/promises';
import type { HealthResponseDto } from './app.dto';
import { readAppMeta, type AppMeta } from './app.meta';
import { errToMessage } from './newsletter/newsletter.errors';
import { APP_CONFIG, type AppConfig } from './settings/settings.types';

export type ReadinessCheck =
  | { ok: true }
  | {
      ok: false;
      error: string;
    };

export type ReadinessResponse = {
  status: 'ready' | 'not_ready';
  time: string;
  checks: {
    dataDir: ReadinessCheck;
    outputDir: ReadinessCheck;
  };
};

/** A directory we need to create files in: write + execute (search). */
async function checkWritableDir(dir: string | null | undefined, label: string): Promise<ReadinessCheck> {
  if (!dir) return { ok: false, error: `${label} is not set` };
  try {
    const s = await stat(dir);
    if (!s.isDirectory()) return { ok: false, error: `${label} is not a directory` };
    await access(dir, fsConstants.W_OK | fsConstants.X_OK);
    return { ok: true };
  } catch (err) {
    return { ok: false, error: errToMessage(err) };
  }
}

@Injectable()
export class AppService {
  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {}

  getHealth(): HealthResponseDto {
    return {
      status: 'ok' as const,
      time: new Date().toISOString(),
    };
  }

  getMeta(): AppMeta {
    return readAppMeta();
  }

  async getReadiness(): Promise<ReadinessResponse> {
    const time = new Date().toISOString();
    const outputDir = this.config.newsletter.outputDir;

    const checks: ReadinessResponse['checks'] = {
      dataDir: await checkWritableDir(process.env.APP_DATA_DIR?.trim(), 'APP_DATA_DIR'),
      // The store creates output_dir on first delivery; only an existing one is checked.
      outputDir:
        outputDir && existsSync(outputDir)
          ? await checkWritableDir(outputDir, 'newsletter.output_dir')
          : { ok: true },
    };

    const status =
      checks.dataDir.ok && checks.outputDir.ok ? ('ready' as const) : ('not_ready' as const);

    return { status, time, checks };
  }
}
