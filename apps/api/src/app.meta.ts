export const DEFAULT_APP_VERSION = '0.1.0';

export type AppMeta = {
  name: string;
  version: string;
  buildSha: string | null;
  buildTime: string | null;
};

export function readAppMeta(env: NodeJS.ProcessEnv = process.env): AppMeta {
  return {
    name: 'digestarr',
    version: env.APP_VERSION?.trim() || DEFAULT_APP_VERSION,
    buildSha: env.APP_BUILD_SHA?.trim() || null,
    buildTime: env.APP_BUILD_TIME?.trim() || null,
  };
}
