import { Logger } from '@nestjs/common';
import { CronTime } from 'cron';
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import YAML from 'yaml';
import { normalizeTimezone } from '../lib/dates';
import { ConfigurationError, errToMessage } from '../newsletter/newsletter.errors';
import { DEFAULT_MAX_CONTEXT_BYTES } from '../newsletter/secure-renderer';
import { validateEmail, validateUrl } from '../newsletter/sanitizer';
import {
  SERVER_TYPES,
  SUPPORTED_LANGUAGES,
  type AppConfig,
  type Language,
  type ServerType,
} from './settings.types';

type EnvLike = Record<string, string | undefined>;

const PLACEHOLDER_X_RE = /x{8,}/i;

const DEFAULTS = {
  observedPeriodDays: 30,
  template: 'newsletter.html',
  runTimeoutMs: 5 * 60_000,
  enrichmentConcurrency: 4,
  cacheMaxEntries: 500,
} as const;

const logger = new Logger('ConfigLoader');

function normalizeString(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return '';
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

function pick(obj: Record<string, unknown>, path: string): unknown {
  const parts = path.split('.');
  let cur: unknown = obj;
  for (const part of parts) {
    if (!isPlainObject(cur)) return undefined;
    cur = cur[part];
  }
  return cur;
}

// setTimeout treats larger delays as 1 ms.
const MAX_TIMER_DELAY_MS = 2_147_483_647;

/** Blank values and the literal key names shipped in example configs do not count as secrets. */
export function isDisabledSecret(value: unknown, extraDisabledLiteralsUpper: string[] = []): boolean {
  const s = normalizeString(value);
  if (!s) return true;

  const disabled = new Set<string>([
    'TOKEN',
    'API_TOKEN',
    'API_KEY',
    'SERVER_API_TOKEN',
    'EMBY_API_TOKEN',
    'JELLYFIN_API_TOKEN',
    'PLEX_TOKEN',
    'TMDB_API_KEY',
    'CHANGEME',
    'CHANGE_ME',
    ...extraDisabledLiteralsUpper,
  ]);

  if (disabled.has(s.toUpperCase())) return true;
  if (PLACEHOLDER_X_RE.test(s)) return true;
  return false;
}

function envValue(env: EnvLike, key: string): string | null {
  const v = env[key]?.trim();
  return v ? v : null;
}

function isOneOf<T extends string>(values: readonly T[], raw: string): raw is T {
  return values.some((v) => v === raw);
}

/** Reads `CONFIG_PATH`, falling back to `<APP_DATA_DIR>/config.yml`. */
export function resolveConfigPath(env: EnvLike = process.env): string {
  const explicit = envValue(env, 'CONFIG_PATH');
  if (explicit) return explicit;
  const dataDir = envValue(env, 'APP_DATA_DIR') ?? join(process.cwd(), 'data');
  return join(dataDir, 'config.yml');
}

class ProblemCollector {
  readonly problems: string[] = [];

  add(problem: string): void {
    this.problems.push(problem);
  }

  positiveInt(value: unknown, path: string, fallback: number, max = Number.MAX_SAFE_INTEGER): number {
    if (value === undefined || value === null || value === '') return fallback;
    const n = typeof value === 'number' ? value : Number(normalizeString(value));
    if (!Number.isInteger(n) || n <= 0 || n > max) {
      this.add(`${path} must be a positive integer${max < Number.MAX_SAFE_INTEGER ? ` no greater than ${max}` : ''}`);
      return fallback;
    }
    return n;
  }

  boolean(value: unknown, path: string, fallback: boolean): boolean {
    if (value === undefined || value === null) return fallback;
    if (typeof value === 'boolean') return value;
    this.add(`${path} must be true or false`);
    return fallback;
  }

  stringList(value: unknown, path: string): string[] {
    if (value === undefined || value === null) return [];
    if (!Array.isArray(value)) {
      this.add(`${path} must be a list`);
      return [];
    }
    const out: string[] = [];
    value.forEach((entry, i) => {
      const s = normalizeString(entry);
      if (!s) this.add(`${path}[${i}] must be a non-empty string`);
      else out.push(s);
    });
    return out;
  }
}

/**
 * Build an AppConfig from YAML text plus environment overrides. Every problem is collected
 * and reported in a single ConfigurationError; secret values never appear in messages.
 */
export function parseAppConfig(yamlText: string, env: EnvLike = process.env): AppConfig {
  let raw: unknown;
  try {
    raw = YAML.parse(yamlText);
  } catch (err) {
    throw new ConfigurationError([`config file is not valid YAML: ${errToMessage(err)}`]);
  }
  if (raw === null || raw === undefined) raw = {};
  if (!isPlainObject(raw)) {
    throw new ConfigurationError(['YAML root must be a mapping/object']);
  }
  const config = raw;
  const p = new ProblemCollector();

  // server
  const serverTypeRaw = (envValue(env, 'SERVER_TYPE') ?? normalizeString(pick(config, 'server.type'))) || 'emby';
  const serverTypeLower = serverTypeRaw.toLowerCase();
  let serverType: ServerType = 'emby';
  if (isOneOf(SERVER_TYPES, serverTypeLower)) serverType = serverTypeLower;
  else p.add(`server.type must be one of ${SERVER_TYPES.join(', ')}`);

  const serverUrlRaw = envValue(env, 'SERVER_URL') ?? normalizeString(pick(config, 'server.url'));
  const serverUrl = validateUrl(serverUrlRaw);
  if (!serverUrlRaw) p.add('server.url is required');
  else if (!serverUrl || !/^https?:/i.test(serverUrl)) p.add('server.url must be an http(s) URL');

  const apiTokenRaw = envValue(env, 'SERVER_API_TOKEN') ?? pick(config, 'server.api_token');
  const apiToken = normalizeString(apiTokenRaw);
  if (isDisabledSecret(apiTokenRaw)) {
    p.add(apiToken ? 'server.api_token looks like a placeholder' : 'server.api_token is required');
  }

  const observedPeriodDays = p.positiveInt(
    pick(config, 'server.observed_period_days'),
    'server.observed_period_days',
    DEFAULTS.observedPeriodDays,
  );
  const watchedFilmFolders = p.stringList(pick(config, 'server.watched_film_folders'), 'server.watched_film_folders');
  const watchedTvFolders = p.stringList(pick(config, 'server.watched_tv_folders'), 'server.watched_tv_folders');
  if (!watchedFilmFolders.length && !watchedTvFolders.length) {
    p.add('at least one of server.watched_film_folders or server.watched_tv_folders is required');
  }

  // tmdb
  const tmdbKeyRaw = envValue(env, 'TMDB_API_KEY') ?? pick(config, 'tmdb.api_key');
  const tmdbKey = normalizeString(tmdbKeyRaw);
  if (isDisabledSecret(tmdbKeyRaw, ['TMDB'])) {
    p.add(tmdbKey ? 'tmdb.api_key looks like a placeholder' : 'tmdb.api_key is required');
  }

  // email_template
  const languageRaw = normalizeString(pick(config, 'email_template.language')).toLowerCase() || 'en';
  let language: Language = 'en';
  if (isOneOf(SUPPORTED_LANGUAGES, languageRaw)) language = languageRaw;
  else p.add(`email_template.language "${languageRaw}" is not supported (supported: ${SUPPORTED_LANGUAGES.join(', ')})`);

  const subject = normalizeString(pick(config, 'email_template.subject'));
  if (!subject) p.add('email_template.subject is required');
  const title = normalizeString(pick(config, 'email_template.title'));
  if (!title) p.add('email_template.title is required');

  const publicUrlRaw = normalizeString(pick(config, 'email_template.server_url'));
  const publicUrl = publicUrlRaw ? validateUrl(publicUrlRaw) : null;
  if (publicUrlRaw && !publicUrl) p.add('email_template.server_url must be an http(s) URL');

  const unsubscribeRaw = normalizeString(pick(config, 'email_template.unsubscribe_email'));
  const unsubscribeEmail = unsubscribeRaw ? validateEmail(unsubscribeRaw) : null;
  if (unsubscribeRaw && !unsubscribeEmail) p.add('email_template.unsubscribe_email is not a valid e-mail address');

  const template = normalizeString(pick(config, 'email_template.template')) || DEFAULTS.template;

  // scheduler
  const cronRaw = normalizeString(pick(config, 'scheduler.cron'));
  if (cronRaw) {
    try {
      new CronTime(cronRaw);
    } catch (err) {
      p.add(`scheduler.cron is not a valid cron expression: ${errToMessage(err)}`);
    }
  }
  const timezoneRaw =
    normalizeString(pick(config, 'scheduler.timezone')) || envValue(env, 'TZ') || 'UTC';
  const timezone = normalizeTimezone(timezoneRaw);
  if (!timezone) p.add(`scheduler.timezone "${timezoneRaw}" is not a known time zone`);

  // newsletter
  const runTimeoutMs = p.positiveInt(
    pick(config, 'newsletter.run_timeout_ms'),
    'newsletter.run_timeout_ms',
    DEFAULTS.runTimeoutMs,
    MAX_TIMER_DELAY_MS,
  );
  const enrichmentConcurrency = p.positiveInt(
    pick(config, 'newsletter.enrichment_concurrency'),
    'newsletter.enrichment_concurrency',
    DEFAULTS.enrichmentConcurrency,
    32,
  );
  const cacheMaxEntries = p.positiveInt(
    pick(config, 'newsletter.cache_max_entries'),
    'newsletter.cache_max_entries',
    DEFAULTS.cacheMaxEntries,
  );
  const maxContextBytes = p.positiveInt(
    pick(config, 'newsletter.max_context_bytes'),
    'newsletter.max_context_bytes',
    DEFAULT_MAX_CONTEXT_BYTES,
  );
  const sendWhenEmpty = p.boolean(pick(config, 'newsletter.send_when_empty'), 'newsletter.send_when_empty', false);
  const outputDir = normalizeString(pick(config, 'newsletter.output_dir')) || null;

  // recipients
  const recipients: string[] = [];
  p.stringList(pick(config, 'recipients'), 'recipients').forEach((entry, i) => {
    const email = validateEmail(entry);
    if (email) recipients.push(email);
    else p.add(`recipients[${i}] is not a valid e-mail address`);
  });

  if (p.problems.length) throw new ConfigurationError(p.problems);

  return {
    server: {
      type: serverType,
      url: (serverUrl ?? '').replace(/\/+$/, ''),
      apiToken,
      observedPeriodDays,
      watchedFilmFolders,
      watchedTvFolders,
    },
    tmdb: { apiKey: tmdbKey },
    emailTemplate: {
      language,
      subject,
      title,
      subtitle: normalizeString(pick(config, 'email_template.subtitle')),
      serverUrl: publicUrl,
      serverOwnerName: normalizeString(pick(config, 'email_template.server_owner_name')),
      unsubscribeEmail,
      template,
    },
    scheduler: { cron: cronRaw || null, timezone: timezone ?? 'UTC' },
    newsletter: {
      runTimeoutMs,
      enrichmentConcurrency,
      cacheMaxEntries,
      maxContextBytes,
      sendWhenEmpty,
      outputDir,
    },
    recipients,
  };
}

export async function loadAppConfig(env: EnvLike = process.env): Promise<AppConfig> {
  const path = resolveConfigPath(env);
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err) {
    throw new ConfigurationError([`cannot read config file ${path}: ${errToMessage(err)}`]);
  }
  const config = parseAppConfig(text, env);
  logger.log(
    `Loaded ${path} server=${config.server.type} folders=${config.server.watchedFilmFolders.length + config.server.watchedTvFolders.length} window=${config.server.observedPeriodDays}d`,
  );
  return config;
}
