export const SERVER_TYPES = ['emby', 'jellyfin', 'plex'] as const;
export type ServerType = (typeof SERVER_TYPES)[number];

export const SUPPORTED_LANGUAGES = ['en'] as const;
export type Language = (typeof SUPPORTED_LANGUAGES)[number];

export const APP_CONFIG = Symbol('APP_CONFIG');

export type ServerSettings = {
  type: ServerType;
  url: string;
  apiToken: string;
  observedPeriodDays: number;
  watchedFilmFolders: string[];
  watchedTvFolders: string[];
};

export type EmailTemplateSettings = {
  language: Language;
  subject: string;
  title: string;
  subtitle: string;
  /** Public link shown in the newsletter ("Discover now"). */
  serverUrl: string | null;
  serverOwnerName: string;
  unsubscribeEmail: string | null;
  /** File name under the template root. */
  template: string;
};

export type SchedulerSettings = {
  cron: string | null;
  timezone: string;
};

export type NewsletterSettings = {
  runTimeoutMs: number;
  enrichmentConcurrency: number;
  cacheMaxEntries: number;
  maxContextBytes: number;
  sendWhenEmpty: boolean;
  outputDir: string | null;
};

export type AppConfig = {
  server: ServerSettings;
  tmdb: { apiKey: string };
  emailTemplate: EmailTemplateSettings;
  scheduler: SchedulerSettings;
  newsletter: NewsletterSettings;
  recipients: string[];
};
