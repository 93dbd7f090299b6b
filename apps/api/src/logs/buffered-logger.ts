import { ConsoleLogger, type LogLevel } from '@nestjs/common';
import { serverLogs, type ServerLogStore } from './server-logs.store';

const LEVEL_ORDER = ['debug', 'info', 'warn', 'error'] as const;
type ConfiguredLevel = (typeof LEVEL_ORDER)[number];

const NEST_LEVELS: Record<ConfiguredLevel, LogLevel[]> = {
  debug: ['verbose', 'debug'],
  info: ['log'],
  warn: ['warn'],
  error: ['error', 'fatal'],
};

function isConfiguredLevel(value: string): value is ConfiguredLevel {
  return LEVEL_ORDER.some((level) => level === value);
}

/** `LOG_LEVEL=warn` enables warn and error. Unknown or empty values mean `info`. */
export function logLevelsFromEnv(raw: string | undefined): LogLevel[] {
  const wanted = raw?.trim().toLowerCase() ?? '';
  const threshold: ConfiguredLevel = isConfiguredLevel(wanted) ? wanted : 'info';
  return LEVEL_ORDER.slice(LEVEL_ORDER.indexOf(threshold)).flatMap((level) => NEST_LEVELS[level]);
}

/** Console logger that also keeps recent lines for `GET /api/logs`. */
export class BufferedLogger extends ConsoleLogger {
  constructor(
    logLevels: LogLevel[],
    private readonly store: ServerLogStore = serverLogs,
  ) {
    super();
    this.setLogLevels(logLevels);
  }

  override log(message: unknown, context?: string) {
    if (!this.isLevelEnabled('log')) return;
    super.log(message, context);
    this.store.add({ level: 'info', message, context });
  }

  override warn(message: unknown, context?: string) {
    if (!this.isLevelEnabled('warn')) return;
    super.warn(message, context);
    this.store.add({ level: 'warn', message, context });
  }

  override error(message: unknown, stack?: string, context?: string) {
    if (!this.isLevelEnabled('error')) return;
    super.error(message, stack, context);
    this.store.add({ level: 'error', message, stack, context });
  }

  override debug(message: unknown, context?: string) {
    if (!this.isLevelEnabled('debug')) return;
    super.debug(message, context);
    this.store.add({ level: 'debug', message, context });
  }
}
