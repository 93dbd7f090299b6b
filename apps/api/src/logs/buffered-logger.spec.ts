import { BufferedLogger, logLevelsFromEnv } from './buffered-logger';
import { ServerLogStore } from './server-logs.store';

describe('logLevelsFromEnv', () => {
  it('maps LOG_LEVEL to the Nest levels at or above it', () => {
    expect(logLevelsFromEnv('debug')).toEqual(['verbose', 'debug', 'log', 'warn', 'error', 'fatal']);
    expect(logLevelsFromEnv(' WARN ')).toEqual(['warn', 'error', 'fatal']);
    expect(logLevelsFromEnv(undefined)).toEqual(['log', 'warn', 'error', 'fatal']);
    expect(logLevelsFromEnv('chatty')).toEqual(['log', 'warn', 'error', 'fatal']);
  });
});

describe('BufferedLogger', () => {
  beforeEach(() => {
    jest.spyOn(process.stdout, 'write').mockReturnValue(true);
    jest.spyOn(process.stderr, 'write').mockReturnValue(true);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('buffers only the enabled levels', () => {
    const store = new ServerLogStore();
    const logger = new BufferedLogger(logLevelsFromEnv('warn'), store);

    logger.log('started', 'NewsletterJob');
    logger.debug('details', 'NewsletterJob');
    logger.warn('lookup failed', 'ContentEnricher');
    logger.error('run failed', undefined, 'NewsletterJob');

    expect(store.list().logs.map((l) => [l.level, l.message, l.context])).toEqual([
      ['warn', 'lookup failed', 'ContentEnricher'],
      ['error', 'run failed', 'NewsletterJob'],
    ]);
  });
});
