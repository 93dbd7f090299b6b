import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import type { NextFunction, Request, Response } from 'express';
import {
  API_DEFAULT_HOST,
  API_DEFAULT_PORT,
  API_DOCS_PATH,
  API_GLOBAL_PREFIX,
  API_PREFIX_PATH,
  HTTP_SLOW_REQUEST_THRESHOLD_MS,
} from './app.constants';
import { readAppMeta } from './app.meta';
import { AppModule } from './app.module';
import { ensureBootstrapEnv } from './bootstrap-env';
import { BufferedLogger, logLevelsFromEnv } from './logs/buffered-logger';
import { securityHeadersMiddleware } from './security/security-headers.middleware';

async function bootstrap() {
  await ensureBootstrapEnv();
  const bootstrapLogger = new Logger('Bootstrap');

  process.on('unhandledRejection', (reason) => {
    bootstrapLogger.error(`Unhandled rejection: ${String(reason)}`);
  });

  const app = await NestFactory.create(AppModule, {
    logger: new BufferedLogger(logLevelsFromEnv(process.env.LOG_LEVEL)),
  });
  app.enableShutdownHooks();

  app.use(securityHeadersMiddleware);
  app.setGlobalPrefix(API_GLOBAL_PREFIX);

  const httpLoggingEnabled =
    process.env.HTTP_LOGGING === 'true' || process.env.NODE_ENV !== 'production';
  if (httpLoggingEnabled) {
    const httpLogger = new Logger('HTTP');
    app.use((req: Request, res: Response, next: NextFunction) => {
      const start = process.hrtime.bigint();
      res.on('finish', () => {
        const ms = Number(process.hrtime.bigint() - start) / 1e6;
        const status = res.statusCode;
        const msg = `${req.method} ${req.originalUrl || req.url} -> ${status} ${ms.toFixed(0)}ms`;

        if (status >= 500) httpLogger.error(msg);
        else if (status >= 400) httpLogger.warn(msg);
        else if (ms >= HTTP_SLOW_REQUEST_THRESHOLD_MS) httpLogger.warn(`SLOW ${msg}`);
      });
      next();
    });
  }

  const swaggerEnabled =
    process.env.SWAGGER_ENABLED === 'true' || process.env.NODE_ENV !== 'production';
  if (swaggerEnabled) {
    const config = new DocumentBuilder()
      .setTitle('Digestarr API')
      .setDescription('Newsletter runs, previews and status for a Plex, Emby or Jellyfin library.')
      .setVersion(readAppMeta().version)
      .build();
    // Swagger routes are not affected by Nest's globalPrefix; include it explicitly.
    SwaggerModule.setup(API_DOCS_PATH, app, SwaggerModule.createDocument(app, config));
  }

  const port = Number.parseInt(process.env.PORT ?? `${API_DEFAULT_PORT}`, 10);
  const host = process.env.HOST ?? API_DEFAULT_HOST;
  await app.listen(port, host);

  bootstrapLogger.log(
    `API listening: http://${host}:${port}${API_PREFIX_PATH} (dataDir=${process.env.APP_DATA_DIR ?? 'n/a'})`,
  );
}

void bootstrap().catch((err: unknown) => {
  const logger = new Logger('Bootstrap');
  logger.error(err instanceof Error ? (err.stack ?? err.message) : String(err));
  process.exit(1);
});
