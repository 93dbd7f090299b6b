import { Module } from '@nestjs/common';
import { ENRICHMENT_CLIENT } from '../newsletter/newsletter.tokens';
import { APP_CONFIG, type AppConfig } from '../settings/settings.types';
import { TmdbService } from './tmdb.service';

@Module({
  providers: [
    {
      provide: ENRICHMENT_CLIENT,
      inject: [APP_CONFIG],
      useFactory: (config: AppConfig) => new TmdbService({ apiKey: config.tmdb.apiKey }),
    },
  ],
  exports: [ENRICHMENT_CLIENT],
})
export class TmdbModule {}
