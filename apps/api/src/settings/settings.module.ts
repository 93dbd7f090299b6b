import { Global, Module } from '@nestjs/common';
import { loadAppConfig } from './config-loader';
import { APP_CONFIG } from './settings.types';

/** Loads config.yml (plus env overrides) once at boot and shares it app-wide. */
@Global()
@Module({
  providers: [
    {
      provide: APP_CONFIG,
      useFactory: () => loadAppConfig(process.env),
    },
  ],
  exports: [APP_CONFIG],
})
export class SettingsModule {}
