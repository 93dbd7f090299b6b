import { Module } from '@nestjs/common';
import { LIBRARY_SOURCE } from '../newsletter/newsletter.tokens';
import type { LibrarySource } from '../newsletter/newsletter.types';
import { APP_CONFIG, type AppConfig, type ServerSettings } from '../settings/settings.types';
import { EmbyLibrarySource } from './emby-library.source';
import { PlexLibrarySource } from './plex-library.source';

export function createLibrarySource(server: ServerSettings): LibrarySource {
  switch (server.type) {
    case 'plex':
      return new PlexLibrarySource({ baseUrl: server.url, token: server.apiToken });
    case 'emby':
    case 'jellyfin':
      return new EmbyLibrarySource({
        flavor: server.type,
        baseUrl: server.url,
        apiToken: server.apiToken,
      });
  }
}

@Module({
  providers: [
    {
      provide: LIBRARY_SOURCE,
      inject: [APP_CONFIG],
      useFactory: (config: AppConfig) => createLibrarySource(config.server),
    },
  ],
  exports: [LIBRARY_SOURCE],
})
export class LibraryModule {}
