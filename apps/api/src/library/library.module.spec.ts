import { makeAppConfig } from '../tests/fixtures/app-config';
import { EmbyLibrarySource } from './emby-library.source';
import { createLibrarySource } from './library.module';
import { PlexLibrarySource } from './plex-library.source';

describe('createLibrarySource', () => {
  it('picks the client for the configured server type', () => {
    const plex = createLibrarySource(makeAppConfig({ server: { type: 'plex' } }).server);
    const jellyfin = createLibrarySource(makeAppConfig({ server: { type: 'jellyfin' } }).server);

    expect(plex).toBeInstanceOf(PlexLibrarySource);
    expect(jellyfin).toBeInstanceOf(EmbyLibrarySource);
    expect(jellyfin.serverType).toBe('jellyfin');
  });
});
