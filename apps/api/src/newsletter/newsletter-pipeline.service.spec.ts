import { join } from 'node:path';
import { makeAppConfig } from '../tests/fixtures/app-config';
import { LookupFailedError, RunTimedOutError, TemplateNotFoundError } from './newsletter.errors';
import { NewsletterPipelineService } from './newsletter-pipeline.service';
import type {
  EnrichmentClient,
  FetchOptions,
  LibrarySource,
  LookupRequest,
  LookupResult,
  MediaKind,
  RawItem,
} from './newsletter.types';

const TEMPLATE_ROOT = join(__dirname, '..', '..', 'templates');
const NOW = new Date('2024-03-10T12:00:00.000Z');

function item(partial: Partial<RawItem> & Pick<RawItem, 'id' | 'type' | 'name'>): RawItem {
  return { addedAt: new Date('2024-03-08T09:00:00.000Z'), libraryFolder: '', ...partial };
}

function makeSource(byFolder: Record<string, RawItem[]>) {
  const fetchRecent = jest.fn<Promise<RawItem[]>, [string, Date, FetchOptions?]>(
    async (folder) => byFolder[folder] ?? [],
  );
  const countItems = jest.fn<Promise<number | null>, [string, MediaKind, FetchOptions?]>(
    async () => null,
  );
  const source: LibrarySource = { serverType: 'emby', fetchRecent, countItems };
  return { source, fetchRecent, countItems };
}

function makeClient(results: Record<string, LookupResult | Error>) {
  const lookup = jest.fn<Promise<LookupResult>, [LookupRequest]>(async (request) => {
    const result = results[request.title];
    if (result instanceof Error) throw result;
    return result ?? { status: 'not_found' };
  });
  const client: EnrichmentClient = { lookup };
  return { client, lookup };
}

const LIBRARY: Record<string, RawItem[]> = {
  Movies: [
    item({ id: 'm1', type: 'Movie', name: 'Quiet Orbit', year: 2023 }),
    item({ id: 'm2', type: 'Movie', name: 'Broken Compass', year: 2021 }),
  ],
  Shows: [
    item({ id: 'e1', type: 'Episode', name: 'Arrival', seriesId: 'h1', seriesName: 'Harbor Lights', seasonNumber: 1, episodeNumber: 1 }),
    item({ id: 'e2', type: 'Episode', name: 'Fog', seriesId: 'h1', seriesName: 'Harbor Lights', seasonNumber: 1, episodeNumber: 2 }),
    item({ id: 'e3', type: 'Episode', name: 'Return', seriesId: 'h1', seriesName: 'Harbor Lights', seasonNumber: 2, episodeNumber: 1 }),
  ],
};

describe('NewsletterPipelineService', () => {
  it('renders movies and a grouped show, recording the failed lookup', async () => {
    const { source } = makeSource(LIBRARY);
    const { client } = makeClient({
      'Quiet Orbit': {
        status: 'found',
        posterUrl: 'https://image.tmdb.org/t/p/w500/orbit.jpg',
        synopsis: 'A lonely station.',
        rating: 7.4,
      },
      'Broken Compass': new LookupFailedError('TMDB request failed (HTTP 503)'),
      'Harbor Lights': { status: 'found', synopsis: 'A lighthouse keeper.' },
    });
    const service = new NewsletterPipelineService(source, client, TEMPLATE_ROOT);

    const result = await service.run(makeAppConfig(), { now: NOW });

    expect(result.subject).toBe('Digest 2024-03-10');
    expect(result.stats).toEqual({
      moviesCount: 2,
      showsCount: 1,
      episodesCount: 3,
      enrichmentFailures: 1,
      cacheHits: 0,
      cacheMisses: 3,
      auditPassed: true,
      fallbackUsed: false,
      durationMs: expect.any(Number),
    });
    expect(result.failures).toEqual([
      { kind: 'movie', title: 'Broken Compass', reason: 'TMDB request failed (HTTP 503)' },
    ]);
    expect(result.digest.shows).toHaveLength(1);
    expect(result.digest.shows[0].seasons.map((s) => s.seasonNumber)).toEqual([1, 2]);
    expect(result.html).toContain('<img src="https://image.tmdb.org/t/p/w500/orbit.jpg"');
    expect(result.html).toContain('<li>Season 1: Episodes 1-2</li>');
    expect(result.html).toContain('<li>Season 2: Episode 1</li>');
    expect(result.html).toContain('A lighthouse keeper.');
  });

  it('neutralizes hostile titles and metadata', async () => {
    const { source } = makeSource({
      Movies: [item({ id: 'm1', type: 'Movie', name: '<img src=x onerror=alert(1)>' })],
    });
    const { client } = makeClient({
      '<img src=x onerror=alert(1)>': {
        status: 'found',
        posterUrl: 'javascript:alert(1)',
        synopsis: 'Watch <script>alert(1)</script> now',
      },
    });
    const service = new NewsletterPipelineService(source, client, TEMPLATE_ROOT);

    const result = await service.run(makeAppConfig(), { now: NOW });

    expect(result.stats.auditPassed).toBe(true);
    expect(result.stats.fallbackUsed).toBe(false);
    expect(result.html).toContain('&lt;img src=x alert(1)&gt;');
    expect(result.html).toContain('Watch &gt;alert(1)&gt; now');
    expect(result.html).not.toContain('onerror=');
    expect(result.html).not.toContain('javascript');
    expect(result.html).not.toContain('<script');
  });

  it('renders the empty newsletter when nothing was added', async () => {
    const { source } = makeSource({});
    const { client, lookup } = makeClient({});
    const service = new NewsletterPipelineService(source, client, TEMPLATE_ROOT);

    const result = await service.run(makeAppConfig(), { now: NOW });

    expect(lookup).not.toHaveBeenCalled();
    expect(result.stats.moviesCount).toBe(0);
    expect(result.stats.cacheMisses).toBe(0);
    expect(result.html).toContain('Nothing new was added during the last 7 days.');
  });

  it('shows server totals that could be counted', async () => {
    const { source, countItems } = makeSource({});
    countItems.mockImplementation(async (folder) => {
      if (folder === 'Movies') return 12;
      throw new Error('count endpoint unavailable');
    });
    const { client } = makeClient({});
    const service = new NewsletterPipelineService(source, client, TEMPLATE_ROOT);

    const result = await service.run(makeAppConfig(), { now: NOW });

    expect(countItems).toHaveBeenCalledWith('Movies', 'movie', expect.anything());
    expect(countItems).toHaveBeenCalledWith('Shows', 'tv', expect.anything());
    expect(result.html).toContain('Movies: 12');
    expect(result.html).not.toContain('Series:');
  });

  it('shows a server total of zero', async () => {
    const { source, countItems } = makeSource({});
    countItems.mockImplementation(async (folder) => (folder === 'Movies' ? 0 : 4));
    const { client } = makeClient({});
    const service = new NewsletterPipelineService(source, client, TEMPLATE_ROOT);

    const result = await service.run(makeAppConfig(), { now: NOW });

    expect(result.html).toContain('Movies: 0');
    expect(result.html).toContain('Series: 4');
  });

  it('rejects with RunTimedOutError and aborts the in-flight fetch', async () => {
    const { source, fetchRecent } = makeSource({});
    let seen: AbortSignal | undefined;
    fetchRecent.mockImplementation((_folder, _since, options) => {
      seen = options?.signal;
      return new Promise<RawItem[]>(() => undefined);
    });
    const { client } = makeClient({});
    const service = new NewsletterPipelineService(source, client, TEMPLATE_ROOT);

    await expect(
      service.run(makeAppConfig({ newsletter: { runTimeoutMs: 20 } }), { now: NOW }),
    ).rejects.toBeInstanceOf(RunTimedOutError);
    expect(seen?.aborted).toBe(true);
  });

  it('treats a cancelled caller signal as a timed-out run', async () => {
    const { source } = makeSource(LIBRARY);
    const { client } = makeClient({});
    const service = new NewsletterPipelineService(source, client, TEMPLATE_ROOT);
    const controller = new AbortController();
    controller.abort();

    await expect(
      service.run(makeAppConfig(), { now: NOW, signal: controller.signal }),
    ).rejects.toBeInstanceOf(RunTimedOutError);
  });

  it('propagates a missing template', async () => {
    const { source } = makeSource({});
    const { client } = makeClient({});
    const service = new NewsletterPipelineService(source, client, TEMPLATE_ROOT);

    await expect(
      service.run(makeAppConfig({ emailTemplate: { template: 'missing.html' } }), { now: NOW }),
    ).rejects.toBeInstanceOf(TemplateNotFoundError);
  });
});
