import { LookupFailedError } from '../newsletter/newsletter.errors';
import { fetchCall, mockJsonResponse, mockResponse } from '../tests/fixtures/fetch-mock';
import { bestSearchResult, parseSearchResults, TmdbService } from './tmdb.service';

function createService(apiKey = 'test-secret') {
  return new TmdbService({ apiKey, retryDelayMs: 0 });
}

function ok(body: unknown) {
  return mockJsonResponse({ ok: true, status: 200, body });
}

describe('bestSearchResult', () => {
  it('prefers the matching year and pushes documentaries down', () => {
    const results = [
      { id: 1, title: 'Quiet Orbit', date: '2019-05-01', popularity: 50 },
      { id: 2, title: 'Quiet Orbit', date: '2023-09-10', popularity: 5 },
      { id: 3, title: 'Quiet Orbit: The Making Of', date: '2023-10-01', genre_ids: [99], popularity: 90 },
    ];

    expect(bestSearchResult('Quiet Orbit', results, 2023)?.id).toBe(2);
    expect(bestSearchResult('Quiet Orbit', [], 2023)).toBeNull();
  });
});

describe('parseSearchResults', () => {
  it('drops entries without an id or title and reads TV names', () => {
    expect(
      parseSearchResults(
        {
          results: [
            { id: 10, name: 'Harbor Lights', first_air_date: '2021-01-04', vote_average: 8.1 },
            { id: 0, name: 'Nope' },
            { id: 11 },
            'junk',
          ],
        },
        'tv',
      ),
    ).toEqual({
      ok: true,
      results: [
        {
          id: 10,
          title: 'Harbor Lights',
          date: '2021-01-04',
          overview: undefined,
          poster_path: undefined,
          genre_ids: undefined,
          vote_count: undefined,
          vote_average: 8.1,
          popularity: undefined,
        },
      ],
    });
    expect(parseSearchResults([], 'movie')).toEqual({ ok: false, reason: 'response is not an object' });
  });
});

describe('TmdbService', () => {
  const originalFetch = globalThis.fetch;
  let fetchMock: jest.Mock;

  beforeEach(() => {
    fetchMock = jest.fn();
    globalThis.fetch = fetchMock as unknown as typeof fetch;
  });

  afterEach(() => {
    globalThis.fetch = originalFetch;
    jest.restoreAllMocks();
  });

  it('returns poster, synopsis and rating for the best movie match', async () => {
    fetchMock.mockResolvedValueOnce(
      ok({
        results: [
          { id: 1, title: 'Quiet Orbit', release_date: '2019-05-01', popularity: 50 },
          {
            id: 2,
            title: 'Quiet Orbit',
            release_date: '2023-09-10',
            overview: 'A lighthouse keeper in orbit.',
            poster_path: '/orbit.jpg',
            vote_average: 7.4,
            popularity: 5,
          },
        ],
      }),
    );

    await expect(
      createService().lookup({ title: 'Quiet Orbit', year: 2023, kind: 'movie' }),
    ).resolves.toEqual({
      status: 'found',
      posterUrl: 'https://image.tmdb.org/t/p/w500/orbit.jpg',
      synopsis: 'A lighthouse keeper in orbit.',
      rating: 7.4,
    });

    const { url, init } = fetchCall(fetchMock, 0);
    expect(url.origin + url.pathname).toBe('https://api.themoviedb.org/3/search/movie');
    expect(url.searchParams.get('query')).toBe('Quiet Orbit');
    expect(url.searchParams.get('year')).toBe('2023');
    expect(url.searchParams.get('api_key')).toBe('test-secret');
    expect(init.headers).toEqual({ Accept: 'application/json' });
  });

  it('sends read access tokens as a bearer header', async () => {
    fetchMock.mockResolvedValueOnce(ok({ results: [{ id: 5, title: 'Quiet Orbit' }] }));

    await expect(
      createService('eyJtest.token.value').lookup({ title: 'Quiet Orbit', kind: 'movie' }),
    ).resolves.toEqual({ status: 'found' });

    const { url, init } = fetchCall(fetchMock, 0);
    expect(url.searchParams.has('api_key')).toBe(false);
    expect(init.headers).toEqual({
      Accept: 'application/json',
      Authorization: 'Bearer eyJtest.token.value',
    });
  });

  it('retries a TV search without the year filter', async () => {
    fetchMock
      .mockResolvedValueOnce(ok({ results: [] }))
      .mockResolvedValueOnce(
        ok({ results: [{ id: 10, name: 'Harbor Lights', first_air_date: '2021-01-04', vote_average: 8.1 }] }),
      );

    await expect(
      createService().lookup({ title: 'Harbor Lights', year: 2022, kind: 'tv' }),
    ).resolves.toEqual({ status: 'found', rating: 8.1 });

    expect(fetchMock).toHaveBeenCalledTimes(2);
    const first = fetchCall(fetchMock, 0).url;
    expect(first.pathname).toBe('/3/search/tv');
    expect(first.searchParams.get('first_air_date_year')).toBe('2022');
    expect(fetchCall(fetchMock, 1).url.searchParams.has('first_air_date_year')).toBe(false);
  });

  it('reports not_found when no variant matches', async () => {
    fetchMock.mockResolvedValue(ok({ results: [] }));

    await expect(createService().lookup({ title: 'Nowhere', kind: 'movie' })).resolves.toEqual({
      status: 'not_found',
    });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('reports an unexpected payload as malformed', async () => {
    fetchMock.mockResolvedValueOnce(ok({ status_message: 'odd' }));

    await expect(createService().lookup({ title: 'Nowhere', kind: 'movie' })).resolves.toEqual({
      status: 'malformed',
      reason: 'results is not an array',
    });
  });

  it('reports invalid JSON as malformed without retrying', async () => {
    fetchMock.mockResolvedValue(mockResponse({ ok: true, status: 200, body: '<html>' }));

    await expect(createService().lookup({ title: 'Nowhere', kind: 'movie' })).resolves.toEqual({
      status: 'malformed',
      reason: 'invalid JSON',
    });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('throws LookupFailedError on an auth failure without leaking the key', async () => {
    fetchMock.mockResolvedValue(
      mockResponse({ ok: false, status: 401, body: 'Invalid API key: test-secret' }),
    );

    const err = await createService()
      .lookup({ title: 'Quiet Orbit', kind: 'movie' })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(LookupFailedError);
    expect(err).toHaveProperty('message', 'TMDB request failed: HTTP 401 Invalid API key: REDACTED');
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});
