import { GooglePlacesAdapter } from '../adapters/GooglePlacesAdapter';
import { SearchError } from '../errors/ScoutError';
import { fakeHttp, FakeReply } from '../testing/fakeHttp';
import { BoundingBox } from '../types/lead';
import { CandidateSearch, PLACES_FIELD_MASK } from './CandidateSearch';

const box: BoundingBox = { north: 40.8, south: 40.7, east: -73.9, west: -74.0 };

function searchWith(reply: FakeReply) {
  const http = fakeHttp(() => reply);
  const adapter = new GooglePlacesAdapter('https://places.test/v1/places:searchText', 'test-google-key', http.client);
  return { search: new CandidateSearch(adapter), calls: http.calls };
}

async function searchErrorOf(promise: Promise<unknown>): Promise<SearchError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof SearchError) return err;
    throw err;
  }
  throw new Error('expected a SearchError');
}

describe('CandidateSearch', () => {
  it('restricts the search to the exact rectangle of the box', async () => {
    const { search, calls } = searchWith({ status: 200, data: { places: [] } });

    await search.search('Vegan Bakery', box);

    expect(calls).toHaveLength(1);
    expect(calls[0].method).toBe('post');
    expect(calls[0].baseURL).toBe('https://places.test/v1/places:searchText');
    expect(JSON.parse(String(calls[0].data))).toEqual({
      textQuery: 'Vegan Bakery',
      locationRestriction: {
        rectangle: {
          low: { latitude: 40.7, longitude: -74.0 },
          high: { latitude: 40.8, longitude: -73.9 },
        },
      },
    });
  });

  it('sends the API key and the field mask', async () => {
    const { search, calls } = searchWith({ status: 200, data: {} });

    await search.search('Coffee Shop', box);

    expect(calls[0].headers.get('X-Goog-Api-Key')).toBe('test-google-key');
    expect(calls[0].headers.get('X-Goog-FieldMask')).toBe(PLACES_FIELD_MASK.join(','));
    expect(PLACES_FIELD_MASK).toContain('places.reviews');
  });

  it('returns an empty list when the provider finds nothing', async () => {
    const { search } = searchWith({ status: 200, data: {} });

    await expect(search.search('Coffee Shop', box)).resolves.toEqual([]);
  });

  it('maps places to candidates in provider order', async () => {
    const { search } = searchWith({
      status: 200,
      data: {
        places: [
          {
            displayName: { text: 'GreenLoaf', languageCode: 'en' },
            formattedAddress: '12 Orchard St, New York, NY 10002, USA',
            types: ['bakery', 'store'],
            reviews: [{ text: { text: 'Best vegan croissant in town.' } }],
          },
          {
            displayName: { text: 'BigChain Donuts' },
            formattedAddress: '400 Broadway, New York, NY 10013, USA',
            types: ['bakery'],
            websiteUri: 'https://bigchain.example',
          },
        ],
      },
    });

    const candidates = await search.search('Vegan Bakery', box);

    expect(candidates.map((c) => c.name)).toEqual(['GreenLoaf', 'BigChain Donuts']);
    expect(candidates[0].reviews).toEqual(['Best vegan croissant in town.']);
    expect(candidates[0].websiteUrl).toBeUndefined();
    expect(candidates[1].websiteUrl).toBe('https://bigchain.example');
  });

  it('throws SearchError with the provider status and body on a non-200 response', async () => {
    const body = { error: { code: 429, status: 'RESOURCE_EXHAUSTED' } };
    const { search, calls } = searchWith({ status: 429, data: body });

    const err = await searchErrorOf(search.search('Coffee Shop', box));

    expect(err.status).toBe(429);
    expect(err.body).toEqual(body);
    expect(calls).toHaveLength(1);
  });

  it('throws SearchError with status 0 when the provider is unreachable', async () => {
    const { search } = searchWith({ networkError: 'getaddrinfo ENOTFOUND places.test', code: 'ENOTFOUND' });

    const err = await searchErrorOf(search.search('Coffee Shop', box));

    expect(err.status).toBe(0);
    expect(err.body).toBe('getaddrinfo ENOTFOUND places.test');
  });

  it('throws SearchError when a 200 body is not a places response', async () => {
    const { search } = searchWith({ status: 200, data: { places: 'none' } });

    const err = await searchErrorOf(search.search('Coffee Shop', box));

    expect(err.status).toBe(200);
  });
});
