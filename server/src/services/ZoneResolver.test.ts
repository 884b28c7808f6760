import { GoogleGeocodingAdapter } from '../adapters/GoogleGeocodingAdapter';
import { ImageInput, VisionModel } from '../adapters/ProviderAdapters';
import { ResolutionError } from '../errors/ScoutError';
import { fakeHttp, FakeReply } from '../testing/fakeHttp';
import { ZoneCache } from './ZoneCache';
import { MAP_IMAGE_PROMPT, ZoneResolver } from './ZoneResolver';

const okViewport = (ne: [number, number], sw: [number, number]): FakeReply => ({
  status: 200,
  data: {
    status: 'OK',
    results: [
      {
        geometry: {
          location: { lat: (ne[0] + sw[0]) / 2, lng: (ne[1] + sw[1]) / 2 },
          viewport: {
            northeast: { lat: ne[0], lng: ne[1] },
            southwest: { lat: sw[0], lng: sw[1] },
          },
        },
      },
    ],
  },
});

const zeroResults: FakeReply = { status: 200, data: { status: 'ZERO_RESULTS', results: [] } };

const noVision: VisionModel = {
  describeImage: jest.fn().mockRejectedValue(new Error('vision not expected')),
};

function resolverWith(handler: Parameters<typeof fakeHttp>[0], vision: VisionModel = noVision, cache?: ZoneCache) {
  const http = fakeHttp(handler);
  const geocoder = new GoogleGeocodingAdapter('https://geocode.test/json', 'test-google-key', http.client);
  return { resolver: new ZoneResolver(geocoder, vision, { defaultCountry: 'USA', cache }), calls: http.calls };
}

async function reasonOf(promise: Promise<unknown>): Promise<string> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof ResolutionError) return err.reason;
    throw err;
  }
  throw new Error('expected a ResolutionError');
}

describe('ZoneResolver.resolveFromText', () => {
  it('returns the viewport of the first result as a bounding box', async () => {
    const { resolver, calls } = resolverWith(() => okViewport([34.1, -118.38], [34.07, -118.43]));

    const box = await resolver.resolveFromText('90210');

    expect(box).toEqual({ north: 34.1, south: 34.07, east: -118.38, west: -118.43 });
    expect(box.north).toBeGreaterThan(box.south);
    expect(box.east).toBeGreaterThan(box.west);
    expect(calls).toHaveLength(1);
    expect(calls[0].params).toEqual({ address: '90210', key: 'test-google-key' });
  });

  it('retries once with the country appended after ZERO_RESULTS', async () => {
    const { resolver, calls } = resolverWith((config) =>
      config.params.address === '10001' ? zeroResults : okViewport([40.76, -73.98], [40.74, -74.01]),
    );

    const box = await resolver.resolveFromText('10001');

    expect(box).toEqual({ north: 40.76, south: 40.74, east: -73.98, west: -74.01 });
    expect(calls).toHaveLength(2);
    expect(calls[1].params.address).toBe('10001, USA');
  });

  it('fails when the qualified retry also has no match', async () => {
    const { resolver, calls } = resolverWith(() => zeroResults);

    expect(await reasonOf(resolver.resolveFromText('00000'))).toBe('ZERO_RESULTS');
    expect(calls).toHaveLength(2);
  });

  it('reports other provider statuses with the provider message', async () => {
    const { resolver, calls } = resolverWith(() => ({
      status: 200,
      data: { status: 'REQUEST_DENIED', error_message: 'The provided API key is invalid.', results: [] },
    }));

    expect(await reasonOf(resolver.resolveFromText('90210'))).toBe(
      'REQUEST_DENIED: The provided API key is invalid.',
    );
    expect(calls).toHaveLength(1);
  });

  it('maps transport failures to ResolutionError', async () => {
    const { resolver } = resolverWith(() => ({ networkError: 'connect ECONNREFUSED 127.0.0.1:443' }));

    expect(await reasonOf(resolver.resolveFromText('90210'))).toBe('connect ECONNREFUSED 127.0.0.1:443');
  });

  it('rejects an inverted viewport', async () => {
    const { resolver } = resolverWith(() => okViewport([40.7, -73.9], [40.8, -74.0]));

    await expect(resolver.resolveFromText('90210')).rejects.toThrow(ResolutionError);
  });

  it('rejects an empty hint without calling the provider', async () => {
    const { resolver, calls } = resolverWith(() => zeroResults);

    expect(await reasonOf(resolver.resolveFromText('   '))).toBe('Location hint is empty');
    expect(calls).toHaveLength(0);
  });

  describe('with a cache', () => {
    let cache: ZoneCache;

    beforeEach(() => {
      cache = new ZoneCache(60);
    });

    afterEach(async () => {
      await cache.quit();
    });

    it('geocodes a repeated hint only once', async () => {
      const { resolver, calls } = resolverWith(() => okViewport([34.1, -118.38], [34.07, -118.43]), noVision, cache);

      const first = await resolver.resolveFromText('90210');
      const second = await resolver.resolveFromText(' 90210 ');

      expect(second).toEqual(first);
      expect(calls).toHaveLength(1);
    });

    it('does not cache failures', async () => {
      const { resolver, calls } = resolverWith(() => zeroResults, noVision, cache);

      await expect(resolver.resolveFromText('00000')).rejects.toThrow(ResolutionError);
      await expect(resolver.resolveFromText('00000')).rejects.toThrow(ResolutionError);
      expect(calls).toHaveLength(4);
    });
  });
});

describe('ZoneResolver.resolveFromImage', () => {
  const image: ImageInput = { data: Buffer.from('fake-png-bytes'), mimeType: 'image/png' };

  const visionReplying = (reply: string) => {
    const describeImage = jest.fn<Promise<string>, [string, ImageInput]>().mockResolvedValue(reply);
    return { vision: { describeImage }, describeImage };
  };

  it('parses a fenced JSON bounding box', async () => {
    const { vision, describeImage } = visionReplying(
      '```json\n{"north": 40.8, "south": 40.7, "east": -73.9, "west": -74.0}\n```',
    );
    const { resolver } = resolverWith(() => zeroResults, vision);

    const box = await resolver.resolveFromImage(image);

    expect(box).toEqual({ north: 40.8, south: 40.7, east: -73.9, west: -74.0 });
    expect(describeImage).toHaveBeenCalledWith(MAP_IMAGE_PROMPT, image);
  });

  it('fails on a reply that is not JSON', async () => {
    const { vision } = visionReplying('I think this is Manhattan.');
    const { resolver } = resolverWith(() => zeroResults, vision);

    expect(await reasonOf(resolver.resolveFromImage(image))).toBe('Vision model reply was not valid JSON');
  });

  it('fails when a coordinate is missing', async () => {
    const { vision } = visionReplying('{"north": 40.8, "south": 40.7, "east": -73.9}');
    const { resolver } = resolverWith(() => zeroResults, vision);

    await expect(resolver.resolveFromImage(image)).rejects.toThrow(ResolutionError);
  });

  it.each([
    ['null', '{"north": 40.8, "south": null, "east": -73.9, "west": -74.0}'],
    ['a string', '{"north": "40.8", "south": 40.7, "east": -73.9, "west": -74.0}'],
    ['a boolean', '{"north": 40.8, "south": 40.7, "east": true, "west": -74.0}'],
  ])('fails when a coordinate is %s', async (_label, reply) => {
    const { vision } = visionReplying(reply);
    const { resolver } = resolverWith(() => zeroResults, vision);

    await expect(resolver.resolveFromImage(image)).rejects.toThrow(ResolutionError);
  });

  it('maps model errors to ResolutionError', async () => {
    const vision: VisionModel = { describeImage: jest.fn().mockRejectedValue(new Error('quota exceeded')) };
    const { resolver } = resolverWith(() => zeroResults, vision);

    expect(await reasonOf(resolver.resolveFromImage(image))).toBe('Vision model failed: quota exceeded');
  });

  it('rejects an empty image without calling the model', async () => {
    const { vision, describeImage } = visionReplying('{}');
    const { resolver } = resolverWith(() => zeroResults, vision);

    expect(await reasonOf(resolver.resolveFromImage({ data: Buffer.alloc(0), mimeType: 'image/png' }))).toBe(
      'Map image is empty',
    );
    expect(describeImage).not.toHaveBeenCalled();
  });
});
