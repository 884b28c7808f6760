import { GeocodeResponse, GeocodingProvider, ImageInput, VisionModel } from '../adapters/ProviderAdapters';
import { ResolutionError } from '../errors/ScoutError';
import { describeInvalidBox, toBoundingBox } from '../schemas/boundingBox';
import { BoundingBox } from '../types/lead';
import { parseJsonReply } from '../utils/jsonReply';
import { ZoneCache } from './ZoneCache';

export const MAP_IMAGE_PROMPT = `Analyze this map image.
1. Identify the geographic area based on visible street names and landmarks.
2. Estimate the precise bounding box (north, south, east, west coordinates in decimal degrees).
3. Return ONLY a JSON object: {"north": float, "south": float, "east": float, "west": float}.`;

export interface ZoneResolverOptions {
  /** Appended as ", <country>" when the bare hint has no geocoding match */
  defaultCountry: string;
  cache?: ZoneCache;
}

/**
 * Turns a user's location hint into the rectangle the places search is restricted to.
 */
export class ZoneResolver {
  constructor(
    private readonly geocoder: GeocodingProvider,
    private readonly vision: VisionModel,
    private readonly options: ZoneResolverOptions,
  ) {}

  async resolveFromText(locationHint: string): Promise<BoundingBox> {
    const hint = locationHint.trim();
    if (!hint) {
      throw new ResolutionError('Location hint is empty');
    }

    const { defaultCountry, cache } = this.options;
    const cached = await cache?.get(hint, defaultCountry);
    if (cached) return cached;

    let response = await this.geocode(hint);
    if (response.status === 'ZERO_RESULTS') {
      const qualified = `${hint}, ${defaultCountry}`;
      console.warn(`[zone] no geocoding match for "${hint}", retrying as "${qualified}"`);
      response = await this.geocode(qualified);
    }

    if (response.status !== 'OK' || response.results.length === 0) {
      const detail = response.error_message ? `${response.status}: ${response.error_message}` : response.status;
      throw new ResolutionError(detail);
    }

    const { northeast, southwest } = response.results[0].geometry.viewport;
    const box = this.validated({
      north: northeast.lat,
      south: southwest.lat,
      east: northeast.lng,
      west: southwest.lng,
    });

    await cache?.set(hint, defaultCountry, box);
    return box;
  }

  async resolveFromImage(image: ImageInput): Promise<BoundingBox> {
    if (image.data.length === 0) {
      throw new ResolutionError('Map image is empty');
    }

    let reply: string;
    try {
      reply = await this.vision.describeImage(MAP_IMAGE_PROMPT, image);
    } catch (err) {
      throw new ResolutionError(`Vision model failed: ${messageOf(err)}`);
    }

    let parsed: unknown;
    try {
      parsed = parseJsonReply(reply);
    } catch {
      throw new ResolutionError('Vision model reply was not valid JSON');
    }

    return this.validated(parsed);
  }

  private async geocode(address: string): Promise<GeocodeResponse> {
    try {
      return await this.geocoder.geocode(address);
    } catch (err) {
      throw new ResolutionError(messageOf(err));
    }
  }

  private validated(value: unknown): BoundingBox {
    const box = toBoundingBox(value);
    if (!box) {
      throw new ResolutionError(`Unusable bounding box (${describeInvalidBox(value) ?? 'unknown problem'})`);
    }
    return box;
  }
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
