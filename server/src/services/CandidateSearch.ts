import { PlacesHttpResponse, PlacesProvider, PlacesTextSearchRequest } from '../adapters/ProviderAdapters';
import { SearchError } from '../errors/ScoutError';
import { placesSearchResponseSchema, toCandidates } from '../transformers/placeTransformer';
import { BoundingBox, Candidate } from '../types/lead';

/** Only what verification and display read; keeps responses small. */
export const PLACES_FIELD_MASK = [
  'places.displayName',
  'places.formattedAddress',
  'places.editorialSummary',
  'places.types',
  'places.websiteUri',
  'places.rating',
  'places.nationalPhoneNumber',
  'places.googleMapsUri',
  'places.reviews',
] as const;

export function buildSearchRequest(query: string, box: BoundingBox): PlacesTextSearchRequest {
  return {
    textQuery: query,
    // A rectangle restriction drops places whose location falls outside the zone,
    // unlike a location bias or radius.
    locationRestriction: {
      rectangle: {
        low: { latitude: box.south, longitude: box.west },
        high: { latitude: box.north, longitude: box.east },
      },
    },
  };
}

export class CandidateSearch {
  constructor(private readonly places: PlacesProvider) {}

  /**
   * Throws SearchError when the provider rejects the request or cannot be reached.
   * An empty array means the search succeeded and found nothing.
   */
  async search(query: string, box: BoundingBox): Promise<Candidate[]> {
    let res: PlacesHttpResponse;
    try {
      res = await this.places.searchText(buildSearchRequest(query, box), PLACES_FIELD_MASK);
    } catch (err) {
      throw new SearchError(0, err instanceof Error ? err.message : String(err));
    }

    if (res.status !== 200) {
      throw new SearchError(res.status, res.data);
    }

    const parsed = placesSearchResponseSchema.safeParse(res.data ?? {});
    if (!parsed.success) {
      throw new SearchError(res.status, { error: 'Malformed places response', issues: parsed.error.issues });
    }

    return toCandidates(parsed.data.places);
  }
}
