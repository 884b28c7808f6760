import axios, { AxiosInstance } from 'axios';
import { PlacesHttpResponse, PlacesProvider, PlacesTextSearchRequest } from './ProviderAdapters';
import { env } from '../config/env';

/**
 * Places API (New) text search.
 * Not retried: a rejected search is reported to the user as-is.
 */
export class GooglePlacesAdapter implements PlacesProvider {
  private readonly client: AxiosInstance;

  constructor(
    baseUrl = env.PLACES_URL,
    apiKey = env.GOOGLE_API_KEY,
    client?: AxiosInstance,
  ) {
    this.client =
      client ??
      axios.create({
        timeout: 15_000,
      });
    this.client.defaults.baseURL = baseUrl;
    this.client.defaults.headers.common['X-Goog-Api-Key'] = apiKey;
  }

  async searchText(request: PlacesTextSearchRequest, fieldMask: readonly string[]): Promise<PlacesHttpResponse> {
    const res = await this.client.post<unknown>('', request, {
      headers: {
        'Content-Type': 'application/json',
        'X-Goog-FieldMask': fieldMask.join(','),
      },
      validateStatus: () => true,
    });

    return { status: res.status, data: res.data };
  }
}
