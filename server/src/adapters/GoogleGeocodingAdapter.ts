import axios, { AxiosInstance } from 'axios';
import { GeocodeResponse, GeocodingProvider, geocodeResponseSchema } from './ProviderAdapters';
import { env } from '../config/env';

export class GoogleGeocodingAdapter implements GeocodingProvider {
  private readonly client: AxiosInstance;

  constructor(
    baseUrl = env.GEOCODE_URL,
    private readonly apiKey = env.GOOGLE_API_KEY,
    client?: AxiosInstance,
  ) {
    this.client =
      client ??
      axios.create({
        timeout: 10_000,
        headers: { Accept: 'application/json' },
      });
    this.client.defaults.baseURL = baseUrl;
  }

  async geocode(address: string): Promise<GeocodeResponse> {
    // Geocoding reports failures in the body with HTTP 200; anything else is transport-level.
    const { data } = await this.client.get<unknown>('', {
      params: { address, key: this.apiKey },
    });

    return geocodeResponseSchema.parse(data);
  }
}
