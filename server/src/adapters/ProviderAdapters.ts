/**
 * Contracts this service needs from its external providers.
 *
 * Each provider is a constructed handle passed into the services that use it.
 */
import { z } from 'zod';

// ── Geocoding ────────────────────────────────────────────────────────────────

const latLngSchema = z.object({ lat: z.number(), lng: z.number() });

export const geocodeResponseSchema = z.object({
  status: z.string(),
  error_message: z.string().optional(),
  results: z
    .array(
      z.object({
        geometry: z.object({
          viewport: z.object({ northeast: latLngSchema, southwest: latLngSchema }),
        }),
      }),
    )
    .default([]),
});

export type GeocodeResponse = z.infer<typeof geocodeResponseSchema>;

export interface GeocodingProvider {
  /** Throws on transport failure; provider-level failures arrive in `status`. */
  geocode(address: string): Promise<GeocodeResponse>;
}

// ── Places ───────────────────────────────────────────────────────────────────

export interface PlacesTextSearchRequest {
  textQuery: string;
  locationRestriction: {
    rectangle: {
      low: { latitude: number; longitude: number };
      high: { latitude: number; longitude: number };
    };
  };
}

export interface PlacesHttpResponse {
  status: number;
  data: unknown;
}

export interface PlacesProvider {
  /**
   * Resolves with whatever status the provider answered; throws only when no
   * response was received at all.
   */
  searchText(request: PlacesTextSearchRequest, fieldMask: readonly string[]): Promise<PlacesHttpResponse>;
}

// ── Language models ──────────────────────────────────────────────────────────

export interface ImageInput {
  data: Buffer;
  /** e.g. "image/png" */
  mimeType: string;
}

export interface VisionModel {
  /** Returns the model's raw text reply. */
  describeImage(prompt: string, image: ImageInput): Promise<string>;
}

export interface ChatRequest {
  system: string;
  user: string;
  temperature: number;
  /** Ask the provider to constrain output to a single JSON object */
  jsonMode: boolean;
}

export interface ChatModel {
  /** Returns the assistant message content. */
  complete(request: ChatRequest): Promise<string>;
}
