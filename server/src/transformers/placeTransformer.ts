import { z } from 'zod';
import { Candidate } from '../types/lead';

const localizedText = z.object({ text: z.string().optional() });

/** Raw place record as returned under the field mask CandidateSearch requests */
export const rawPlaceSchema = z.object({
  displayName: localizedText.optional(),
  formattedAddress: z.string().optional(),
  editorialSummary: localizedText.optional(),
  types: z.array(z.string()).optional(),
  websiteUri: z.string().optional(),
  rating: z.number().optional(),
  nationalPhoneNumber: z.string().optional(),
  googleMapsUri: z.string().optional(),
  reviews: z
    .array(
      z.object({
        text: localizedText.optional(),
        originalText: localizedText.optional(),
      }),
    )
    .optional(),
});

export const placesSearchResponseSchema = z.object({
  places: z.array(rawPlaceSchema).default([]),
});

export type RawPlace = z.infer<typeof rawPlaceSchema>;

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function toCandidate(place: RawPlace): Candidate {
  const reviews = (place.reviews ?? [])
    .map((r) => nonEmpty(r.text?.text) ?? nonEmpty(r.originalText?.text))
    .filter((t): t is string => t !== undefined);

  return {
    name: nonEmpty(place.displayName?.text) ?? 'Unknown',
    formattedAddress: place.formattedAddress ?? '',
    summary: nonEmpty(place.editorialSummary?.text),
    categories: place.types ?? [],
    websiteUrl: nonEmpty(place.websiteUri),
    rating: place.rating,
    phone: nonEmpty(place.nationalPhoneNumber),
    mapsUrl: nonEmpty(place.googleMapsUri),
    reviews,
  };
}

export function toCandidates(places: RawPlace[]): Candidate[] {
  return places.map(toCandidate);
}
