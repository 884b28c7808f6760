import { z } from 'zod';
import { BoundingBox } from '../types/lead';

const rawBoxSchema = z.object({
  north: z.number().finite().min(-90).max(90),
  south: z.number().finite().min(-90).max(90),
  east: z.number().finite().min(-180).max(180),
  west: z.number().finite().min(-180).max(180),
});

/**
 * A box is usable only when it has positive extent on both axes.
 * Boxes that cross the antimeridian are not supported.
 */
export const boundingBoxSchema = rawBoxSchema
  .refine((b) => b.north > b.south, { message: 'north must be greater than south', path: ['north'] })
  .refine((b) => b.east > b.west, { message: 'east must be greater than west', path: ['east'] });

/** Returns a human-readable problem with the box, or null when it is usable. */
export function describeInvalidBox(box: unknown): string | null {
  const parsed = boundingBoxSchema.safeParse(box);
  if (parsed.success) return null;
  return parsed.error.issues.map((i) => `${i.path.join('.') || 'box'}: ${i.message}`).join('; ');
}

export function toBoundingBox(value: unknown): BoundingBox | null {
  const parsed = boundingBoxSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}
