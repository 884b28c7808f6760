import { Router } from 'express';
import { z } from 'zod';
import { asyncHandler } from '../middleware/asyncHandler';
import { AppServices } from '../services/container';

const textSchema = z.object({
  locationHint: z.string().trim().min(1).max(200),
});

const imageSchema = z.object({
  image: z.string().min(1, 'image (base64) is required'),
  mimeType: z.enum(['image/png', 'image/jpeg']),
});

export function createZoneRouter(zoneResolver: AppServices['zoneResolver']): Router {
  const router = Router();

  /**
   * POST /api/v1/zones/text
   * Resolves a postal code or address to the zone's bounding box.
   */
  router.post('/text', asyncHandler(async (req, res) => {
    const parsed = textSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: 'Invalid request body', details: parsed.error.flatten() });
      return;
    }

    const box = await zoneResolver.resolveFromText(parsed.data.locationHint);
    res.json({ box });
  }));

  /**
   * POST /api/v1/zones/image
   * Estimates the bounding box shown in a base64-encoded map screenshot.
   */
  router.post('/image', asyncHandler(async (req, res) => {
    const parsed = imageSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: 'Invalid request body', details: parsed.error.flatten() });
      return;
    }

    const data = Buffer.from(parsed.data.image.replace(/^data:[^,]*,/, ''), 'base64');
    const box = await zoneResolver.resolveFromImage({ data, mimeType: parsed.data.mimeType });
    res.json({ box });
  }));

  return router;
}
