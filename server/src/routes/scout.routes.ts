import { Router } from 'express';
import { z } from 'zod';
import { asyncHandler } from '../middleware/asyncHandler';
import { boundingBoxSchema } from '../schemas/boundingBox';
import { AppServices } from '../services/container';
import { toPartitionedLeadViews } from '../transformers/leadViewTransformer';

const scoutSchema = z.object({
  query: z.string().trim().min(1).max(200),
  criteria: z.string().trim().min(1).max(2000),
  box: boundingBoxSchema,
});

export function createScoutRouter(leadScout: AppServices['leadScout']): Router {
  const router = Router();

  /**
   * POST /api/v1/leads/scout
   * Searches the zone and verifies every candidate against the criteria.
   * Responds only once every candidate has a verdict.
   */
  router.post('/scout', asyncHandler(async (req, res) => {
    const parsed = scoutSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: 'Invalid request body', details: parsed.error.flatten() });
      return;
    }

    const report = await leadScout.scout(parsed.data);
    res.json({
      box: report.box,
      query: report.query,
      rawCount: report.rawCount,
      counts: report.partition.counts,
      ...toPartitionedLeadViews(report.partition),
    });
  }));

  return router;
}
