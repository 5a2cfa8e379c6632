import express, { type Request, type Response } from 'express';
import { z } from 'zod';

import { asyncHandler } from '../middleware/asyncHandler';
import { fromZodError } from '../middleware/errorHandler';
import { CLEANUP_MODES, type StorageCleaner } from '../services/storageCleaner';

const retention = z.number().nonnegative().optional();
const threshold = z.number().positive().max(100).optional();

const policySchema = z.object({
  enabled: z.boolean().optional(),
  sourceRetentionMinutes: retention,
  outputRetentionHours: retention,
  tempRetentionHours: retention,
  failedRetentionDays: retention,
  orphanRetentionHours: retention,
  aggressiveThreshold: threshold,
  emergencyThreshold: threshold,
  updatedBy: z.string().trim().min(1).max(64).optional()
});

const runSchema = z.object({
  mode: z.enum(CLEANUP_MODES).default('scheduled')
});

export function createCleanupRouter(cleaner: StorageCleaner): express.Router {
  const router = express.Router();

  router.get('/', (_req: Request, res: Response) => {
    res.json({
      policy: cleaner.getPolicy(),
      statistics: cleaner.getStatistics(),
      modes: CLEANUP_MODES,
      lastError: cleaner.lastError?.message
    });
  });

  router.put(
    '/config',
    asyncHandler(async (req, res) => {
      const parsed = policySchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        throw fromZodError(parsed.error, 'Invalid cleanup configuration.');
      }

      const { updatedBy, ...update } = parsed.data;
      const policy = await cleaner.setPolicy(update, updatedBy);
      res.json({ message: 'Cleanup configuration updated.', policy });
    })
  );

  router.post(
    '/run',
    asyncHandler(async (req, res) => {
      const parsed = runSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        throw fromZodError(parsed.error, 'Invalid cleanup request.');
      }
      res.json(await cleaner.run(parsed.data.mode));
    })
  );

  return router;
}
