import express, { type Request, type Response } from 'express';
import { z } from 'zod';

import { ValidationError } from '../errors';
import { asyncHandler } from '../middleware/asyncHandler';
import { fromZodError } from '../middleware/errorHandler';
import { calculateRequirement } from '../services/outputEstimator';
import type { SpaceAccountant } from '../services/spaceAccountant';
import { conversionParametersSchema } from './tasks';

const checkSchema = z
  .object({
    requiredBytes: z.number().int().nonnegative().optional(),
    sourceSize: z.number().int().nonnegative().optional(),
    parameters: conversionParametersSchema.default({})
  })
  .refine((body) => body.requiredBytes !== undefined || body.sourceSize !== undefined, {
    message: 'Either requiredBytes or sourceSize is required.'
  });

const configSchema = z.object({
  maxTotal: z.number().int().positive(),
  reserved: z.number().int().nonnegative(),
  enabled: z.boolean().default(true),
  updatedBy: z.string().trim().min(1).max(64).optional()
});

export function createSpaceRouter(accountant: SpaceAccountant): express.Router {
  const router = express.Router();

  router.get('/', (_req: Request, res: Response) => {
    res.json(accountant.getSnapshot());
  });

  router.post(
    '/refresh',
    asyncHandler(async (_req, res) => {
      res.json(await accountant.refresh());
    })
  );

  router.post('/check', (req: Request, res: Response) => {
    const parsed = checkSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      throw fromZodError(parsed.error, 'Invalid space check.');
    }

    const { requiredBytes, sourceSize, parameters } = parsed.data;
    if (sourceSize !== undefined) {
      const requirement = calculateRequirement(sourceSize, parameters);
      res.json({ requirement, ...accountant.checkSpace(requirement.totalRequiredSize, requirement) });
      return;
    }
    if (requiredBytes === undefined) {
      throw new ValidationError('Either requiredBytes or sourceSize is required.');
    }
    res.json(accountant.checkSpace(requiredBytes));
  });

  router.get('/config', (_req: Request, res: Response) => {
    res.json({ config: accountant.getBudget() });
  });

  router.put(
    '/config',
    asyncHandler(async (req, res) => {
      const parsed = configSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        throw fromZodError(parsed.error, 'Invalid space configuration.');
      }

      const { updatedBy, ...update } = parsed.data;
      const config = await accountant.setBudget(update, updatedBy);
      res.json({ message: 'Space configuration updated.', config });
    })
  );

  return router;
}
