import express, { type Response } from 'express';
import fs from 'fs';
import path from 'path';

import { ConflictError, errorMessage, NotFoundError } from '../errors';
import { asyncHandler } from '../middleware/asyncHandler';
import type { TaskRegistry } from '../services/taskRegistry';
import { logger } from '../utils/logger';

async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stats = await fs.promises.stat(filePath);
    return stats.isFile();
  } catch {
    return false;
  }
}

function streamFile(res: Response, filePath: string): void {
  const fileName = path.basename(filePath);
  res.setHeader('Content-Type', 'application/octet-stream');
  res.setHeader('Content-Disposition', `attachment; filename="${fileName}"`);

  const readStream = fs.createReadStream(filePath);
  readStream.on('error', (error: Error) => {
    logger.warn('http', `Failed to stream ${fileName}: ${errorMessage(error)}`);
    if (!res.headersSent) {
      res.status(500).json({ error: { code: 'Internal', message: 'Failed to read converted file.' } });
    } else {
      res.destroy(error);
    }
  });

  readStream.pipe(res);
}

export function createDownloadRouter(registry: TaskRegistry): express.Router {
  const router = express.Router();

  router.get(
    '/:taskId',
    asyncHandler(async (req, res) => {
      const task = await registry.get(req.params.taskId);

      if (task.status !== 'completed' || !task.outputPath) {
        throw new ConflictError(`Task ${task.id} is ${task.status} and has no output to download.`);
      }
      if (!(await fileExists(task.outputPath))) {
        throw new NotFoundError('Converted file', task.id);
      }

      streamFile(res, task.outputPath);
    })
  );

  return router;
}
