import express, { type Request } from 'express';
import fs from 'fs';
import path from 'path';
import { z } from 'zod';

import type { StorageLayout } from '../config/storage';
import { errorMessage, isErrnoException, NotFoundError, ValidationError } from '../errors';
import { asyncHandler } from '../middleware/asyncHandler';
import { fromZodError } from '../middleware/errorHandler';
import type { AdmissionController } from '../services/admissionController';
import type { ConversionRunner } from '../services/conversionRunner';
import { toTaskView, type TaskView } from '../services/taskEventPublisher';
import { MAX_PAGE_SIZE, type TaskRegistry } from '../services/taskRegistry';
import type { ConversionTask } from '../types/task';
import { logger } from '../utils/logger';

export interface TaskRouterDeps {
  registry: TaskRegistry;
  admission: AdmissionController;
  runner?: ConversionRunner;
  storage: StorageLayout;
}

export interface TaskResponse extends TaskView {
  outputPath?: string;
  downloadUrl?: string;
}

const optionalText = z.string().trim().min(1).max(64).optional();
const bitrate = z.number().int().positive().optional();

export const conversionParametersSchema = z.object({
  outputFormat: optionalText,
  videoCodec: optionalText,
  audioCodec: optionalText,
  quality: optionalText,
  resolution: optionalText,
  videoBitrate: bitrate,
  audioBitrate: bitrate
});

export const startTaskSchema = z.object({
  name: z.string().trim().min(1).max(255),
  sourceSize: z.number().int().nonnegative().optional(),
  sourcePath: z.string().trim().min(1).optional(),
  sourceFilename: z.string().trim().min(1).optional(),
  parameters: conversionParametersSchema.default({}),
  userId: z
    .string()
    .regex(/^[A-Za-z0-9_.-]{1,128}$/, 'userId may only contain letters, digits, "_", "." and "-"')
    .optional(),
  maxRetries: z.number().int().min(0).max(10).optional()
});

const completedQuerySchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  pageSize: z.coerce.number().int().min(1).max(MAX_PAGE_SIZE).default(20)
});

const progressSchema = z.object({
  progress: z.number(),
  speed: z.number().nonnegative().optional(),
  eta: z.number().nonnegative().optional()
});

const completeSchema = z.object({ outputPath: z.string().trim().min(1).optional() });

const failSchema = z.object({ message: z.string().max(2_000).default('') });

function parse<S extends z.ZodTypeAny>(schema: S, value: unknown, message?: string): z.output<S> {
  const parsed = schema.safeParse(value ?? {});
  if (!parsed.success) {
    throw fromZodError(parsed.error, message);
  }
  return parsed.data;
}

/** Resolves a client-supplied path that must stay inside the storage root. */
export function resolveStoragePath(root: string, relativePath: string): string {
  if (path.isAbsolute(relativePath)) {
    throw new ValidationError('Paths must be relative to the storage directory.', [relativePath]);
  }

  const absolute = path.resolve(root, path.normalize(relativePath));
  const relative = path.relative(root, absolute);
  if (relative.startsWith('..') || path.isAbsolute(relative)) {
    throw new ValidationError('Paths must resolve within the storage directory.', [relativePath]);
  }
  return absolute;
}

function buildDownloadUrl(req: Request, taskId: string): string | undefined {
  const host = req.get('host');

  if (!host) {
    return undefined;
  }

  try {
    return new URL(`download/${encodeURIComponent(taskId)}`, `${req.protocol}://${host}`).toString();
  } catch (_error) {
    return undefined;
  }
}

export function createTaskRouter(deps: TaskRouterDeps): express.Router {
  const { registry, admission, runner, storage } = deps;
  const router = express.Router();

  function present(req: Request, task: ConversionTask): TaskResponse {
    const outputPath = task.outputPath
      ? path.relative(storage.converted, task.outputPath).replace(/\\/g, '/')
      : undefined;
    const downloadUrl = task.status === 'completed' && task.outputPath ? buildDownloadUrl(req, task.id) : undefined;
    return { ...toTaskView(task), outputPath, downloadUrl };
  }

  async function measureSource(absolutePath: string, displayPath: string): Promise<number> {
    try {
      const stats = await fs.promises.stat(absolutePath);
      return stats.size;
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        throw new NotFoundError('Source file', displayPath);
      }
      throw error;
    }
  }

  router.post(
    '/',
    asyncHandler(async (req, res) => {
      const body = parse(startTaskSchema, req.body, 'Invalid task request.');
      const sourcePath = body.sourcePath ? resolveStoragePath(storage.root, body.sourcePath) : undefined;

      let sourceSize = body.sourceSize;
      if (sourceSize === undefined) {
        if (!sourcePath || !body.sourcePath) {
          throw new ValidationError('sourceSize is required when no sourcePath is given.');
        }
        sourceSize = await measureSource(sourcePath, body.sourcePath);
      }

      const task = await admission.admit({
        name: body.name,
        sourceSize,
        sourcePath,
        sourceFilename: body.sourceFilename ?? (body.sourcePath ? path.basename(body.sourcePath) : undefined),
        parameters: body.parameters,
        userId: body.userId,
        maxRetries: body.maxRetries
      });

      res.status(202).json({ taskId: task.id, task: present(req, task) });
    })
  );

  router.get(
    '/active',
    asyncHandler(async (req, res) => {
      const tasks = await registry.listActive();
      res.json({ tasks: tasks.map((task) => present(req, task)) });
    })
  );

  router.get(
    '/completed',
    asyncHandler(async (req, res) => {
      const query = parse(completedQuerySchema, req.query, 'Invalid paging parameters.');
      const result = await registry.listCompleted(query.page, query.pageSize);
      res.json({
        tasks: result.tasks.map((task) => present(req, task)),
        page: result.page,
        pageSize: result.pageSize,
        total: result.total
      });
    })
  );

  router.get(
    '/:taskId',
    asyncHandler(async (req, res) => {
      const task = await registry.get(req.params.taskId);
      res.json({ task: present(req, task) });
    })
  );

  router.post(
    '/:taskId/cancel',
    asyncHandler(async (req, res) => {
      const task = await registry.cancel(req.params.taskId);
      res.json({ message: 'Task cancelled.', task: present(req, task) });
    })
  );

  router.delete(
    '/:taskId',
    asyncHandler(async (req, res) => {
      const task = await registry.delete(req.params.taskId);
      if (task.outputPath) {
        await fs.promises.rm(task.outputPath, { force: true }).catch((error: unknown) => {
          logger.warn('http', `Could not remove output of task ${task.id}: ${errorMessage(error)}`);
        });
      }
      res.json({ message: 'Task deleted.', taskId: task.id });
    })
  );

  // Callbacks for workers that run outside this process.
  router.post(
    '/:taskId/start',
    asyncHandler(async (req, res) => {
      const { taskId } = req.params;
      const task = runner ? await runner.start(taskId) : await registry.start(taskId);
      res.json({ task: present(req, task) });
    })
  );

  router.post(
    '/:taskId/progress',
    asyncHandler(async (req, res) => {
      const body = parse(progressSchema, req.body, 'Invalid progress report.');
      const task = await registry.updateProgress(req.params.taskId, body.progress, body.speed, body.eta);
      res.json({ task: present(req, task) });
    })
  );

  router.post(
    '/:taskId/complete',
    asyncHandler(async (req, res) => {
      const body = parse(completeSchema, req.body, 'Invalid completion report.');
      const outputPath = body.outputPath ? resolveStoragePath(storage.root, body.outputPath) : undefined;
      const task = await registry.complete(req.params.taskId, outputPath);
      res.json({ task: present(req, task) });
    })
  );

  router.post(
    '/:taskId/fail',
    asyncHandler(async (req, res) => {
      const body = parse(failSchema, req.body, 'Invalid failure report.');
      const task = await registry.fail(req.params.taskId, body.message);
      res.json({ task: present(req, task) });
    })
  );

  return router;
}
