import fs from 'fs';
import path from 'path';

import { ConflictError, errorMessage, isAppError } from '../errors';
import type { TaskEvent } from '../types/events';
import type { ConversionTask } from '../types/task';
import { logger } from '../utils/logger';
import { normalizeName } from './outputEstimator';
import type { TaskRegistry } from './taskRegistry';

export interface WorkerProgress {
  progress: number;
  speed?: number;
  eta?: number;
}

export interface ConversionJob {
  task: ConversionTask;
  outputPath: string;
  signal: AbortSignal;
  report(progress: WorkerProgress): void;
}

/** The external process that does the actual conversion. Rejecting means the attempt failed. */
export interface ConversionWorker {
  run(job: ConversionJob): Promise<void>;
}

export interface ConversionRunnerOptions {
  registry: TaskRegistry;
  worker: ConversionWorker;
  outputDirectory: string;
  tempDirectory: string;
  maxConcurrent?: number;
  autoStart?: boolean;
}

/**
 * Drives admitted tasks through the worker: starts them up to the concurrency
 * limit, forwards progress, retries failed attempts while the task allows it,
 * and aborts the worker when the task is cancelled or deleted.
 */
export class ConversionRunner {
  private readonly registry: TaskRegistry;
  private readonly worker: ConversionWorker;
  private readonly outputDirectory: string;
  private readonly tempDirectory: string;
  private readonly maxConcurrent: number;
  private readonly autoStart: boolean;
  private readonly running = new Map<string, AbortController>();
  private readonly runs = new Set<Promise<void>>();
  private readonly queue: string[] = [];
  private readonly failures: Error[] = [];
  private readonly unsubscribe: () => void;
  private stopped = false;

  constructor(options: ConversionRunnerOptions) {
    this.registry = options.registry;
    this.worker = options.worker;
    this.outputDirectory = options.outputDirectory;
    this.tempDirectory = options.tempDirectory;
    this.maxConcurrent = Math.max(1, options.maxConcurrent ?? 2);
    this.autoStart = options.autoStart ?? true;
    this.unsubscribe = this.registry.subscribe((event) => this.onTaskEvent(event));
  }

  isRunning(taskId: string): boolean {
    return this.running.has(taskId);
  }

  queued(): string[] {
    return [...this.queue];
  }

  /** Starts a pending task now, regardless of the queue. */
  async start(taskId: string): Promise<ConversionTask> {
    if (this.running.has(taskId)) {
      throw new ConflictError(`Task ${taskId} is already being converted.`);
    }

    const controller = new AbortController();
    this.running.set(taskId, controller);
    this.removeFromQueue(taskId);

    let task: ConversionTask;
    try {
      task = await this.registry.start(taskId);
    } catch (error) {
      this.running.delete(taskId);
      throw error;
    }

    this.track(this.execute(task, controller.signal));
    return task;
  }

  /** Stops accepting work, aborts running workers and waits for them to settle. */
  async stop(): Promise<Error[]> {
    this.stopped = true;
    this.unsubscribe();
    this.queue.length = 0;
    for (const controller of this.running.values()) {
      controller.abort();
    }
    await Promise.all(Array.from(this.runs));
    return [...this.failures];
  }

  private onTaskEvent(event: TaskEvent): void {
    const { task } = event;
    if (event.kind === 'Created' && this.autoStart && !this.stopped) {
      this.queue.push(task.id);
      this.pump();
      return;
    }

    if (event.kind === 'Deleted' || task.status === 'cancelled') {
      this.removeFromQueue(task.id);
      const controller = this.running.get(task.id);
      if (controller && !controller.signal.aborted) {
        logger.info('runner', `Stopping worker for task ${task.id}`);
        controller.abort();
      }
    }
  }

  private pump(): void {
    while (!this.stopped && this.running.size < this.maxConcurrent && this.queue.length > 0) {
      const taskId = this.queue.shift();
      if (taskId === undefined) {
        return;
      }
      this.track(this.startQueued(taskId));
    }
  }

  private async startQueued(taskId: string): Promise<void> {
    try {
      await this.start(taskId);
    } catch (error) {
      // Cancelled or deleted while queued.
      logger.debug('runner', `Skipped queued task ${taskId}: ${errorMessage(error)}`);
    }
  }

  private track(run: Promise<void>): void {
    const tracked = run
      .catch((error: unknown) => {
        const failure = error instanceof Error ? error : new Error(String(error));
        this.failures.push(failure);
        logger.error('runner', 'Background conversion failed unexpectedly', failure);
      })
      .finally(() => {
        this.runs.delete(tracked);
      });
    this.runs.add(tracked);
  }

  private async execute(initial: ConversionTask, signal: AbortSignal): Promise<void> {
    let task = initial;
    const tempPath = path.join(this.tempDirectory, `${task.id}.${this.outputExtension(task)}`);

    try {
      await fs.promises.mkdir(this.tempDirectory, { recursive: true });
      await fs.promises.mkdir(this.outputDirectory, { recursive: true });

      for (;;) {
        try {
          await this.worker.run({
            task,
            outputPath: tempPath,
            signal,
            report: (progress) => {
              void this.reportProgress(task.id, progress);
            }
          });
        } catch (error) {
          if (signal.aborted) {
            return;
          }
          if (task.retryCount < task.maxRetries) {
            logger.warn('runner', `Attempt ${task.retryCount + 1} for task ${task.id} failed: ${errorMessage(error)}`);
            const retried = await this.settle(() => this.registry.recordRetry(task.id));
            if (!retried) {
              return;
            }
            task = retried;
            continue;
          }
          await this.settle(() => this.registry.fail(task.id, errorMessage(error, 'Conversion failed.')));
          return;
        }

        if (signal.aborted) {
          return;
        }
        const outputPath = path.join(this.outputDirectory, this.buildOutputFilename(task));
        try {
          await fs.promises.rename(tempPath, outputPath);
        } catch (error) {
          await this.settle(() => this.registry.fail(task.id, `Could not store output: ${errorMessage(error)}`));
          return;
        }
        await this.settle(() => this.registry.complete(task.id, outputPath));
        return;
      }
    } finally {
      this.running.delete(initial.id);
      await fs.promises.rm(tempPath, { force: true });
      this.pump();
    }
  }

  private async reportProgress(taskId: string, progress: WorkerProgress): Promise<void> {
    try {
      await this.registry.updateProgress(taskId, progress.progress, progress.speed, progress.eta);
    } catch (error) {
      logger.debug('runner', `Dropped progress for task ${taskId}: ${errorMessage(error)}`);
    }
  }

  /** Applies a transition; losing the race to a cancel or delete is expected. */
  private async settle(transition: () => Promise<ConversionTask>): Promise<ConversionTask | undefined> {
    try {
      return await transition();
    } catch (error) {
      if (!isAppError(error)) {
        throw error;
      }
      logger.info('runner', `Task already finished elsewhere: ${error.message}`);
      return undefined;
    }
  }

  private removeFromQueue(taskId: string): void {
    const index = this.queue.indexOf(taskId);
    if (index >= 0) {
      this.queue.splice(index, 1);
    }
  }

  private outputExtension(task: ConversionTask): string {
    const format = normalizeName(task.parameters.outputFormat);
    if (format) {
      return format;
    }
    const sourceExtension = normalizeName(path.extname(task.source.path));
    return sourceExtension || 'mp4';
  }

  private buildOutputFilename(task: ConversionTask): string {
    const base = path.parse(task.source.filename ?? task.source.path).name || 'output';
    return `${base}-${task.id}.${this.outputExtension(task)}`;
  }
}
