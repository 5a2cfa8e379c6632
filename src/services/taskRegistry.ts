import { InvalidTransitionError, NotFoundError, OutOfRangeError, ValidationError } from '../errors';
import type { TaskStore } from '../stores/taskStore';
import type { TaskEvent } from '../types/events';
import type {
  ConversionParameters,
  ConversionTask,
  CreateTaskOptions,
  SourceDescriptor,
  TaskStatus
} from '../types/task';
import { systemClock, uuidGenerator, type Clock, type IdGenerator } from '../utils/clock';
import { KeyedMutex } from '../utils/keyedMutex';
import { logger } from '../utils/logger';
import { canTransition, isActive, isTerminal } from './taskStateMachine';

export type TaskEventListener = (event: TaskEvent) => void;

export interface TaskRegistryOptions {
  store: TaskStore;
  clock?: Clock;
  ids?: IdGenerator;
  defaultMaxRetries?: number;
}

export interface CompletedPage {
  tasks: ConversionTask[];
  page: number;
  pageSize: number;
  total: number;
}

export const MAX_PAGE_SIZE = 100;

/**
 * Authoritative owner of task state. Every mutation runs under the task's own
 * lock, is written to the store, and then announced to listeners exactly once.
 */
export class TaskRegistry {
  private readonly store: TaskStore;
  private readonly clock: Clock;
  private readonly ids: IdGenerator;
  private readonly defaultMaxRetries: number;
  private readonly locks = new KeyedMutex();
  private readonly listeners = new Set<TaskEventListener>();

  constructor(options: TaskRegistryOptions) {
    this.store = options.store;
    this.clock = options.clock ?? systemClock;
    this.ids = options.ids ?? uuidGenerator;
    this.defaultMaxRetries = options.defaultMaxRetries ?? 0;
  }

  subscribe(listener: TaskEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async create(
    name: string,
    source: SourceDescriptor,
    parameters: ConversionParameters = {},
    options: CreateTaskOptions = {}
  ): Promise<ConversionTask> {
    const issues = validateCreate(name, source, options);
    if (issues.length > 0) {
      throw new ValidationError('Invalid task definition.', issues);
    }

    const task: ConversionTask = {
      id: this.ids.next(),
      name: name.trim(),
      source: { ...source },
      parameters: Object.freeze({ ...parameters }),
      status: 'pending',
      progress: 0,
      ownerId: options.ownerId,
      reservedBytes: options.reservedBytes ?? 0,
      retryCount: 0,
      maxRetries: options.maxRetries ?? this.defaultMaxRetries,
      createdAt: this.clock.now()
    };

    return await this.locks.run(task.id, async () => {
      await this.store.put(task);
      logger.info('registry', `Task ${task.id} created (${task.name})`);
      this.emit({ kind: 'Created', task, timestamp: this.clock.now() });
      return task;
    });
  }

  async start(id: string): Promise<ConversionTask> {
    return await this.transition(id, 'converting', (task, now) => ({
      ...task,
      progress: 0,
      startedAt: now,
      speed: undefined,
      eta: undefined
    }));
  }

  async updateProgress(id: string, progress: number, speed?: number, eta?: number): Promise<ConversionTask> {
    if (!Number.isInteger(progress) || progress < 0 || progress > 100) {
      throw new OutOfRangeError('progress', progress, 0, 100);
    }
    if (speed !== undefined && (!Number.isFinite(speed) || speed < 0)) {
      throw new ValidationError('speed must be a non-negative number.');
    }
    if (eta !== undefined && (!Number.isFinite(eta) || eta < 0)) {
      throw new ValidationError('eta must be a non-negative number of seconds.');
    }

    return await this.locks.run(id, async () => {
      const task = await this.load(id);
      if (task.status !== 'converting') {
        throw new InvalidTransitionError(id, task.status, 'progress');
      }

      const next: ConversionTask = { ...task, progress, speed, eta };
      await this.store.put(next);
      this.emit({ kind: 'ProgressUpdated', task: next, timestamp: this.clock.now() });
      return next;
    });
  }

  async complete(id: string, outputPath?: string): Promise<ConversionTask> {
    return await this.transition(id, 'completed', (task, now) => ({
      ...task,
      progress: 100,
      eta: undefined,
      outputPath: outputPath ?? task.outputPath,
      completedAt: now
    }));
  }

  async fail(id: string, message: string): Promise<ConversionTask> {
    const errorMessage = message.trim() || 'Conversion failed.';
    return await this.transition(id, 'failed', (task, now) => ({
      ...task,
      errorMessage,
      eta: undefined,
      completedAt: now
    }));
  }

  async cancel(id: string): Promise<ConversionTask> {
    return await this.transition(id, 'cancelled', (task, now) => ({
      ...task,
      eta: undefined,
      completedAt: now
    }));
  }

  /** Counts another worker attempt for a converting task and rewinds its progress. */
  async recordRetry(id: string): Promise<ConversionTask> {
    return await this.locks.run(id, async () => {
      const task = await this.load(id);
      if (task.status !== 'converting' || task.retryCount >= task.maxRetries) {
        throw new InvalidTransitionError(id, task.status, 'retry');
      }

      const next: ConversionTask = {
        ...task,
        retryCount: task.retryCount + 1,
        progress: 0,
        speed: undefined,
        eta: undefined
      };
      await this.store.put(next);
      logger.info('registry', `Task ${id} retry ${next.retryCount}/${next.maxRetries}`);
      this.emit({ kind: 'StatusChanged', task: next, timestamp: this.clock.now() });
      return next;
    });
  }

  async delete(id: string): Promise<ConversionTask> {
    return await this.locks.run(id, async () => {
      const task = await this.load(id);
      await this.store.delete(id);
      logger.info('registry', `Task ${id} deleted`);
      this.emit({ kind: 'Deleted', task, timestamp: this.clock.now() });
      return task;
    });
  }

  async find(id: string): Promise<ConversionTask | undefined> {
    return await this.store.get(id);
  }

  async get(id: string): Promise<ConversionTask> {
    return await this.load(id);
  }

  async list(): Promise<ConversionTask[]> {
    const tasks = await this.store.list();
    return tasks.sort(byCreatedAt);
  }

  async listActive(): Promise<ConversionTask[]> {
    const tasks = await this.store.list();
    return tasks.filter((task) => isActive(task.status)).sort(byCreatedAt);
  }

  async listCompleted(page: number, pageSize: number): Promise<CompletedPage> {
    if (!Number.isInteger(page) || page < 1) {
      throw new ValidationError('page must be a positive integer.');
    }
    if (!Number.isInteger(pageSize) || pageSize < 1 || pageSize > MAX_PAGE_SIZE) {
      throw new OutOfRangeError('pageSize', pageSize, 1, MAX_PAGE_SIZE);
    }

    const finished = (await this.store.list())
      .filter((task) => isTerminal(task.status))
      .sort((a, b) => completedTime(b) - completedTime(a));
    const offset = (page - 1) * pageSize;

    return {
      tasks: finished.slice(offset, offset + pageSize),
      page,
      pageSize,
      total: finished.length
    };
  }

  private async transition(
    id: string,
    to: TaskStatus,
    apply: (task: ConversionTask, now: Date) => ConversionTask
  ): Promise<ConversionTask> {
    return await this.locks.run(id, async () => {
      const task = await this.load(id);
      if (!canTransition(task.status, to)) {
        throw new InvalidTransitionError(id, task.status, to);
      }

      const now = this.clock.now();
      const next: ConversionTask = { ...apply(task, now), status: to };
      await this.store.put(next);
      logger.info('registry', `Task ${id} ${task.status} -> ${to}`);

      this.emit({
        kind: to === 'completed' || to === 'failed' ? 'Completed' : 'StatusChanged',
        task: next,
        timestamp: now
      });
      return next;
    });
  }

  private async load(id: string): Promise<ConversionTask> {
    const task = await this.store.get(id);
    if (!task) {
      throw new NotFoundError('Task', id);
    }
    return task;
  }

  private emit(event: TaskEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        logger.error('registry', `Listener failed on ${event.kind} for task ${event.task.id}`, error);
      }
    }
  }
}

function validateCreate(name: string, source: SourceDescriptor, options: CreateTaskOptions): string[] {
  const issues: string[] = [];

  if (!name || !name.trim()) {
    issues.push('name is required.');
  }
  if (!source.path || !source.path.trim()) {
    issues.push('source.path is required.');
  }
  if (!Number.isSafeInteger(source.size) || source.size < 0) {
    issues.push('source.size must be a non-negative integer.');
  }
  if (options.maxRetries !== undefined && (!Number.isInteger(options.maxRetries) || options.maxRetries < 0)) {
    issues.push('maxRetries must be a non-negative integer.');
  }

  return issues;
}

function byCreatedAt(a: ConversionTask, b: ConversionTask): number {
  return a.createdAt.getTime() - b.createdAt.getTime();
}

function completedTime(task: ConversionTask): number {
  return task.completedAt?.getTime() ?? 0;
}
