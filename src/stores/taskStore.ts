import type { ConversionTask } from '../types/task';

/** Row store for task records. Implementations must return copies, never live references. */
export interface TaskStore {
  get(id: string): Promise<ConversionTask | undefined>;
  put(task: ConversionTask): Promise<void>;
  delete(id: string): Promise<boolean>;
  list(): Promise<ConversionTask[]>;
}

function cloneTask(task: ConversionTask): ConversionTask {
  return {
    ...task,
    source: { ...task.source },
    parameters: { ...task.parameters },
    createdAt: new Date(task.createdAt.getTime()),
    startedAt: task.startedAt ? new Date(task.startedAt.getTime()) : undefined,
    completedAt: task.completedAt ? new Date(task.completedAt.getTime()) : undefined
  };
}

export class InMemoryTaskStore implements TaskStore {
  private readonly tasks = new Map<string, ConversionTask>();

  async get(id: string): Promise<ConversionTask | undefined> {
    const task = this.tasks.get(id);
    return task ? cloneTask(task) : undefined;
  }

  async put(task: ConversionTask): Promise<void> {
    this.tasks.set(task.id, cloneTask(task));
  }

  async delete(id: string): Promise<boolean> {
    return this.tasks.delete(id);
  }

  async list(): Promise<ConversionTask[]> {
    return Array.from(this.tasks.values(), cloneTask);
  }
}
