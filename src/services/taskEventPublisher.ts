import type { EngineEvent, EnvelopeType, EventEnvelope, TaskEvent } from '../types/events';
import type { SpaceUsageSnapshot } from '../types/space';
import type { ConversionTask } from '../types/task';
import { systemClock, type Clock } from '../utils/clock';
import { GLOBAL_GROUP, SPACE_MONITOR_GROUP, taskGroup, userGroup, type BroadcastHub } from './broadcastHub';
import type { SpaceAccountant } from './spaceAccountant';
import type { TaskRegistry } from './taskRegistry';

export interface TaskView {
  id: string;
  name: string;
  status: ConversionTask['status'];
  progress: number;
  speed?: number;
  eta?: number;
  errorMessage?: string;
  sourcePath: string;
  sourceSize: number;
  sourceFilename?: string;
  parameters: ConversionTask['parameters'];
  ownerId?: string;
  reservedBytes: number;
  retryCount: number;
  maxRetries: number;
  createdAt: string;
  startedAt?: string;
  completedAt?: string;
}

export function toTaskView(task: ConversionTask): TaskView {
  return {
    id: task.id,
    name: task.name,
    status: task.status,
    progress: task.progress,
    speed: task.speed,
    eta: task.eta,
    errorMessage: task.errorMessage,
    sourcePath: task.source.path,
    sourceSize: task.source.size,
    sourceFilename: task.source.filename,
    parameters: task.parameters,
    ownerId: task.ownerId,
    reservedBytes: task.reservedBytes,
    retryCount: task.retryCount,
    maxRetries: task.maxRetries,
    createdAt: task.createdAt.toISOString(),
    startedAt: task.startedAt?.toISOString(),
    completedAt: task.completedAt?.toISOString()
  };
}

const ENVELOPE_TYPES: Record<EngineEvent['kind'], EnvelopeType> = {
  Created: 'StatusUpdate',
  StatusChanged: 'StatusUpdate',
  ProgressUpdated: 'ProgressUpdate',
  Completed: 'TaskCompleted',
  Deleted: 'TaskDeleted',
  SpaceStatusChanged: 'SpaceStatusUpdate'
};

export function toEnvelope(event: EngineEvent): EventEnvelope {
  const timestamp = event.timestamp.toISOString();
  if (event.kind === 'SpaceStatusChanged') {
    return { type: ENVELOPE_TYPES[event.kind], payload: event.space, timestamp };
  }
  return {
    type: ENVELOPE_TYPES[event.kind],
    taskId: event.task.id,
    payload: toTaskView(event.task),
    timestamp
  };
}

/** Groups a task event is delivered to. Progress is high-volume and stays on the task's own group. */
export function groupsFor(event: TaskEvent): string[] {
  const groups = [taskGroup(event.task.id)];
  if (event.kind === 'ProgressUpdated') {
    return groups;
  }
  groups.push(GLOBAL_GROUP);
  if (event.task.ownerId) {
    groups.push(userGroup(event.task.ownerId));
  }
  return groups;
}

/** Forwards registry and space changes to the hub. */
export class TaskEventPublisher {
  private readonly detach: Array<() => void> = [];

  constructor(
    private readonly hub: BroadcastHub,
    private readonly clock: Clock = systemClock
  ) {}

  attach(registry: TaskRegistry, accountant: SpaceAccountant): this {
    this.detach.push(registry.subscribe((event) => this.publishTaskEvent(event)));
    this.detach.push(accountant.onChange((snapshot) => this.publishSpace(snapshot)));
    return this;
  }

  publishTaskEvent(event: TaskEvent): void {
    this.hub.publish(groupsFor(event), toEnvelope(event));
  }

  publishSpace(space: SpaceUsageSnapshot): void {
    this.hub.publish(
      [SPACE_MONITOR_GROUP, GLOBAL_GROUP],
      toEnvelope({ kind: 'SpaceStatusChanged', space, timestamp: this.clock.now() })
    );
  }

  dispose(): void {
    while (this.detach.length > 0) {
      this.detach.pop()?.();
    }
  }
}
