import type { ConversionTask } from './task';
import type { SpaceUsageSnapshot } from './space';

interface EventBase {
  timestamp: Date;
}

export interface TaskCreatedEvent extends EventBase {
  kind: 'Created';
  task: ConversionTask;
}

export interface ProgressUpdatedEvent extends EventBase {
  kind: 'ProgressUpdated';
  task: ConversionTask;
}

export interface StatusChangedEvent extends EventBase {
  kind: 'StatusChanged';
  task: ConversionTask;
}

export interface TaskCompletedEvent extends EventBase {
  kind: 'Completed';
  task: ConversionTask;
}

export interface TaskDeletedEvent extends EventBase {
  kind: 'Deleted';
  task: ConversionTask;
}

export interface SpaceStatusChangedEvent extends EventBase {
  kind: 'SpaceStatusChanged';
  space: SpaceUsageSnapshot;
}

export type TaskEvent =
  | TaskCreatedEvent
  | ProgressUpdatedEvent
  | StatusChangedEvent
  | TaskCompletedEvent
  | TaskDeletedEvent;

export type EngineEvent = TaskEvent | SpaceStatusChangedEvent;

export type EnvelopeType =
  | 'ProgressUpdate'
  | 'StatusUpdate'
  | 'TaskCompleted'
  | 'TaskDeleted'
  | 'SpaceStatusUpdate';

/** What goes over the wire to subscribers. */
export interface EventEnvelope {
  type: EnvelopeType;
  taskId?: string;
  payload: unknown;
  timestamp: string;
}
