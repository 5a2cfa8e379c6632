export const TASK_STATUSES = ['pending', 'converting', 'completed', 'failed', 'cancelled'] as const;

export type TaskStatus = (typeof TASK_STATUSES)[number];

export type TerminalStatus = Extract<TaskStatus, 'completed' | 'failed' | 'cancelled'>;

export type ActiveStatus = Exclude<TaskStatus, TerminalStatus>;

export interface SourceDescriptor {
  path: string;
  size: number;
  filename?: string;
}

/**
 * Conversion settings handed to the worker untouched. Only `videoCodec` and
 * `outputFormat` are read by the engine, to size the admission reservation.
 */
export interface ConversionParameters {
  outputFormat?: string;
  videoCodec?: string;
  audioCodec?: string;
  quality?: string;
  resolution?: string;
  videoBitrate?: number;
  audioBitrate?: number;
}

export interface ConversionTask {
  id: string;
  name: string;
  source: SourceDescriptor;
  parameters: Readonly<ConversionParameters>;
  status: TaskStatus;
  progress: number;
  speed?: number;
  eta?: number;
  errorMessage?: string;
  outputPath?: string;
  ownerId?: string;
  reservedBytes: number;
  retryCount: number;
  maxRetries: number;
  createdAt: Date;
  startedAt?: Date;
  completedAt?: Date;
}

export interface CreateTaskOptions {
  ownerId?: string;
  maxRetries?: number;
  reservedBytes?: number;
}
