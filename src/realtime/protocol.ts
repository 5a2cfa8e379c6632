import { z } from 'zod';

import type { TaskView } from '../services/taskEventPublisher';
import { TASK_STATUSES } from '../types/task';

const GROUP_PATTERN = /^(?:(?:task|user):[A-Za-z0-9_.-]{1,128}|space-monitor|global)$/;

export const groupNameSchema = z.string().regex(GROUP_PATTERN, 'Unknown group name');

export const clientFrameSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('JoinGroup'), name: groupNameSchema }),
  z.object({ type: z.literal('LeaveGroup'), name: groupNameSchema }),
  z.object({ type: z.literal('Ping') }),
  z.object({ type: z.literal('GetActiveTasks') })
]);

export type ClientFrame = z.infer<typeof clientFrameSchema>;

export type ServerControlFrame =
  | { type: 'Connected'; connectionId: string; timestamp: string }
  | { type: 'GroupJoined'; name: string; timestamp: string }
  | { type: 'GroupLeft'; name: string; timestamp: string }
  | { type: 'Pong'; timestamp: string }
  | { type: 'ActiveTasks'; payload: TaskView[]; timestamp: string }
  | { type: 'Error'; message: string; timestamp: string };

export type ParseResult = { ok: true; frame: ClientFrame } | { ok: false; message: string };

export function parseClientFrame(text: string): ParseResult {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return { ok: false, message: 'Frame is not valid JSON.' };
  }

  const parsed = clientFrameSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return { ok: false, message: issue ? `${issue.path.join('.') || 'frame'}: ${issue.message}` : 'Invalid frame.' };
  }
  return { ok: true, frame: parsed.data };
}

export const taskSnapshotSchema = z.object({
  id: z.string(),
  name: z.string(),
  status: z.enum(TASK_STATUSES),
  progress: z.number(),
  speed: z.number().optional(),
  eta: z.number().optional(),
  errorMessage: z.string().optional(),
  ownerId: z.string().optional(),
  createdAt: z.string(),
  startedAt: z.string().optional(),
  completedAt: z.string().optional()
});

export type TaskSnapshot = z.infer<typeof taskSnapshotSchema>;

export const activeTasksResponseSchema = z.object({ tasks: z.array(taskSnapshotSchema) });

export const envelopeSchema = z.object({
  type: z.enum(['ProgressUpdate', 'StatusUpdate', 'TaskCompleted', 'TaskDeleted', 'SpaceStatusUpdate']),
  taskId: z.string().optional(),
  payload: z.unknown(),
  timestamp: z.string()
});

export const serverControlSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('Connected'), connectionId: z.string() }),
  z.object({ type: z.literal('GroupJoined'), name: z.string() }),
  z.object({ type: z.literal('GroupLeft'), name: z.string() }),
  z.object({ type: z.literal('Pong') }),
  z.object({ type: z.literal('ActiveTasks'), payload: z.array(taskSnapshotSchema) }),
  z.object({ type: z.literal('Error'), message: z.string() })
]);
