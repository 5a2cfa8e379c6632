import type { ActiveStatus, TaskStatus, TerminalStatus } from '../types/task';

const TRANSITIONS = {
  pending: ['converting', 'cancelled', 'failed'],
  converting: ['completed', 'failed', 'cancelled'],
  completed: [],
  failed: [],
  cancelled: []
} as const satisfies Record<TaskStatus, readonly TaskStatus[]>;

const TERMINAL: Record<TaskStatus, boolean> = {
  pending: false,
  converting: false,
  completed: true,
  failed: true,
  cancelled: true
};

const LABELS: Record<TaskStatus, string> = {
  pending: 'Pending',
  converting: 'Converting',
  completed: 'Completed',
  failed: 'Failed',
  cancelled: 'Cancelled'
};

export function allowedTransitions(from: TaskStatus): readonly TaskStatus[] {
  return TRANSITIONS[from];
}

export function canTransition(from: TaskStatus, to: TaskStatus): boolean {
  return allowedTransitions(from).includes(to);
}

export function isTerminal(status: TaskStatus): status is TerminalStatus {
  return TERMINAL[status];
}

export function isActive(status: TaskStatus): status is ActiveStatus {
  return !TERMINAL[status];
}

export function statusLabel(status: TaskStatus): string {
  return LABELS[status];
}
