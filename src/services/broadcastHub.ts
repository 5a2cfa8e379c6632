import { NotFoundError } from '../errors';
import type { EventEnvelope } from '../types/events';
import { systemClock, type Clock } from '../utils/clock';
import { logger } from '../utils/logger';

export const GLOBAL_GROUP = 'global';
export const SPACE_MONITOR_GROUP = 'space-monitor';

export const taskGroup = (taskId: string): string => `task:${taskId}`;
export const userGroup = (userId: string): string => `user:${userId}`;

/** One transport endpoint as the hub sees it. */
export interface HubConnection {
  readonly id: string;
  send(envelope: EventEnvelope): Promise<void> | void;
}

export type HubDiagnosticKind = 'connection-lagging' | 'delivery-failed';

export interface HubDiagnostic {
  kind: HubDiagnosticKind;
  connectionId: string;
  detail: string;
  at: Date;
}

export interface BroadcastHubOptions {
  queueLimit?: number;
  diagnosticsLimit?: number;
  clock?: Clock;
}

interface ConnectionState {
  connection: HubConnection;
  groups: Set<string>;
  queue: EventEnvelope[];
  draining: boolean;
  dropped: number;
}

/**
 * Group publish/subscribe. Each connection owns a bounded FIFO queue drained
 * independently of every other connection, so publishing never waits on a
 * subscriber and events sent to one connection keep their publish order.
 */
export class BroadcastHub {
  private readonly connections = new Map<string, ConnectionState>();
  private readonly groups = new Map<string, Set<string>>();
  private readonly recorded: HubDiagnostic[] = [];
  private readonly queueLimit: number;
  private readonly diagnosticsLimit: number;
  private readonly clock: Clock;

  constructor(options: BroadcastHubOptions = {}) {
    this.queueLimit = Math.max(1, options.queueLimit ?? 256);
    this.diagnosticsLimit = options.diagnosticsLimit ?? 100;
    this.clock = options.clock ?? systemClock;
  }

  register(connection: HubConnection): void {
    if (this.connections.has(connection.id)) {
      return;
    }
    this.connections.set(connection.id, {
      connection,
      groups: new Set(),
      queue: [],
      draining: false,
      dropped: 0
    });
    logger.debug('hub', `Connection ${connection.id} registered (${this.connections.size} total)`);
  }

  unregister(connectionId: string): void {
    const state = this.connections.get(connectionId);
    if (!state) {
      return;
    }
    for (const group of state.groups) {
      this.removeMember(group, connectionId);
    }
    state.queue.length = 0;
    this.connections.delete(connectionId);
    logger.debug('hub', `Connection ${connectionId} unregistered (${this.connections.size} total)`);
  }

  join(connectionId: string, group: string): void {
    const state = this.connections.get(connectionId);
    if (!state) {
      throw new NotFoundError('Connection', connectionId);
    }
    if (state.groups.has(group)) {
      return;
    }

    state.groups.add(group);
    let members = this.groups.get(group);
    if (!members) {
      members = new Set();
      this.groups.set(group, members);
    }
    members.add(connectionId);
  }

  leave(connectionId: string, group: string): void {
    const state = this.connections.get(connectionId);
    if (!state || !state.groups.delete(group)) {
      return;
    }
    this.removeMember(group, connectionId);
  }

  /**
   * Queues the envelope for every connection in any of the groups, once per
   * connection. Returns how many connections it was queued for.
   */
  publish(groups: string | readonly string[], envelope: EventEnvelope): number {
    const targets = new Set<string>();
    for (const group of typeof groups === 'string' ? [groups] : groups) {
      for (const connectionId of this.groups.get(group) ?? []) {
        targets.add(connectionId);
      }
    }

    for (const connectionId of targets) {
      const state = this.connections.get(connectionId);
      if (state) {
        this.enqueue(state, envelope);
      }
    }
    return targets.size;
  }

  groupsOf(connectionId: string): string[] {
    return Array.from(this.connections.get(connectionId)?.groups ?? []);
  }

  membersOf(group: string): string[] {
    return Array.from(this.groups.get(group) ?? []);
  }

  connectionCount(): number {
    return this.connections.size;
  }

  pendingFor(connectionId: string): number {
    return this.connections.get(connectionId)?.queue.length ?? 0;
  }

  diagnostics(): HubDiagnostic[] {
    return this.recorded.map((entry) => ({ ...entry }));
  }

  private enqueue(state: ConnectionState, envelope: EventEnvelope): void {
    state.queue.push(envelope);
    if (state.queue.length > this.queueLimit) {
      state.queue.shift();
      state.dropped += 1;
      this.record('connection-lagging', state.connection.id, `dropped ${state.dropped} event(s) so far`);
    }

    if (!state.draining) {
      state.draining = true;
      void this.drain(state);
    }
  }

  private async drain(state: ConnectionState): Promise<void> {
    try {
      while (state.queue.length > 0 && this.connections.get(state.connection.id) === state) {
        const next = state.queue.shift();
        if (!next) {
          break;
        }
        try {
          await state.connection.send(next);
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error);
          this.record('delivery-failed', state.connection.id, message);
        }
      }
    } finally {
      state.draining = false;
    }
  }

  private record(kind: HubDiagnosticKind, connectionId: string, detail: string): void {
    this.recorded.push({ kind, connectionId, detail, at: this.clock.now() });
    if (this.recorded.length > this.diagnosticsLimit) {
      this.recorded.shift();
    }
    logger.warn('hub', `${kind} on ${connectionId}: ${detail}`);
  }

  private removeMember(group: string, connectionId: string): void {
    const members = this.groups.get(group);
    if (!members) {
      return;
    }
    members.delete(connectionId);
    if (members.size === 0) {
      this.groups.delete(group);
    }
  }
}
