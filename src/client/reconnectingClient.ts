import { WebSocket } from 'ws';
import { z } from 'zod';

import {
  activeTasksResponseSchema,
  envelopeSchema,
  serverControlSchema,
  taskSnapshotSchema,
  type TaskSnapshot
} from '../realtime/protocol';
import { isTerminal } from '../services/taskStateMachine';
import { logger } from '../utils/logger';

export type Envelope = z.infer<typeof envelopeSchema>;

/** Minimal socket surface; `wsSocketFactory` adapts a `ws` client to it. */
export interface ClientSocket {
  send(data: string): void;
  close(): void;
  onOpen(listener: () => void): void;
  onMessage(listener: (text: string) => void): void;
  onClose(listener: () => void): void;
  onError(listener: (error: Error) => void): void;
}

export type SocketFactory = (url: string) => ClientSocket;

export type ClientState = 'idle' | 'connecting' | 'open' | 'reconnecting' | 'closed' | 'failed';

export interface ClientEvents {
  connected: { connectionId?: string; reconnect: boolean };
  disconnected: { willReconnect: boolean };
  reconnecting: { attempt: number; delayMs: number };
  reconnectFailed: { attempts: number };
  resynced: { tasks: TaskSnapshot[] };
  event: Envelope;
  error: Error;
}

type Listener<T> = (payload: T) => void;

export interface ReconnectingClientOptions {
  url: string;
  fetchActiveTasks: () => Promise<unknown>;
  socketFactory?: SocketFactory;
  baseDelayMs?: number;
  maxAttempts?: number;
  pingIntervalMs?: number;
}

export function wsSocketFactory(url: string): ClientSocket {
  const socket = new WebSocket(url);
  return {
    send: (data) => socket.send(data),
    close: () => socket.close(1000, 'Client closed'),
    onOpen: (listener) => {
      socket.on('open', listener);
    },
    onMessage: (listener) => {
      socket.on('message', (data) => listener(data.toString()));
    },
    onClose: (listener) => {
      socket.on('close', () => listener());
    },
    onError: (listener) => {
      socket.on('error', listener);
    }
  };
}

/** Fetches `GET /tasks/active` from the HTTP surface and returns the task list. */
export function httpActiveTasksFetcher(baseUrl: string): () => Promise<TaskSnapshot[]> {
  return async () => {
    const response = await fetch(new URL('/tasks/active', baseUrl));
    if (!response.ok) {
      throw new Error(`Active task request failed with status ${response.status}`);
    }
    const body: unknown = await response.json();
    return activeTasksResponseSchema.parse(body).tasks;
  };
}

/**
 * Consumer side of the real-time channel. Missed events are never replayed:
 * after every (re)connection the client re-joins its groups and replaces its
 * view of active tasks with a fresh snapshot.
 */
export class ReconnectingClient {
  private readonly url: string;
  private readonly fetchActiveTasks: () => Promise<unknown>;
  private readonly socketFactory: SocketFactory;
  private readonly baseDelayMs: number;
  private readonly maxAttempts: number;
  private readonly pingIntervalMs: number;

  private readonly interests = new Set<string>();
  private readonly tasks = new Map<string, TaskSnapshot>();
  private readonly listeners: { [K in keyof ClientEvents]: Set<Listener<ClientEvents[K]>> } = {
    connected: new Set(),
    disconnected: new Set(),
    reconnecting: new Set(),
    reconnectFailed: new Set(),
    resynced: new Set(),
    event: new Set(),
    error: new Set()
  };

  private socket?: ClientSocket;
  private state: ClientState = 'idle';
  private attempts = 0;
  private hasConnected = false;
  private connectionId?: string;
  private reconnectTimer?: NodeJS.Timeout;
  private pingTimer?: NodeJS.Timeout;
  private resyncBuffer?: Envelope[];
  private resyncGeneration = 0;

  constructor(options: ReconnectingClientOptions) {
    this.url = options.url;
    this.fetchActiveTasks = options.fetchActiveTasks;
    this.socketFactory = options.socketFactory ?? wsSocketFactory;
    this.baseDelayMs = options.baseDelayMs ?? 3_000;
    this.maxAttempts = options.maxAttempts ?? 5;
    this.pingIntervalMs = options.pingIntervalMs ?? 30_000;
  }

  on<K extends keyof ClientEvents>(event: K, listener: Listener<ClientEvents[K]>): () => void {
    const set: Set<Listener<ClientEvents[K]>> = this.listeners[event];
    set.add(listener);
    return () => {
      set.delete(listener);
    };
  }

  getState(): ClientState {
    return this.state;
  }

  getConnectionId(): string | undefined {
    return this.connectionId;
  }

  getGroups(): string[] {
    return Array.from(this.interests);
  }

  getTasks(): TaskSnapshot[] {
    return Array.from(this.tasks.values());
  }

  getTask(id: string): TaskSnapshot | undefined {
    return this.tasks.get(id);
  }

  connect(): void {
    if (this.state === 'open' || this.state === 'connecting') {
      return;
    }
    this.attempts = 0;
    this.open('connecting');
  }

  joinGroup(name: string): void {
    this.interests.add(name);
    this.sendFrame({ type: 'JoinGroup', name });
  }

  leaveGroup(name: string): void {
    if (this.interests.delete(name)) {
      this.sendFrame({ type: 'LeaveGroup', name });
    }
  }

  ping(): void {
    this.sendFrame({ type: 'Ping' });
  }

  /** Deliberate disconnect; no reconnection follows. */
  close(): void {
    this.state = 'closed';
    this.clearTimers();
    const socket = this.socket;
    this.socket = undefined;
    socket?.close();
  }

  private open(state: 'connecting' | 'reconnecting'): void {
    this.state = state;
    let socket: ClientSocket;
    try {
      socket = this.socketFactory(this.url);
    } catch (error) {
      this.emit('error', error instanceof Error ? error : new Error(String(error)));
      this.scheduleReconnect();
      return;
    }

    this.socket = socket;
    socket.onOpen(() => {
      if (this.socket === socket) {
        this.handleOpen();
      }
    });
    socket.onMessage((text) => {
      if (this.socket === socket) {
        this.handleMessage(text);
      }
    });
    socket.onError((error) => {
      if (this.socket === socket) {
        this.emit('error', error);
      }
    });
    socket.onClose(() => {
      if (this.socket === socket) {
        this.handleClose();
      }
    });
  }

  private handleOpen(): void {
    const reconnect = this.hasConnected;
    this.state = 'open';
    this.hasConnected = true;

    for (const name of this.interests) {
      this.sendFrame({ type: 'JoinGroup', name });
    }
    this.startPing();
    logger.info('client', `${reconnect ? 'Reconnected' : 'Connected'} to ${this.url}`);
    this.emit('connected', { connectionId: this.connectionId, reconnect });
    void this.resync();
  }

  private handleClose(): void {
    this.socket = undefined;
    this.stopPing();
    this.resyncBuffer = undefined;
    if (this.state === 'closed' || this.state === 'failed') {
      return;
    }
    this.emit('disconnected', { willReconnect: this.attempts < this.maxAttempts });
    this.scheduleReconnect();
  }

  private scheduleReconnect(): void {
    if (this.attempts >= this.maxAttempts) {
      this.state = 'failed';
      logger.warn('client', `Giving up after ${this.attempts} reconnect attempt(s)`);
      this.emit('reconnectFailed', { attempts: this.attempts });
      return;
    }

    this.attempts += 1;
    const delayMs = this.baseDelayMs * 2 ** (this.attempts - 1);
    this.state = 'reconnecting';
    logger.info('client', `Reconnect attempt ${this.attempts} in ${delayMs}ms`);
    this.emit('reconnecting', { attempt: this.attempts, delayMs });
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = undefined;
      this.open('reconnecting');
    }, delayMs);
  }

  private async resync(): Promise<void> {
    const generation = ++this.resyncGeneration;
    this.resyncBuffer = [];
    let snapshot: TaskSnapshot[];
    try {
      snapshot = z.array(taskSnapshotSchema).parse(await this.fetchActiveTasks());
    } catch (error) {
      if (generation === this.resyncGeneration) {
        this.resyncBuffer = undefined;
      }
      this.emit('error', error instanceof Error ? error : new Error(String(error)));
      return;
    }

    // A newer connection started its own resync, or this one dropped meanwhile.
    if (generation !== this.resyncGeneration || this.state !== 'open') {
      return;
    }

    // Only a connection that lived long enough to resync counts as recovered.
    this.attempts = 0;
    const buffered = this.resyncBuffer ?? [];
    this.resyncBuffer = undefined;
    this.tasks.clear();
    for (const task of snapshot) {
      this.tasks.set(task.id, task);
    }
    for (const envelope of buffered) {
      this.apply(envelope);
    }
    this.emit('resynced', { tasks: this.getTasks() });
  }

  private handleMessage(text: string): void {
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch {
      this.emit('error', new Error('Received a frame that is not JSON.'));
      return;
    }

    const control = serverControlSchema.safeParse(raw);
    if (control.success) {
      if (control.data.type === 'Connected') {
        this.connectionId = control.data.connectionId;
      } else if (control.data.type === 'Error') {
        this.emit('error', new Error(control.data.message));
      }
      return;
    }

    const envelope = envelopeSchema.safeParse(raw);
    if (!envelope.success) {
      return;
    }
    if (this.resyncBuffer) {
      this.resyncBuffer.push(envelope.data);
    } else {
      this.apply(envelope.data);
    }
    this.emit('event', envelope.data);
  }

  private apply(envelope: Envelope): void {
    if (envelope.type === 'SpaceStatusUpdate') {
      return;
    }
    if (envelope.type === 'TaskDeleted') {
      if (envelope.taskId) {
        this.tasks.delete(envelope.taskId);
      }
      return;
    }

    const task = taskSnapshotSchema.safeParse(envelope.payload);
    if (!task.success) {
      return;
    }
    if (isTerminal(task.data.status)) {
      this.tasks.delete(task.data.id);
    } else {
      this.tasks.set(task.data.id, task.data);
    }
  }

  private sendFrame(frame: Record<string, unknown>): void {
    if (this.state !== 'open' || !this.socket) {
      return;
    }
    try {
      this.socket.send(JSON.stringify(frame));
    } catch (error) {
      this.emit('error', error instanceof Error ? error : new Error(String(error)));
    }
  }

  private startPing(): void {
    this.stopPing();
    this.pingTimer = setInterval(() => this.ping(), this.pingIntervalMs);
    this.pingTimer.unref();
  }

  private stopPing(): void {
    if (this.pingTimer) {
      clearInterval(this.pingTimer);
      this.pingTimer = undefined;
    }
  }

  private clearTimers(): void {
    this.stopPing();
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = undefined;
    }
  }

  private emit<K extends keyof ClientEvents>(event: K, payload: ClientEvents[K]): void {
    const set: Set<Listener<ClientEvents[K]>> = this.listeners[event];
    for (const listener of Array.from(set)) {
      try {
        listener(payload);
      } catch (error) {
        logger.error('client', `Listener for ${event} failed`, error);
      }
    }
  }
}
