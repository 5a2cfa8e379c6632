import type { IncomingMessage, Server } from 'http';
import { WebSocketServer } from 'ws';

import { errorMessage } from '../errors';
import { GLOBAL_GROUP, userGroup, type BroadcastHub } from '../services/broadcastHub';
import { toTaskView } from '../services/taskEventPublisher';
import type { TaskRegistry } from '../services/taskRegistry';
import { uuidGenerator, type IdGenerator } from '../utils/clock';
import { logger } from '../utils/logger';
import { parseClientFrame, type ClientFrame, type ServerControlFrame } from './protocol';
import { wsTransport, type Transport } from './transport';

export interface ConnectionManagerOptions {
  hub: BroadcastHub;
  registry: TaskRegistry;
  heartbeatIntervalMs?: number;
  ids?: IdGenerator;
}

export interface AcceptOptions {
  userId?: string;
  remoteAddress?: string;
}

interface TrackedConnection {
  id: string;
  transport: Transport;
  alive: boolean;
  userId?: string;
  connectedAt: Date;
}

export const WS_PATH = '/ws';

/**
 * Server side of the real-time channel. Owns liveness: a connection that has
 * not answered since the previous heartbeat tick is dropped along with all of
 * its group memberships.
 */
export class ConnectionManager {
  private readonly hub: BroadcastHub;
  private readonly registry: TaskRegistry;
  private readonly heartbeatIntervalMs: number;
  private readonly ids: IdGenerator;
  private readonly connections = new Map<string, TrackedConnection>();
  private heartbeat?: NodeJS.Timeout;
  private server?: WebSocketServer;

  constructor(options: ConnectionManagerOptions) {
    this.hub = options.hub;
    this.registry = options.registry;
    this.heartbeatIntervalMs = options.heartbeatIntervalMs ?? 30_000;
    this.ids = options.ids ?? uuidGenerator;
  }

  /** Serves WebSocket upgrades on `WS_PATH` of an existing HTTP server. */
  attach(httpServer: Server): WebSocketServer {
    const server = new WebSocketServer({ server: httpServer, path: WS_PATH });
    server.on('connection', (socket, request: IncomingMessage) => {
      this.accept(wsTransport(socket), {
        userId: readUserId(request),
        remoteAddress: request.socket.remoteAddress
      });
    });
    server.on('error', (error) => {
      logger.error('ws', 'WebSocket server error', error);
    });
    this.server = server;
    this.startHeartbeat();
    return server;
  }

  accept(transport: Transport, options: AcceptOptions = {}): string {
    const connection: TrackedConnection = {
      id: this.ids.next(),
      transport,
      alive: true,
      userId: options.userId,
      connectedAt: new Date()
    };
    this.connections.set(connection.id, connection);

    this.hub.register({
      id: connection.id,
      send: (envelope) => transport.send(JSON.stringify(envelope))
    });
    this.hub.join(connection.id, GLOBAL_GROUP);
    if (connection.userId) {
      this.hub.join(connection.id, userGroup(connection.userId));
    }

    transport.onMessage((text) => {
      connection.alive = true;
      void this.handleMessage(connection, text);
    });
    transport.onPong(() => {
      connection.alive = true;
    });
    transport.onClose(() => {
      this.remove(connection.id, 'closed');
    });
    transport.onError((error) => {
      logger.warn('ws', `Transport error on ${connection.id}: ${error.message}`);
      this.remove(connection.id, 'transport error');
    });

    logger.info(
      'ws',
      `Connection ${connection.id} opened${options.remoteAddress ? ` from ${options.remoteAddress}` : ''} (${this.connections.size} open)`
    );
    this.sendControl(connection, {
      type: 'Connected',
      connectionId: connection.id,
      timestamp: new Date().toISOString()
    });
    return connection.id;
  }

  /** One heartbeat pass; exposed so the interval and tests share the same logic. */
  sweep(): void {
    for (const connection of Array.from(this.connections.values())) {
      if (!connection.alive) {
        logger.info('ws', `Connection ${connection.id} missed its heartbeat`);
        connection.transport.terminate();
        this.remove(connection.id, 'heartbeat timeout');
        continue;
      }
      connection.alive = false;
      connection.transport.ping();
    }
  }

  remove(connectionId: string, reason: string): void {
    if (!this.connections.delete(connectionId)) {
      return;
    }
    this.hub.unregister(connectionId);
    logger.info('ws', `Connection ${connectionId} removed: ${reason} (${this.connections.size} open)`);
  }

  has(connectionId: string): boolean {
    return this.connections.has(connectionId);
  }

  count(): number {
    return this.connections.size;
  }

  async close(): Promise<void> {
    if (this.heartbeat) {
      clearInterval(this.heartbeat);
      this.heartbeat = undefined;
    }
    for (const connection of Array.from(this.connections.values())) {
      connection.transport.close(1001, 'Server shutting down');
      this.remove(connection.id, 'server shutdown');
    }

    const server = this.server;
    this.server = undefined;
    if (server) {
      await new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      });
    }
  }

  private startHeartbeat(): void {
    if (this.heartbeat) {
      return;
    }
    this.heartbeat = setInterval(() => this.sweep(), this.heartbeatIntervalMs);
    this.heartbeat.unref();
  }

  private async handleMessage(connection: TrackedConnection, text: string): Promise<void> {
    const parsed = parseClientFrame(text);
    if (!parsed.ok) {
      this.sendError(connection, parsed.message);
      return;
    }

    try {
      await this.dispatch(connection, parsed.frame);
    } catch (error) {
      logger.error('ws', `Failed to handle ${parsed.frame.type} from ${connection.id}`, error);
      this.sendError(connection, 'Request failed.');
    }
  }

  private async dispatch(connection: TrackedConnection, frame: ClientFrame): Promise<void> {
    const timestamp = new Date().toISOString();
    switch (frame.type) {
      case 'JoinGroup':
        this.hub.join(connection.id, frame.name);
        this.sendControl(connection, { type: 'GroupJoined', name: frame.name, timestamp });
        return;
      case 'LeaveGroup':
        this.hub.leave(connection.id, frame.name);
        this.sendControl(connection, { type: 'GroupLeft', name: frame.name, timestamp });
        return;
      case 'Ping':
        this.sendControl(connection, { type: 'Pong', timestamp });
        return;
      case 'GetActiveTasks': {
        const tasks = await this.registry.listActive();
        this.sendControl(connection, { type: 'ActiveTasks', payload: tasks.map(toTaskView), timestamp });
        return;
      }
    }
  }

  private sendError(connection: TrackedConnection, message: string): void {
    this.sendControl(connection, { type: 'Error', message, timestamp: new Date().toISOString() });
  }

  private sendControl(connection: TrackedConnection, frame: ServerControlFrame): void {
    connection.transport.send(JSON.stringify(frame)).catch((error: unknown) => {
      logger.warn('ws', `Could not send ${frame.type} to ${connection.id}: ${errorMessage(error)}`);
    });
  }
}

function readUserId(request: IncomingMessage): string | undefined {
  const url = new URL(request.url ?? WS_PATH, 'http://localhost');
  const userId = url.searchParams.get('userId')?.trim();
  return userId && /^[A-Za-z0-9_.-]{1,128}$/.test(userId) ? userId : undefined;
}
