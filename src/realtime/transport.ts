import { WebSocket, type RawData } from 'ws';

/** The slice of a socket the connection manager needs. */
export interface Transport {
  send(data: string): Promise<void>;
  ping(): void;
  close(code: number, reason: string): void;
  terminate(): void;
  onMessage(listener: (text: string) => void): void;
  onPong(listener: () => void): void;
  onClose(listener: () => void): void;
  onError(listener: (error: Error) => void): void;
}

function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString('utf8');
  }
  return data.toString('utf8');
}

export function wsTransport(socket: WebSocket): Transport {
  return {
    send: (data) =>
      new Promise<void>((resolve, reject) => {
        if (socket.readyState !== WebSocket.OPEN) {
          reject(new Error('Socket is not open.'));
          return;
        }
        socket.send(data, (error) => {
          if (error) {
            reject(error);
          } else {
            resolve();
          }
        });
      }),
    ping: () => {
      if (socket.readyState === WebSocket.OPEN) {
        socket.ping();
      }
    },
    close: (code, reason) => socket.close(code, reason),
    terminate: () => socket.terminate(),
    onMessage: (listener) => {
      socket.on('message', (data) => listener(rawDataToString(data)));
    },
    onPong: (listener) => {
      socket.on('pong', () => listener());
    },
    onClose: (listener) => {
      socket.on('close', () => listener());
    },
    onError: (listener) => {
      socket.on('error', listener);
    }
  };
}
