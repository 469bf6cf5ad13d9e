import type WebSocket from 'ws';
import type { Unsubscribe, WebSocketConnection } from './interfaces/WebSocketConnection';

function register<T>(callbacks: Set<T>, callback: T): Unsubscribe {
  callbacks.add(callback);
  return () => {
    callbacks.delete(callback);
  };
}

function decode(data: WebSocket.RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf-8');
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString('utf-8');
  }
  return data.toString('utf-8');
}

/**
 * ws パッケージの WebSocket を使った接続の実装
 */
export class WsWebSocketConnection implements WebSocketConnection {
  private readonly openCallbacks = new Set<() => void>();
  private readonly messageCallbacks = new Set<(data: string) => void>();
  private readonly closeCallbacks = new Set<(code: number, reason: string) => void>();
  private readonly errorCallbacks = new Set<(error: Error) => void>();

  constructor(private readonly socket: WebSocket) {
    // ws のイベントを内部で管理
    this.socket.on('open', () => {
      for (const cb of [...this.openCallbacks]) {
        cb();
      }
    });

    this.socket.on('message', (data: WebSocket.RawData) => {
      const text = decode(data);
      for (const cb of [...this.messageCallbacks]) {
        cb(text);
      }
    });

    this.socket.on('close', (code: number, reason: Buffer) => {
      const text = reason.toString('utf-8');
      for (const cb of [...this.closeCallbacks]) {
        cb(code, text);
      }
    });

    this.socket.on('error', (error: Error) => {
      for (const cb of [...this.errorCallbacks]) {
        cb(error);
      }
    });
  }

  onOpen(callback: () => void): Unsubscribe {
    return register(this.openCallbacks, callback);
  }

  onMessage(callback: (data: string) => void): Unsubscribe {
    return register(this.messageCallbacks, callback);
  }

  onClose(callback: (code: number, reason: string) => void): Unsubscribe {
    return register(this.closeCallbacks, callback);
  }

  onError(callback: (error: Error) => void): Unsubscribe {
    return register(this.errorCallbacks, callback);
  }

  close(): void {
    this.socket.close();
  }

  removeAllListeners(): void {
    this.openCallbacks.clear();
    this.messageCallbacks.clear();
    this.closeCallbacks.clear();
    this.errorCallbacks.clear();
  }

  terminate(): void {
    this.socket.terminate();
  }
}
