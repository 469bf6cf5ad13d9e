import WebSocket from 'ws';
import { FeedError } from '@/domain/errors/CollectorErrors';
import type { WebSocketConnection } from './interfaces/WebSocketConnection';
import { WsWebSocketConnection } from './WsWebSocketConnection';

/**
 * インフラ層: WebSocket 接続の確立（低レベル）
 *
 * 責務: URL に接続し、open になった WebSocketConnection を返す。
 * 購読やメッセージの解釈は各取引所のアダプタが担当する。
 */
export class WebSocketClient {
  /**
   * @param handshakeTimeoutMs ハンドシェイクのタイムアウト
   */
  constructor(private readonly handshakeTimeoutMs = 10000) {}

  /**
   * WebSocket 接続を確立する。
   * @throws {FeedError} open 前にエラーまたは切断が起きた場合
   */
  connect(url: string): Promise<WebSocketConnection> {
    return new Promise<WebSocketConnection>((resolve, reject) => {
      const socket = new WebSocket(url, { handshakeTimeout: this.handshakeTimeoutMs });
      const connection = new WsWebSocketConnection(socket);

      // open までの一時的なリスナー。確立後は呼び出し側のリスナーだけを残す
      const unsubscribers = [
        connection.onOpen(() => {
          detach();
          resolve(connection);
        }),
        connection.onError((error) => {
          detach();
          connection.terminate();
          reject(new FeedError(`WebSocket connection failed: ${url}`, { cause: error }));
        }),
        connection.onClose((code) => {
          detach();
          reject(new FeedError(`WebSocket closed before open (code ${code}): ${url}`));
        }),
      ];
      const detach = () => {
        for (const unsubscribe of unsubscribers) {
          unsubscribe();
        }
      };
    });
  }
}
