/**
 * 登録したコールバックを解除する関数
 */
export type Unsubscribe = () => void;

/**
 * インフラ層: 取引所非依存の WebSocket 接続ラッパ（インターフェース）
 *
 * 責務: WebSocket 接続の確立・管理・イベント処理を抽象化する。
 */
export interface WebSocketConnection {
  /**
   * 接続が確立されたときに呼ばれるコールバック
   */
  onOpen(callback: () => void): Unsubscribe;

  /**
   * テキストメッセージを受信したときに呼ばれるコールバック
   * バイナリフレームは UTF-8 としてデコードしてから渡す
   */
  onMessage(callback: (data: string) => void): Unsubscribe;

  /**
   * 接続が閉じられたときに呼ばれるコールバック
   */
  onClose(callback: (code: number, reason: string) => void): Unsubscribe;

  /**
   * エラーが発生したときに呼ばれるコールバック
   */
  onError(callback: (error: Error) => void): Unsubscribe;

  close(): void;

  /**
   * すべてのコールバックを削除する
   */
  removeAllListeners(): void;

  /**
   * 接続を強制終了する
   */
  terminate(): void;
}
