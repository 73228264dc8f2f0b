/**
 * SocketTransport - the socket port the connection supervisor drives
 *
 * A transport owns at most one socket. It reports everything that happens on
 * that socket as a `TransportEvent`; it never reconnects on its own. Recovery
 * policy (reconnect, renewal, backoff) lives in the supervisor.
 *
 * Contract:
 * - `connect()` silently discards any previous socket. No further events
 *   arrive from a discarded socket.
 * - `disconnect()` closes an open socket and reports `disconnected` once it
 *   is closed. A socket that is still connecting is dropped without events.
 *
 * @example
 * ```typescript
 * const transport = new WebSocketTransport();
 * transport.onEvent((event) => {
 *   if (event.type === 'text') console.log(event.data);
 * });
 * transport.connect('wss://streaming.example.test/channels/ch-1', { 'User-Agent': 'demo' });
 * ```
 */

export type TransportEvent =
  /** Handshake completed; headers of the upgrade response */
  | { type: "connected"; headers: Record<string, string> }
  /** Socket closed */
  | { type: "disconnected"; reason: string; code: number }
  | { type: "text"; data: string }
  | { type: "binary"; data: Uint8Array }
  /** Socket or handshake failure; `statusCode` is set when the upgrade was answered with HTTP */
  | { type: "error"; error: Error; statusCode?: number }
  /** Connection attempt abandoned before it completed */
  | { type: "cancelled" }
  /** The server started the close handshake */
  | { type: "peerClosed" };

export type TransportEventType = TransportEvent["type"];

export type TransportEventHandler = (event: TransportEvent) => void;

export interface SocketTransport {
  /** Open a socket to `url`, replacing any current one */
  connect(url: string, headers: Record<string, string>): void;

  /** Close the current socket, if any */
  disconnect(): void;

  /** Send a text frame on the open socket */
  send(data: string): void;

  /**
   * Register an event handler.
   * @returns Unsubscribe function
   */
  onEvent(handler: TransportEventHandler): () => void;
}
