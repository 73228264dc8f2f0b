/**
 * WebSocketTransport - SocketTransport over the `ws` package
 */

import type { ClientRequest, IncomingHttpHeaders, IncomingMessage } from "node:http";
import WebSocket from "ws";
import { TransportError } from "pushline-shared";
import { Logger } from "pushline-kernel";
import type { SocketTransport, TransportEvent, TransportEventHandler } from "./transport";

export interface WebSocketTransportConfig {
  /** Handshake timeout in ms (default: none) */
  handshakeTimeout?: number;
}

export class WebSocketTransport implements SocketTransport {
  private ws?: WebSocket;
  private handlers = new Set<TransportEventHandler>();
  private upgradeHeaders: Record<string, string> = {};
  private closingLocally = false;
  private log = Logger.for(this);

  constructor(private config: WebSocketTransportConfig = {}) {}

  connect(url: string, headers: Record<string, string>): void {
    this.release();

    const ws = new WebSocket(url, {
      headers,
      handshakeTimeout: this.config.handshakeTimeout,
    });
    this.ws = ws;
    this.upgradeHeaders = {};
    this.closingLocally = false;

    ws.on("upgrade", (res: IncomingMessage) => {
      this.upgradeHeaders = flattenHeaders(res.headers);
    });

    ws.on("open", () => {
      this.emit({ type: "connected", headers: this.upgradeHeaders });
    });

    ws.on("message", (data: WebSocket.RawData, isBinary: boolean) => {
      const bytes = toBytes(data);
      if (isBinary) {
        this.emit({ type: "binary", data: bytes });
      } else {
        this.emit({ type: "text", data: Buffer.from(bytes).toString("utf-8") });
      }
    });

    ws.on("close", (code: number, reason: Buffer) => {
      this.ws = undefined;
      if (!this.closingLocally) {
        this.emit({ type: "peerClosed" });
      }
      this.emit({ type: "disconnected", reason: reason.toString("utf-8"), code });
    });

    ws.on("error", (error: Error) => {
      this.emit({ type: "error", error });
    });

    // Handled here so the status code reaches the supervisor (401 means renew)
    ws.on("unexpected-response", (req: ClientRequest, res: IncomingMessage) => {
      const statusCode = res.statusCode ?? 0;
      this.release();
      req.destroy();
      this.emit({
        type: "error",
        error: TransportError.connection(`Unexpected server response: ${statusCode}`, url),
        statusCode,
      });
    });
  }

  disconnect(): void {
    const ws = this.ws;
    if (!ws) return;

    if (ws.readyState === WebSocket.OPEN) {
      this.closingLocally = true;
      ws.close(1000, "client disconnect");
      return;
    }

    this.release();
  }

  send(data: string): void {
    if (!this.ws || this.ws.readyState !== WebSocket.OPEN) {
      throw TransportError.connection("Socket is not open");
    }
    this.ws.send(data);
  }

  onEvent(handler: TransportEventHandler): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  /**
   * Detach from the current socket and tear it down without reporting events.
   */
  private release(): void {
    const ws = this.ws;
    if (!ws) return;
    this.ws = undefined;

    ws.removeAllListeners();
    // ws emits an error when a connecting socket is torn down
    ws.on("error", (error: Error) => {
      this.log.debug({ err: error }, "Error on discarded socket");
    });
    if (ws.readyState !== WebSocket.CLOSED) {
      ws.terminate();
    }
  }

  private emit(event: TransportEvent): void {
    for (const handler of [...this.handlers]) {
      try {
        handler(event);
      } catch (error) {
        this.log.error({ err: error, event: event.type }, "Transport event handler threw");
      }
    }
  }
}

function toBytes(data: WebSocket.RawData): Uint8Array {
  if (Array.isArray(data)) return Buffer.concat(data);
  if (data instanceof ArrayBuffer) return new Uint8Array(data);
  return data;
}

function flattenHeaders(headers: IncomingHttpHeaders): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    result[name] = Array.isArray(value) ? value.join(", ") : value;
  }
  return result;
}
