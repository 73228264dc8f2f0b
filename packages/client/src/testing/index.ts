/**
 * Test doubles for the client's collaborators.
 *
 * @example
 * ```typescript
 * const transport = createMockTransport();
 * const fetch = createMockFetch([jsonResponse(200, channelBody)]);
 * const client = new PushClient({ host: 'example.test', token: 'test-secret', transport, fetch });
 *
 * await client.subscribe(['a']);
 * client.connect();
 * transport.emit({ type: 'connected', headers: {} });
 * ```
 */

import type { FetchLike } from "../core/provisioning-api";
import type { SocketTransport, TransportEvent, TransportEventHandler } from "../core/transport";

// =============================================================================
// Transport
// =============================================================================

export interface MockTransport extends SocketTransport {
  /** Every `connect()` call, in order */
  readonly connects: Array<{ url: string; headers: Record<string, string> }>;
  /** Every `send()` call, in order */
  readonly sent: string[];
  /** Number of `disconnect()` calls */
  readonly disconnects: number;
  /** Calls in order, e.g. `["connect", "disconnect", "connect"]` */
  readonly calls: Array<"connect" | "disconnect">;
  /** Deliver an event to every handler */
  emit(event: TransportEvent): void;
  handlerCount(): number;
}

/**
 * Records calls and emits nothing on its own; tests drive it with `emit()`.
 */
export function createMockTransport(): MockTransport {
  const handlers = new Set<TransportEventHandler>();
  const connects: Array<{ url: string; headers: Record<string, string> }> = [];
  const sent: string[] = [];
  const calls: Array<"connect" | "disconnect"> = [];
  let disconnects = 0;

  return {
    connects,
    sent,
    calls,
    get disconnects() {
      return disconnects;
    },

    connect(url, headers) {
      connects.push({ url, headers });
      calls.push("connect");
    },
    disconnect() {
      disconnects++;
      calls.push("disconnect");
    },
    send(data) {
      sent.push(data);
    },
    onEvent(handler) {
      handlers.add(handler);
      return () => {
        handlers.delete(handler);
      };
    },

    emit(event) {
      for (const handler of [...handlers]) handler(event);
    },
    handlerCount: () => handlers.size,
  };
}

// =============================================================================
// fetch
// =============================================================================

export interface RecordedRequest {
  url: string;
  method: string;
  headers: Record<string, string>;
  body?: string;
}

/** A response, a failure, or an answer the test settles later */
export type QueuedResponse = Response | Error | Promise<Response>;

export interface MockFetch extends FetchLike {
  readonly requests: RecordedRequest[];
  /** Queue more responses */
  enqueue(...responses: QueuedResponse[]): void;
}

/**
 * fetch that answers from a queue: a `Response` resolves, an `Error`
 * rejects, a promise settles whenever the test settles it. Rejects with
 * "No response queued" once the queue is empty.
 */
export function createMockFetch(responses: QueuedResponse[] = []): MockFetch {
  const queue = [...responses];
  const requests: RecordedRequest[] = [];

  const mockFetch = async (input: string, init: RequestInit = {}): Promise<Response> => {
    requests.push({
      url: input,
      method: init.method ?? "GET",
      headers: Object.fromEntries(new Headers(init.headers).entries()),
      body: typeof init.body === "string" ? init.body : undefined,
    });

    const next = queue.shift();
    if (next === undefined) {
      throw new Error("No response queued");
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  };

  return Object.assign(mockFetch, {
    requests,
    enqueue: (...more: QueuedResponse[]) => {
      queue.push(...more);
    },
  });
}

export function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

/** Body of a successful `POST /channels` */
export function channelBody(id: string, expiresAt: Date): Record<string, string> {
  return {
    connectUri: `wss://streaming.example.test/channels/${id}`,
    id,
    expires: expiresAt.toISOString(),
  };
}

/** Body of a successful subscription call echoing `topics` */
export function subscriptionBody(topics: Iterable<string>): { entities: Array<{ id: string }> } {
  return { entities: Array.from(topics, (id) => ({ id })) };
}

/**
 * Create a deferred promise (manually resolvable)
 */
export function createDeferred<T = void>(): {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: Error) => void;
} {
  let resolve!: (value: T) => void;
  let reject!: (error: Error) => void;

  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });

  return { promise, resolve, reject };
}
