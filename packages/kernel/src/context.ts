import { AsyncLocalStorage } from "node:async_hooks";
import { randomUUID } from "node:crypto";

/**
 * Request-scoped state carried across awaits via AsyncLocalStorage.
 *
 * The supervisor opens one context per renewal run so every log line
 * written on its behalf shares a request id.
 */
export interface KernelContext {
  requestId: string;
  traceId: string;
  /** Name of the operation this context was opened for (e.g. 'renewal') */
  operation?: string;
  /** Channel the operation acts on, once known */
  channelId?: string;
}

const storage = new AsyncLocalStorage<KernelContext>();

export class Context {
  /**
   * Creates a new context object with defaults.
   */
  static create(overrides: Partial<KernelContext> = {}): KernelContext {
    return {
      requestId: overrides.requestId ?? randomUUID(),
      traceId: overrides.traceId ?? randomUUID(),
      operation: overrides.operation,
      channelId: overrides.channelId,
    };
  }

  /**
   * Runs a function within the given context.
   */
  static run<T>(context: KernelContext, fn: () => Promise<T>): Promise<T> {
    return storage.run(context, fn);
  }

  /**
   * Creates a child context that inherits from the current context (or creates a new root).
   * The child keeps the parent's traceId; requestId is only replaced when overridden.
   */
  static child(overrides: Partial<KernelContext> = {}): KernelContext {
    const parent = Context.tryGet();
    if (!parent) {
      return Context.create(overrides);
    }
    return { ...parent, ...overrides };
  }

  /**
   * Creates a child context and runs a function within it.
   *
   * @example
   * ```typescript
   * await Context.fork({ operation: 'renewal', channelId }, async () => {
   *   log.info('Renewing'); // carries operation + channel_id
   * });
   * ```
   */
  static fork<T>(overrides: Partial<KernelContext>, fn: () => Promise<T>): Promise<T> {
    return Context.run(Context.child(overrides), fn);
  }

  /**
   * Gets the current context or returns undefined if not found.
   */
  static tryGet(): KernelContext | undefined {
    return storage.getStore();
  }
}
