/**
 * # Pushline Kernel
 *
 * Runtime primitives the client is built on:
 *
 * - **Logger** - Structured pino logging with context injection
 * - **Context** - Request-scoped state propagated through AsyncLocalStorage
 * - **Scheduler** - Clock and one-shot timers behind an injectable interface
 *
 * Test helpers (`createManualScheduler`) live under `pushline-kernel/testing`.
 *
 * @module pushline-kernel
 */

export * from "./context";
export * from "./logger";
export * from "./scheduler";
