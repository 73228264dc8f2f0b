/**
 * # Pushline Shared
 *
 * Platform-independent building blocks shared by every pushline package:
 *
 * - **Errors** - The error taxonomy with codes, details and type guards
 * - **Protocol** - zod schemas for provisioning responses and socket frames,
 *   reserved system topics and the expiry timestamp parser
 *
 * ```typescript
 * import { decodeJson, ChannelResponseSchema, isAuthError } from 'pushline-shared';
 * ```
 *
 * @module pushline-shared
 */

export * from "./errors";
export * from "./protocol";
