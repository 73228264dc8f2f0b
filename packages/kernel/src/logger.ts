/**
 * Logger - Structured logging with automatic context injection
 *
 * Built on pino. Every log line carries the fields of the active
 * `KernelContext` (request id, trace id, operation, channel id), so the lines
 * written during one renewal run can be grouped together.
 *
 * @example
 * ```typescript
 * import { Logger } from 'pushline-kernel';
 *
 * Logger.configure({ level: 'debug' });
 *
 * const log = Logger.for('ConnectionSupervisor');
 * log.info({ channelId }, 'Channel provisioned');
 * ```
 */

import pino, {
  type DestinationStream,
  type Logger as PinoLogger,
  type LoggerOptions,
  type TransportSingleOptions,
  type TransportMultiOptions,
} from "pino";
import { Context, type KernelContext } from "./context";

// =============================================================================
// Types
// =============================================================================

/**
 * Log levels, least to most severe. `silent` disables output.
 */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface LoggerConfig {
  /** Log level (default: 'info') */
  level?: LogLevel;
  /** Pino transport configuration */
  transport?: TransportSingleOptions | TransportMultiOptions;
  /** Inject context fields into every log (default: true) */
  includeContext?: boolean;
  /** Base properties to include in every log */
  base?: Record<string, unknown>;
  /** Write to this stream instead of stdout; disables pretty printing */
  destination?: DestinationStream;
  /** Pretty print (default: true if NODE_ENV !== 'production') */
  prettyPrint?: boolean;
  /** Replace existing config instead of merging (default: false) */
  replace?: boolean;
}

/**
 * Log method supporting message-first and object-first forms.
 *
 * @example
 * ```typescript
 * log.info('Socket connected');
 * log.warn({ channelId, timeoutMs }, 'Heartbeat expired');
 * ```
 */
export interface LogMethod {
  (msg: string, ...args: unknown[]): void;
  (obj: Record<string, unknown>, msg?: string, ...args: unknown[]): void;
}

export interface KernelLogger {
  trace: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
  fatal: LogMethod;
}

// =============================================================================
// Implementation
// =============================================================================

let globalLogger: PinoLogger | null = null;
let globalConfig: LoggerConfig = {};

function contextFields(ctx: KernelContext): Record<string, unknown> {
  const fields: Record<string, unknown> = {};

  if (ctx.requestId) fields.request_id = ctx.requestId;
  if (ctx.traceId) fields.trace_id = ctx.traceId;
  if (ctx.operation) fields.operation = ctx.operation;
  if (ctx.channelId) fields.channel_id = ctx.channelId;

  return fields;
}

function getContextFields(config: LoggerConfig): Record<string, unknown> {
  if (config.includeContext === false) {
    return {};
  }

  const ctx = Context.tryGet();
  if (!ctx) {
    return {};
  }

  return contextFields(ctx);
}

function createPinoOptions(config: LoggerConfig): LoggerOptions {
  const isDev = process.env.NODE_ENV !== "production";
  const usePretty = !config.destination && (config.prettyPrint ?? isDev);

  const options: LoggerOptions = {
    level: config.level ?? "info",
    base: config.base ?? { pid: process.pid },
    mixin: () => getContextFields(config),
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (config.transport) {
    options.transport = config.transport;
  } else if (usePretty) {
    options.transport = {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname",
      },
    };
  }

  return options;
}

function createPino(config: LoggerConfig): PinoLogger {
  const options = createPinoOptions(config);
  return config.destination ? pino(options, config.destination) : pino(options);
}

function wrapLogger(pinoLogger: PinoLogger): KernelLogger {
  return {
    trace: pinoLogger.trace.bind(pinoLogger),
    debug: pinoLogger.debug.bind(pinoLogger),
    info: pinoLogger.info.bind(pinoLogger),
    warn: pinoLogger.warn.bind(pinoLogger),
    error: pinoLogger.error.bind(pinoLogger),
    fatal: pinoLogger.fatal.bind(pinoLogger),
  };
}

function getOrCreateGlobalLogger(): PinoLogger {
  if (!globalLogger) {
    globalLogger = createPino(globalConfig);
  }
  return globalLogger;
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Logger singleton.
 *
 * @example
 * ```typescript
 * Logger.configure({ level: 'warn' });
 *
 * class ChannelProvisioner {
 *   private log = Logger.for(this); // component: "ChannelProvisioner"
 * }
 * ```
 */
export const Logger = {
  /**
   * Configure the global logger. Call once at startup.
   */
  configure(config: LoggerConfig): void {
    globalConfig = config.replace ? config : { ...globalConfig, ...config };
    globalLogger = createPino(globalConfig);
  },

  /**
   * Child logger scoped to a component name, or an object's class name.
   */
  for(nameOrComponent: string | object): KernelLogger {
    const name =
      typeof nameOrComponent === "string" ? nameOrComponent : nameOrComponent.constructor.name;
    return wrapLogger(getOrCreateGlobalLogger().child({ component: name }));
  },
};

export type { PinoLogger, DestinationStream, TransportSingleOptions, TransportMultiOptions };
