/**
 * Logger
 *
 * Structured logging shared by every switchback package. Each module asks for a
 * component logger once, at load time:
 *
 * ```typescript
 * const log = Logger.for("ConnectionDispatcher");
 * log.debug({ sid }, "forwarding request");
 * ```
 *
 * Records are written by pino as JSON lines with a `component` binding.
 * `Logger.configure()` may be called at any point; component loggers created
 * earlier pick up the new level and destination on their next call.
 *
 * @module @switchback/kernel/logger
 */

import {
  pino,
  type DestinationStream,
  type Level,
  type LevelWithSilent,
  type Logger as PinoLogger,
} from "pino";

export type LogLevel = LevelWithSilent;

const LOG_LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

export interface LoggerOptions {
  /**
   * Minimum level written.
   * @default process.env.LOG_LEVEL, then "info"
   */
  level?: LogLevel;

  /**
   * Where records go.
   * @default stdout
   */
  destination?: DestinationStream;
}

/**
 * Logger bound to one component. Takes pino's `(bindings, message)` call shape.
 */
export interface ComponentLogger {
  readonly component: string;
  debug(message: string): void;
  debug(bindings: object, message?: string): void;
  info(message: string): void;
  info(bindings: object, message?: string): void;
  warn(message: string): void;
  warn(bindings: object, message?: string): void;
  error(message: string): void;
  error(bindings: object, message?: string): void;
  isLevelEnabled(level: Level): boolean;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function createRoot(options: LoggerOptions): PinoLogger {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  const level = options.level ?? (isLogLevel(envLevel) ? envLevel : "info");

  return options.destination ? pino({ level }, options.destination) : pino({ level });
}

let root = createRoot({});
let generation = 0;

class BoundLogger implements ComponentLogger {
  private target: PinoLogger | null = null;
  private targetGeneration = -1;

  constructor(readonly component: string) {}

  private resolve(): PinoLogger {
    if (!this.target || this.targetGeneration !== generation) {
      this.target = root.child({ component: this.component });
      this.targetGeneration = generation;
    }
    return this.target;
  }

  private write(level: Level, bindingsOrMessage: object | string, message?: string): void {
    const target = this.resolve();
    if (typeof bindingsOrMessage === "string") {
      target[level](bindingsOrMessage);
    } else {
      target[level](bindingsOrMessage, message);
    }
  }

  debug(bindingsOrMessage: object | string, message?: string): void {
    this.write("debug", bindingsOrMessage, message);
  }

  info(bindingsOrMessage: object | string, message?: string): void {
    this.write("info", bindingsOrMessage, message);
  }

  warn(bindingsOrMessage: object | string, message?: string): void {
    this.write("warn", bindingsOrMessage, message);
  }

  error(bindingsOrMessage: object | string, message?: string): void {
    this.write("error", bindingsOrMessage, message);
  }

  isLevelEnabled(level: Level): boolean {
    return this.resolve().isLevelEnabled(level);
  }
}

const components = new Map<string, BoundLogger>();

export const Logger = {
  /**
   * Get the logger for a component. The same instance is returned for the same name.
   */
  for(component: string): ComponentLogger {
    let logger = components.get(component);
    if (!logger) {
      logger = new BoundLogger(component);
      components.set(component, logger);
    }
    return logger;
  },

  /**
   * Replace the root logger. Existing component loggers follow.
   */
  configure(options: LoggerOptions = {}): void {
    root = createRoot(options);
    generation++;
  },
};
