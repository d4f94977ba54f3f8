export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  child(name: string): Logger;
}

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const satisfies readonly LogLevel[];

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface ConsoleLoggerOptions {
  name?: string;
  level?: LogLevel;
  /** Where lines go; defaults to the global console. */
  sink?: Pick<Console, "debug" | "info" | "warn" | "error">;
}

export const isLogLevel = (value: string): value is LogLevel =>
  LOG_LEVELS.some((level) => level === value);

export const createConsoleLogger = ({
  name,
  level = "info",
  sink = console,
}: ConsoleLoggerOptions = {}): Logger => {
  const threshold = LEVEL_WEIGHT[level];
  const prefix = name ? `[${name}] ` : "";

  const write = (messageLevel: Exclude<LogLevel, "silent">, message: string, fields?: LogFields) => {
    if (LEVEL_WEIGHT[messageLevel] < threshold) {
      return;
    }

    const line = `${prefix}${message}`;
    if (fields && Object.keys(fields).length > 0) {
      sink[messageLevel](line, fields);
    } else {
      sink[messageLevel](line);
    }
  };

  return {
    debug: (message, fields) => write("debug", message, fields),
    info: (message, fields) => write("info", message, fields),
    warn: (message, fields) => write("warn", message, fields),
    error: (message, fields) => write("error", message, fields),
    child: (childName) =>
      createConsoleLogger({ name: name ? `${name}:${childName}` : childName, level, sink }),
  };
};

const noop = () => undefined;

export const createSilentLogger = (): Logger => {
  const logger: Logger = {
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
    child: () => logger,
  };

  return logger;
};
