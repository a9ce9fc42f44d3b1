import type { AppConfig } from "../config/schema";

export type LogLevel = AppConfig["logLevel"];

export type Logger = {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
};

const order: LogLevel[] = ["silent", "error", "warn", "info", "debug"];

export function createLogger(
  config: Pick<AppConfig, "logLevel">,
  write: (line: string) => void = (line) => console.error(line),
): Logger {
  const level = config.logLevel;
  const enabled = (target: LogLevel) =>
    level !== "silent" && order.indexOf(level) >= order.indexOf(target);

  const emit = (target: LogLevel, message: string) => {
    if (enabled(target)) write(`[${target}] ${message}`);
  };

  return {
    debug: (m) => emit("debug", m),
    info: (m) => emit("info", m),
    warn: (m) => emit("warn", m),
    error: (m) => emit("error", m),
  };
}

export const silentLogger: Logger = createLogger({ logLevel: "silent" });
