import pino from "pino";
import type { LoggingConfig } from "../config/types.js";

export type Logger = pino.Logger;

const PRETTY_TRANSPORT = {
  target: "pino-pretty",
  options: { colorize: true, translateTime: "HH:MM:ss", ignore: "pid,hostname" },
};

function wantsJson(config: Partial<LoggingConfig>): boolean {
  return config.json ?? process.env["NODE_ENV"] === "production";
}

/**
 * Root logger for the engine. Components take a child bound to
 * `{ component }`; prompt-level lines carry promptId and userId.
 */
export function createLogger(config: Partial<LoggingConfig> = {}): Logger {
  const base: pino.LoggerOptions = { name: "pacer", level: config.level ?? "info" };

  // A file gets raw JSON lines; pino takes no transport next to a destination.
  if (config.file) {
    return pino(base, pino.destination({ dest: config.file, mkdir: true }));
  }
  if (wantsJson(config)) {
    return pino(base);
  }
  return pino({ ...base, transport: PRETTY_TRANSPORT });
}
