/**
 * Structured logging.
 *
 * pino JSON logs; pretty-printed through pino-pretty in development.
 * Engines default to a silent logger so library use stays quiet.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { EngineConfig } from "./config.js";

export function createLogger(config: Pick<EngineConfig, "LOG_LEVEL" | "NODE_ENV">): Logger {
  return pino({
    name: "ballast",
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
