import { pino, type DestinationStream, type Logger, type LoggerOptions } from "pino";
import type { ClientConfig } from "./config.js";

export interface LoggerSettings {
  level: ClientConfig["logLevel"];
  pretty: boolean;
}

const REDACTED_PATHS = ["headers.User", "headers.user"];

/**
 * Builds the client's pino logger. The identity header is censored wherever a request's
 * headers are logged. `destination` replaces stdout and takes precedence over `pretty`.
 */
export function createLogger(settings: LoggerSettings, destination?: DestinationStream): Logger {
  const options: LoggerOptions = {
    name: "stowage-client",
    level: settings.level,
    redact: {
      paths: REDACTED_PATHS,
      censor: "[REDACTED]"
    },
    timestamp: pino.stdTimeFunctions.isoTime
  };

  if (destination) {
    return pino(options, destination);
  }
  if (settings.pretty) {
    return pino({ ...options, transport: { target: "pino-pretty" } });
  }
  return pino(options);
}
