import { pino } from "pino";
import { config, isDev } from "../config/index.js";

const devTransport = {
  target: "pino-pretty",
  options: {
    translateTime: "HH:MM:ss Z",
    ignore: "pid,hostname,service",
    colorize: true,
  },
};

export const logger = pino({
  level: config.LOG_LEVEL,
  base: { service: "call-roster-sync" },
  // The call API key travels in request headers
  redact: ["headers.authorization", "headers.Authorization", "req.headers.authorization"],
  ...(isDev && { transport: devTransport }),
});

export type Logger = Pick<
  typeof logger,
  "fatal" | "error" | "warn" | "info" | "debug" | "trace"
>;

/** Root logger scoped to one call; every roster component logs through this */
export function createCallLogger(callId: string): Logger {
  return logger.child({ callId });
}
