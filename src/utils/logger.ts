import pino from "pino";
import { env } from "@/config/env";

// Logs go to stderr; stdout carries the help text and the progress line.
function createLogger() {
  if (env.NODE_ENV === "test") {
    return pino({ level: "silent" });
  }

  if (env.NODE_ENV === "development") {
    return pino({
      level: env.LOG_LEVEL,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "HH:MM:ss Z",
          ignore: "pid,hostname",
          destination: 2,
        },
      },
    });
  }

  return pino({ level: env.LOG_LEVEL }, pino.destination({ dest: 2, sync: true }));
}

export const logger = createLogger();
