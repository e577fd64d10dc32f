import pino from "pino";

const pretty = process.env.MEMO_LOG_PRETTY === "1" || process.env.MEMO_LOG_PRETTY === "true";

const logger = pino({
  level: process.env.LOG_LEVEL ?? "info",
  ...(pretty
    ? {
        transport: {
          target: "pino-pretty",
          options: { colorize: true }
        }
      }
    : {})
});

/**
 * Child logger scoped to one run; every line carries the runId.
 */
export function createRunLogger(runId: string, extra?: Record<string, unknown>) {
  return logger.child({ runId, ...extra });
}

export default logger;
