import { createLogger, format, transports } from "winston";

const isTest = process.env.NODE_ENV === "test";

/* Colorized console output is for local runs only */
export function logsToConsole(nodeEnv: string | undefined): boolean {
  return nodeEnv !== "production" && nodeEnv !== "test";
}

// Configure Winston logger
const logger = createLogger({
  level: process.env.LOG_LEVEL || "info",
  silent: isTest,
  format: format.combine(
    format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
    format.errors({ stack: true }),
    format.splat(),
    format.json(),
  ),
  defaultMeta: { service: "job-application-copilot" },
  transports: isTest
    ? [new transports.Console()]
    : [
        new transports.File({ filename: "logs/error.log", level: "error" }),
        new transports.File({ filename: "logs/combined.log" }),
      ],
});

// Console logging for non-production
if (logsToConsole(process.env.NODE_ENV)) {
  logger.add(
    new transports.Console({
      format: format.combine(
        format.colorize(),
        format.printf(({ level, message, timestamp, ...metadata }) => {
          let msg = `${timestamp} [${level}]: ${message}`;
          if (Object.keys(metadata).length > 0) {
            msg += ` ${JSON.stringify(metadata)}`;
          }
          return msg;
        }),
      ),
    }),
  );
}

export default logger;
