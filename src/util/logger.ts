import winston from "winston";

const { combine, timestamp, printf, colorize } = winston.format;

const fmt = printf(({ level, message, timestamp, component }) => {
  const comp = component ? `[${component}]` : "";
  return `${timestamp} ${level} ${comp} ${message}`;
});

let logger: winston.Logger | undefined;

/**
 * Set the log level. Component loggers are created at import time, before the
 * config is parsed, so an existing root logger is reconfigured in place rather
 * than replaced: children read the level through their parent.
 */
export function initLogger(level: string): winston.Logger {
  if (logger) {
    logger.level = level;
    return logger;
  }
  logger = winston.createLogger({
    level,
    format: combine(timestamp({ format: "HH:mm:ss.SSS" }), colorize(), fmt),
    transports: [new winston.transports.Console()],
  });
  return logger;
}

export function getLogger(component?: string): winston.Logger {
  const root = logger ?? initLogger(process.env.LOG_LEVEL || "info");
  return root.child({ component });
}
