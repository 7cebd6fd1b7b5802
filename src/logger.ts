import pino from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

// stdout carries --print and --dump-repos output
const rootLogger = pino(
  {
    level: "info",
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  pino.destination(2),
);

const children = new Set<pino.Logger>();

export function createLogger(module: string): pino.Logger {
  const child = rootLogger.child({ module });
  children.add(child);
  return child;
}

export function setLogLevel(level: LogLevel): void {
  rootLogger.level = level;
  for (const child of children) {
    child.level = level;
  }
}
