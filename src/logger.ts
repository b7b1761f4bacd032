import pino from "pino";

const root = pino(
  {
    level: process.env.LOG_LEVEL ?? "warn",
    base: null,
  },
  pino.destination(2)
);

export type Logger = pino.Logger;

export function createLogger(module: string): Logger {
  return root.child({ module });
}
