import pino from "pino";

// stdout carries explanations, so logs go to stderr.
export const logger = pino(
  {
    name: "devexplain",
    level: process.env.LOG_LEVEL || "warn",
  },
  pino.destination({ dest: 2, sync: true }),
);

export type Logger = pino.Logger;

const children = new Set<Logger>();

export function createChildLogger(name: string): Logger {
  const child = logger.child({ component: name });
  children.add(child);
  return child;
}

/** Children copy the level at creation, so they are updated one by one. */
export function setLogLevel(level: pino.LevelWithSilent): void {
  logger.level = level;
  for (const child of children) {
    child.level = level;
  }
}
