import { createConsola } from "consola";
import pc from "picocolors";

export const colors = {
  bold: pc.bold,
  dim: pc.dim,
  yellow: pc.yellow,
  red: pc.red,
} as const;

/** Consola level from $SEARCHSCOPE_LOG_LEVEL (0 = fatal ... 4 = debug, 5 = trace) */
export function resolveLogLevel(value: string | undefined): number {
  const level = Number.parseInt(value ?? "", 10);
  return Number.isNaN(level) ? 3 : level;
}

export const logger = createConsola({
  level: resolveLogLevel(process.env.SEARCHSCOPE_LOG_LEVEL),
});

export function warn(message: string, ...args: unknown[]) {
  logger.warn(message, ...args);
}

export function debug(message: string, ...args: unknown[]) {
  logger.debug(message, ...args);
}

/** Output raw content without tags (for results, JSON, piping) */
export function raw(message: string) {
  console.log(message);
}
