import { pino, type Logger as PinoLogger, type LevelWithSilent } from "pino";

export function createLogger(options?: {
  name?: string;
  level?: LevelWithSilent;
}): PinoLogger {
  return pino({
    name: options?.name ?? "crate-envelope",
    level: options?.level ?? "info",
  });
}
