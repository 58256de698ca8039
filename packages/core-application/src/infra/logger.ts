import { destination, pino, type Logger } from "pino";

export type LoggerOptions = {
  level: string;
  /** Write to this file instead of stdout. */
  file?: string;
};

export function createLogger(options: LoggerOptions): Logger {
  const base = { level: options.level, base: { app: "drop-relay" } };
  if (!options.file) return pino(base);
  return pino(base, destination({ dest: options.file, mkdir: true, sync: false }));
}
