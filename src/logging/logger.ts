import { pino, type DestinationStream, type Logger, type LevelWithSilent } from "pino";
import { createHumanStream } from "./human-stream.js";

export type { Logger };

export type OutputFormat = "human" | "jsonl";

export const LOG_LEVELS: readonly LevelWithSilent[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

export function isLogLevel(value: string): value is LevelWithSilent {
  return LOG_LEVELS.some((l) => l === value);
}

export type LoggerOptions = {
  format?: OutputFormat;
  level?: LevelWithSilent;
  /** Overrides the format's default destination (stderr). */
  destination?: DestinationStream;
};

export const REDACT_PATHS = ["token", "password", "secret", "details.token", "*.token", "*.password"];

export function createLogger(opts: LoggerOptions = {}): Logger {
  const format = opts.format ?? "human";
  const destination =
    opts.destination ?? (format === "human" ? createHumanStream(process.stderr) : pino.destination(2));

  return pino(
    {
      level: opts.level ?? "info",
      base: undefined,
      redact: { paths: REDACT_PATHS, censor: "***" },
    },
    destination,
  );
}

/** Logger that drops everything; used where no output is wanted. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
