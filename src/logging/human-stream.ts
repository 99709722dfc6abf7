import type { DestinationStream } from "pino";
import { ANSI, colorEnabled, fg } from "./color.js";
import { sanitizeLogMessage } from "./redact.js";

type Writable = { write: (chunk: string) => unknown; isTTY?: boolean };

const LABELS: Record<number, { label: string; color: number }> = {
  10: { label: "TRACE", color: ANSI.gray },
  20: { label: "DEBUG", color: ANSI.gray },
  30: { label: "INFO", color: ANSI.green },
  40: { label: "WARN", color: ANSI.yellow },
  50: { label: "ERROR", color: ANSI.red },
  60: { label: "FATAL", color: ANSI.red },
};

const HIDDEN_KEYS = new Set(["level", "time", "msg", "pid", "hostname"]);

function renderValue(value: unknown): string {
  if (typeof value === "string") return /\s/.test(value) ? JSON.stringify(value) : value;
  return JSON.stringify(value);
}

/** Render one pino JSON line as `HH:MM:SS [LEVEL] message key=value ...`. */
export function formatLogLine(line: string, color: boolean): string {
  let record: unknown;
  try {
    record = JSON.parse(line);
  } catch {
    return line.endsWith("\n") ? line : `${line}\n`;
  }
  if (record === null || typeof record !== "object" || Array.isArray(record)) return `${line}\n`;

  const entries = Object.entries(record);
  const fields = new Map(entries);
  const level = fields.get("level");
  const time = fields.get("time");
  const msg = fields.get("msg");

  const meta = LABELS[typeof level === "number" ? level : 30] ?? LABELS[30];
  const stamp = typeof time === "number" ? new Date(time).toISOString().slice(11, 19) : "";
  const extras = entries
    .filter(([k]) => !HIDDEN_KEYS.has(k))
    .map(([k, v]) => fg(color, ANSI.gray, `${k}=${renderValue(v)}`));

  const parts = [
    stamp ? fg(color, ANSI.gray, stamp) : "",
    fg(color, meta.color, `[${meta.label}]`),
    typeof msg === "string" ? sanitizeLogMessage(msg) : "",
    ...extras,
  ].filter((p) => p.length > 0);

  return `${parts.join(" ")}\n`;
}

/** pino destination that prints human-readable lines to the wrapped stream. */
export function createHumanStream(out: Writable = process.stderr): DestinationStream {
  const color = colorEnabled(out);
  return {
    write(chunk: string): void {
      for (const line of chunk.split("\n")) {
        if (line.trim().length === 0) continue;
        out.write(formatLogLine(line, color));
      }
    },
  };
}
