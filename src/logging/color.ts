/**
 * Basic ANSI coloring for the human log format. Disabled when NO_COLOR is set,
 * the target is not a TTY, or TERM is "dumb".
 */
export function colorEnabled(stream: { isTTY?: boolean }, env: NodeJS.ProcessEnv = process.env): boolean {
  if (env.NO_COLOR || !stream.isTTY) return false;
  return (env.TERM ?? "") !== "dumb";
}

export const ANSI = {
  red: 31,
  green: 32,
  yellow: 33,
  blue: 34,
  cyan: 36,
  gray: 90,
} as const;

/** Wrap text in a standard 4-bit ANSI foreground code. */
export function fg(enabled: boolean, code: number, text: string): string {
  if (!enabled) return text;
  return `\x1b[${code}m${text}\x1b[0m`;
}
