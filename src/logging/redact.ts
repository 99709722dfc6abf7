/**
 * Redact sensitive information from command lines and error messages.
 */
export function redactSensitiveInfo(s: string): string {
  if (!s) return "";

  let result = s;

  result = result.replace(/PVEAPIToken=[^\s'"]+/g, "PVEAPIToken=***");
  result = result.replace(/(password|token|secret|api[_-]?key)([=:]\s*)(?!\*\*\*)[^\s'"]+/gi, "$1$2***");

  return result;
}

/**
 * Sanitize a single-line log message to prevent log injection.
 */
export function sanitizeLogMessage(s: string): string {
  if (!s) return "";
  return s.replace(/[\r\n]/g, "\\n").replace(/\t/g, "\\t").slice(0, 10000);
}

/** Render an argv for logs: redacted, each word quoted only when needed. */
export function formatCommand(argv: readonly string[]): string {
  const words = argv.map((a) => (/^[\w@%+=:,./-]+$/.test(a) ? a : `'${a.replace(/'/g, "'\\''")}'`));
  return redactSensitiveInfo(words.join(" "));
}

/** Message from any thrown value, redacted. */
export function errorMessage(e: unknown): string {
  return redactSensitiveInfo(e instanceof Error ? e.message : String(e));
}
