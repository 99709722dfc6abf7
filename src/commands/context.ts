import { loadConfig } from "../config/loader.js";
import { validateConfig } from "../config/validator.js";
import { errorMessage } from "../logging/redact.js";
import { EXIT, type ExitCode } from "./exit-codes.js";
import type { ClusterConfig } from "../types/config.js";

export type ConfigSource = {
  env?: string;
  config?: string;
  configDir?: string;
};

export type LoadContextResult =
  | { ok: true; config: ClusterConfig }
  | { ok: false; error: string; exitCode: ExitCode };

/** Load and validate the layered configuration for one CLI invocation. Bad config is a validation failure. */
export function loadClusterConfig(src: ConfigSource, env: NodeJS.ProcessEnv = process.env): LoadContextResult {
  let layer: Record<string, unknown>;
  try {
    layer = loadConfig({ envName: src.env, configDir: src.configDir, configFile: src.config, env });
  } catch (e) {
    return { ok: false, error: `Failed to load config: ${errorMessage(e)}`, exitCode: EXIT.VALIDATION_FAILED };
  }
  const res = validateConfig(layer);
  if (!res.valid) return { ok: false, error: `Config invalid: ${res.errors}`, exitCode: EXIT.VALIDATION_FAILED };
  return { ok: true, config: res.config };
}
