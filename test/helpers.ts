import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type { PhaseRunContext, VerifyContext } from "../src/core/phase.js";
import { deepMerge, loadConfig, type ConfigLayer } from "../src/config/loader.js";
import { validateConfig } from "../src/config/validator.js";
import { silentLogger } from "../src/logging/logger.js";
import { StateStore } from "../src/state/state-store.js";
import type { ClusterConfig } from "../src/types/config.js";

export const CONFIG_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../config");

/** Temporary home directory holding a placeholder ssh key pair. */
export function makeHome(): string {
  const home = fs.mkdtempSync(path.join(os.tmpdir(), "pvekube-home-"));
  fs.mkdirSync(path.join(home, ".ssh"));
  fs.writeFileSync(path.join(home, ".ssh", "pvekube_automation_key"), "placeholder-private-key\n", { mode: 0o600 });
  fs.writeFileSync(path.join(home, ".ssh", "pvekube_automation_key.pub"), "ssh-ed25519 AAAAplaceholder pvekube\n");
  return home;
}

/** base.yaml with `overrides` merged on top, home paths expanded under `home`. */
export function testConfig(home: string, overrides: ConfigLayer = {}): ClusterConfig {
  const layer = deepMerge(loadConfig({ configDir: CONFIG_DIR, env: {} }), overrides);
  const res = validateConfig(layer, home);
  if (!res.valid) throw new Error(res.errors);
  return res.config;
}

export function runContext(phase: string, state: StateStore): PhaseRunContext {
  return {
    phase,
    signal: new AbortController().signal,
    logStream: { write: () => true },
    logger: silentLogger(),
    state,
  };
}

export function verifyContext(state: StateStore): VerifyContext {
  return { signal: new AbortController().signal, timeoutSec: 5, logger: silentLogger(), state };
}
