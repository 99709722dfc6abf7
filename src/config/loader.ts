import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { packageRoot } from "./paths.js";

export type ConfigLayer = Record<string, unknown>;

export const ENV_PREFIX = "PVEKUBE_";

export function defaultConfigDir(): string {
  return path.join(packageRoot(), "config");
}

function isPlainObject(value: unknown): value is ConfigLayer {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
export function deepMerge(base: ConfigLayer, override: ConfigLayer): ConfigLayer {
  const result: ConfigLayer = { ...base };
  for (const [key, val] of Object.entries(override)) {
    if (isPlainObject(val)) {
      const current = result[key];
      result[key] = deepMerge(isPlainObject(current) ? current : {}, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file and return parsed object, or empty object if not found. */
export function loadYaml(filePath: string): ConfigLayer {
  if (!fs.existsSync(filePath)) return {};
  const parsed: unknown = YAML.parse(fs.readFileSync(filePath, "utf8"));
  if (parsed === null || parsed === undefined) return {};
  if (!isPlainObject(parsed)) {
    throw new Error(`Config file must contain a mapping: ${filePath}`);
  }
  return parsed;
}

/**
 * Collect PVEKUBE_ prefixed environment variables into a nested layer.
 * PVEKUBE_PROXMOX__HOST → proxmox.host; PVEKUBE_LOG_DIR → log_dir.
 */
export function envLayer(env: NodeJS.ProcessEnv = process.env): ConfigLayer {
  const layer: ConfigLayer = {};
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    const segments = key.slice(ENV_PREFIX.length).toLowerCase().split("__").filter((s) => s.length > 0);
    if (segments.length === 0) continue;

    let node = layer;
    for (const segment of segments.slice(0, -1)) {
      const next = node[segment];
      if (isPlainObject(next)) {
        node = next;
      } else {
        const created: ConfigLayer = {};
        node[segment] = created;
        node = created;
      }
    }
    node[segments[segments.length - 1]] = value;
  }
  return layer;
}

export type LoadConfigOptions = {
  /** Loads `config/{envName}.yaml` as an override layer. */
  envName?: string;
  configDir?: string;
  /** Explicit file merged above the env layer. */
  configFile?: string;
  env?: NodeJS.ProcessEnv;
};

/**
 * Load layered config: base.yaml ← {env}.yaml ← --config file ← PVEKUBE_* variables.
 * The result is unvalidated; pass it to validateConfig.
 */
export function loadConfig(opts: LoadConfigOptions = {}): ConfigLayer {
  const dir = opts.configDir ?? defaultConfigDir();

  let merged = loadYaml(path.join(dir, "base.yaml"));

  if (opts.envName) {
    merged = deepMerge(merged, loadYaml(path.join(dir, `${opts.envName}.yaml`)));
  }

  if (opts.configFile) {
    if (!fs.existsSync(opts.configFile)) {
      throw new Error(`Config file not found: ${opts.configFile}`);
    }
    merged = deepMerge(merged, loadYaml(opts.configFile));
  }

  return deepMerge(merged, envLayer(opts.env));
}
