import { compileSchema } from "../schema/ajv.js";
import type { ClusterConfig } from "../types/config.js";
import { expandHome } from "./paths.js";

export type ConfigValidationResult =
  | { valid: true; config: ClusterConfig }
  | { valid: false; errors: string };

/**
 * Validate a merged config layer against schemas/config.schema.json.
 * Env-var strings are coerced to the schema's scalar types, and home-relative
 * paths are expanded on the returned copy.
 */
export function validateConfig(layer: unknown, home?: string): ConfigValidationResult {
  // ajv coercion mutates in place
  const copy: unknown = structuredClone(layer);
  const check = compileSchema<ClusterConfig>("config", { coerceTypes: true });
  const res = check(copy);
  if (!res.valid) return { valid: false, errors: res.errors };
  return { valid: true, config: expandPaths(res.value, home) };
}

function expandPaths(config: ClusterConfig, home?: string): ClusterConfig {
  const x = (p: string) => expandHome(p, home);
  return {
    ...config,
    state_file: x(config.state_file),
    log_dir: x(config.log_dir),
    ssh: {
      ...config.ssh,
      private_key_path: x(config.ssh.private_key_path),
      public_key_path: x(config.ssh.public_key_path),
    },
    packer: {
      ...config.packer,
      working_dir: x(config.packer.working_dir),
      env_file: x(config.packer.env_file),
    },
    infrastructure: {
      ...config.infrastructure,
      working_dir: x(config.infrastructure.working_dir),
      inventory_path: x(config.infrastructure.inventory_path),
    },
    kubernetes: {
      ...config.kubernetes,
      playbook: x(config.kubernetes.playbook),
      kubespray_dir: x(config.kubernetes.kubespray_dir),
      kubeconfig_path: x(config.kubernetes.kubeconfig_path),
    },
  };
}
