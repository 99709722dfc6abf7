import fs from "node:fs";
import path from "node:path";
import type { CommandExecutor } from "../exec/command-runner.js";
import type { ProxmoxHost } from "../infra/proxmox-host.js";
import type { StateStore } from "../state/state-store.js";
import type { ClusterConfig } from "../types/config.js";
import { PhaseError } from "../core/errors.js";

export const PHASE_IDS = [
  "validation",
  "tools_storage",
  "automation_user",
  "cloud_image",
  "base_template",
  "packer_config",
  "golden_image",
  "infrastructure",
  "kubernetes",
] as const;

export type PhaseId = (typeof PHASE_IDS)[number];

export const DEFAULT_TIMEOUTS: Record<PhaseId, number> = {
  validation: 120,
  tools_storage: 600,
  automation_user: 120,
  cloud_image: 1800,
  base_template: 900,
  packer_config: 30,
  golden_image: 1800,
  infrastructure: 1800,
  kubernetes: 1800,
};

/** What every phase closes over when the list is built. */
export type PhaseDeps = {
  config: ClusterConfig;
  exec: CommandExecutor;
  host: ProxmoxHost;
  /** --force-rebuild: also lets base_template replace a VM that is in use. */
  force?: boolean;
};

export function timeoutFor(config: ClusterConfig, id: PhaseId): number {
  return config.timeouts[id] ?? DEFAULT_TIMEOUTS[id];
}

export function imagesDir(config: ClusterConfig): string {
  return `${config.storage.mount_point}/template/images`;
}

export function isoDir(config: ClusterConfig): string {
  return `${config.storage.mount_point}/template/iso`;
}

export function imagePath(config: ClusterConfig): string {
  return `${imagesDir(config)}/${config.image.file_name}`;
}

/** Where the automation public key is staged on the Proxmox host. */
export function remotePublicKeyPath(config: ClusterConfig): string {
  return `/tmp/${path.basename(config.ssh.public_key_path)}`;
}

export function readPublicKey(config: ClusterConfig, phase: string): string {
  try {
    return fs.readFileSync(config.ssh.public_key_path, "utf8");
  } catch {
    throw new PhaseError(phase, `public key not readable: ${config.ssh.public_key_path}`);
  }
}

export function detailString(state: StateStore, phase: string, key: string): string | undefined {
  const v = state.record(phase)?.details[key];
  return typeof v === "string" ? v : undefined;
}

export function detailStringList(state: StateStore, phase: string, key: string): string[] {
  const v = state.record(phase)?.details[key];
  return Array.isArray(v) ? v.filter((x): x is string => typeof x === "string") : [];
}
