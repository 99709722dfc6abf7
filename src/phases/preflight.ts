import type { Logger } from "pino";
import type { LogSink } from "../exec/command-runner.js";
import { hasProgram } from "../infra/local-tools.js";
import { Rbd } from "../infra/rbd.js";
import { localFileExists } from "../verifiers/verifiers.js";
import type { PhaseDeps } from "./common.js";

export type CheckSeverity = "error" | "warning";

export type CheckResult = {
  name: string;
  ok: boolean;
  severity: CheckSeverity;
  message: string;
};

export type PreflightReport = {
  /** False when any error-severity check failed; warnings never fail the report. */
  ok: boolean;
  checks: CheckResult[];
};

export type PreflightOptions = {
  signal?: AbortSignal;
  logStream?: LogSink;
  logger?: Logger;
};

const GIB = 1024 ** 3;

/** Available bytes from `free -b` (the "available" column of the Mem: row). */
export function parseFreeAvailableBytes(stdout: string): number | null {
  const row = stdout.split("\n").find((l) => l.startsWith("Mem:"));
  if (!row) return null;
  const cols = row.trim().split(/\s+/);
  const available = Number(cols[6] ?? cols[3]);
  return Number.isFinite(available) ? available : null;
}

/** Available bytes of one storage from `pvesm status` (values are KiB). */
export function parsePvesmAvailableBytes(stdout: string, storage: string): number | null {
  for (const line of stdout.split("\n")) {
    const cols = line.trim().split(/\s+/);
    if (cols[0] !== storage || cols.length < 6) continue;
    const kib = Number(cols[5]);
    return Number.isFinite(kib) ? kib * 1024 : null;
  }
  return null;
}

function pass(name: string, message: string, severity: CheckSeverity = "error"): CheckResult {
  return { name, ok: true, severity, message };
}

function fail(name: string, message: string, severity: CheckSeverity = "error"): CheckResult {
  return { name, ok: false, severity, message };
}

/**
 * Environment checks before any mutation. Every check runs, even after a
 * failure, so the operator sees the whole picture at once.
 */
export async function runPreflight(deps: PhaseDeps, opts: PreflightOptions = {}): Promise<PreflightReport> {
  const { config, exec, host } = deps;
  const remote = { timeoutSec: 30, signal: opts.signal, logStream: opts.logStream };
  const local = { timeoutSec: 10, signal: opts.signal };
  const checks: CheckResult[] = [];

  const ssh = await host.exec(["echo", "ok"], remote);
  checks.push(
    ssh.exitCode === 0 && ssh.stdout.trim() === "ok"
      ? pass("ssh", `connected to ${config.proxmox.ssh_user}@${config.proxmox.host}`)
      : fail("ssh", `cannot reach ${config.proxmox.host} over ssh: ${ssh.stderr.trim() || `exit ${ssh.exitCode}`}`),
  );

  const missingKeys: string[] = [];
  for (const key of [config.ssh.private_key_path, config.ssh.public_key_path]) {
    if (!(await localFileExists(key))) missingKeys.push(key);
  }
  checks.push(
    missingKeys.length === 0 ? pass("ssh_keys", "ssh key pair present") : fail("ssh_keys", `missing: ${missingKeys.join(", ")}`),
  );

  const pve = await host.exec(["pveversion"], remote);
  checks.push(
    pve.exitCode === 0 ? pass("pveversion", pve.stdout.trim()) : fail("pveversion", "pveversion failed; is this a Proxmox VE node?"),
  );

  const missingRemote: string[] = [];
  for (const tool of config.proxmox.required_tools) {
    const res = await host.exec(["which", tool], remote);
    if (res.exitCode !== 0) missingRemote.push(tool);
  }
  checks.push(
    missingRemote.length === 0
      ? pass("remote_tools", `found ${config.proxmox.required_tools.join(", ")}`)
      : fail("remote_tools", `missing on host: ${missingRemote.join(", ")}`),
  );

  const bridge = await host.exec(["ip", "link", "show", config.proxmox.bridge], remote);
  checks.push(
    bridge.exitCode === 0
      ? pass("bridge", `bridge ${config.proxmox.bridge} present`)
      : fail("bridge", `bridge ${config.proxmox.bridge} not found`),
  );

  const rbd = await new Rbd(host).list(config.storage.rbd_pool, remote);
  checks.push(
    rbd.ok
      ? pass("rbd", `pool ${config.storage.rbd_pool}: ${rbd.images.length} images`)
      : fail("rbd", `cannot list pool ${config.storage.rbd_pool}: ${rbd.error}`),
  );

  const missingLocal: string[] = [];
  for (const tool of ["ssh", "ansible-playbook"]) {
    if (!(await hasProgram(exec, tool, local))) missingLocal.push(tool);
  }
  if (!(await hasProgram(exec, "tofu", local)) && !(await hasProgram(exec, "terraform", local))) {
    missingLocal.push("tofu|terraform");
  }
  if (config.packer.enabled && !(await hasProgram(exec, "packer", local))) missingLocal.push("packer");
  checks.push(
    missingLocal.length === 0 ? pass("local_tools", "local tools present") : fail("local_tools", `missing locally: ${missingLocal.join(", ")}`),
  );

  const mem = await host.exec(["free", "-b"], remote);
  const memBytes = mem.exitCode === 0 ? parseFreeAvailableBytes(mem.stdout) : null;
  const minMem = config.thresholds.min_free_memory_gb;
  if (memBytes === null) {
    checks.push(fail("memory", "could not read free memory", "warning"));
  } else {
    const gb = (memBytes / GIB).toFixed(1);
    checks.push(
      memBytes >= minMem * GIB
        ? pass("memory", `${gb} GiB available`, "warning")
        : fail("memory", `${gb} GiB available, below ${minMem} GiB`, "warning"),
    );
  }

  const pvesm = await host.exec(["pvesm", "status"], remote);
  const diskBytes = pvesm.exitCode === 0 ? parsePvesmAvailableBytes(pvesm.stdout, config.proxmox.storage) : null;
  const minDisk = config.thresholds.min_free_storage_gb;
  if (diskBytes === null) {
    checks.push(fail("storage", `could not read free space of ${config.proxmox.storage}`, "warning"));
  } else {
    const gb = (diskBytes / GIB).toFixed(1);
    checks.push(
      diskBytes >= minDisk * GIB
        ? pass("storage", `${gb} GiB available on ${config.proxmox.storage}`, "warning")
        : fail("storage", `${gb} GiB available on ${config.proxmox.storage}, below ${minDisk} GiB`, "warning"),
    );
  }

  for (const c of checks) {
    if (c.ok) opts.logger?.info({ check: c.name }, c.message);
    else if (c.severity === "warning") opts.logger?.warn({ check: c.name }, c.message);
    else opts.logger?.error({ check: c.name }, c.message);
  }

  return { ok: checks.every((c) => c.ok || c.severity === "warning"), checks };
}
