import fs from "node:fs/promises";
import type { CommandExecutor } from "../exec/command-runner.js";
import { isRecord, tryParseJson } from "../infra/json.js";
import { kubectlReadyzArgv } from "../infra/local-tools.js";
import type { PathKind, ProxmoxHost } from "../infra/proxmox-host.js";
import { Pveum } from "../infra/pveum.js";
import { Qm } from "../infra/qm.js";
import type { Terraform } from "../infra/terraform.js";

/**
 * Resource verifiers: read-only probes answering "does the thing this phase
 * produced still exist?". They resolve to false on any failure and never reject.
 */
export type Probe = () => Promise<boolean>;

export type ProbeOptions = {
  timeoutSec?: number;
  signal?: AbortSignal;
};

const DEFAULT_PROBE_TIMEOUT_SEC = 10;

function probeOpts(opts: ProbeOptions): { timeoutSec: number; signal?: AbortSignal } {
  return { timeoutSec: opts.timeoutSec ?? DEFAULT_PROBE_TIMEOUT_SEC, signal: opts.signal };
}

async function guard(probe: Probe): Promise<boolean> {
  try {
    return await probe();
  } catch {
    return false;
  }
}

export function remotePathExists(host: ProxmoxHost, path: string, kind: PathKind, opts: ProbeOptions = {}): Promise<boolean> {
  return guard(() => host.test(path, kind, probeOpts(opts)));
}

/** stat, not open: a key file we may not read still counts as present. */
export function localFileExists(path: string): Promise<boolean> {
  return guard(async () => (await fs.stat(path)).isFile());
}

export function templateExists(
  host: ProxmoxHost,
  vmId: number,
  opts: ProbeOptions & { requireTemplate?: boolean } = {},
): Promise<boolean> {
  const qm = new Qm(host);
  return guard(async () => {
    if (opts.requireTemplate ?? true) return qm.isTemplate(vmId, probeOpts(opts));
    return (await qm.config(vmId, probeOpts(opts))).exitCode === 0;
  });
}

export function userExists(host: ProxmoxHost, userId: string, opts: ProbeOptions = {}): Promise<boolean> {
  return guard(async () => {
    const res = await new Pveum(host).userList(probeOpts(opts));
    return res.ok && res.users.includes(userId);
  });
}

/**
 * Call the API version endpoint with the token. Only a `data` object means the
 * token authenticates; a rejected token still gets a 401 body of `{"data":null}`. The header goes over stdin so the secret
 * stays out of the process list.
 */
export function tokenAuthenticates(
  exec: CommandExecutor,
  apiHost: string,
  apiPort: number,
  tokenId: string,
  secret: string,
  opts: ProbeOptions = {},
): Promise<boolean> {
  const { timeoutSec, signal } = probeOpts(opts);
  return guard(async () => {
    const res = await exec.run(
      ["curl", "-s", "-k", "-m", String(timeoutSec), "-H", "@-", `https://${apiHost}:${apiPort}/api2/json/version`],
      { timeoutSec: timeoutSec + 5, signal, input: `Authorization: PVEAPIToken=${tokenId}=${secret}\n` },
    );
    if (res.exitCode !== 0) return false;
    const body = tryParseJson(res.stdout);
    return isRecord(body) && isRecord(body.data);
  });
}

export function terraformStateNonEmpty(tf: Terraform, opts: ProbeOptions = {}): Promise<boolean> {
  return guard(async () => {
    const addrs = await tf.stateList(probeOpts(opts));
    return addrs !== null && addrs.length > 0;
  });
}

export function kubeApiReady(exec: CommandExecutor, kubeconfig: string, opts: ProbeOptions = {}): Promise<boolean> {
  return guard(async () => {
    if (!(await localFileExists(kubeconfig))) return false;
    const res = await exec.run(kubectlReadyzArgv(kubeconfig), probeOpts(opts));
    return res.exitCode === 0;
  });
}

/** True only when every probe passes; stops at the first failure. */
export function allOf(...probes: Probe[]): Probe {
  return async () => {
    for (const probe of probes) {
      if (!(await guard(probe))) return false;
    }
    return true;
  };
}
