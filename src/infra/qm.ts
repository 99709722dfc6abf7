import type { CommandResult } from "../exec/command-runner.js";
import { retry } from "../core/retry.js";
import { isRecord, stringField, tryParseJson } from "./json.js";
import type { HostExecOptions, ProxmoxHost } from "./proxmox-host.js";

export type VmListEntry = { vmid: number; name: string; status: string };

/** `qm config` output → key/value map ("template: 1" → { template: "1" }). */
export function parseQmConfig(stdout: string): Record<string, string> {
  const out: Record<string, string> = {};
  for (const line of stdout.split("\n")) {
    const idx = line.indexOf(":");
    if (idx <= 0) continue;
    out[line.slice(0, idx).trim()] = line.slice(idx + 1).trim();
  }
  return out;
}

/** `qm list` table → rows. The header line and malformed rows are dropped. */
export function parseQmList(stdout: string): VmListEntry[] {
  const rows: VmListEntry[] = [];
  for (const line of stdout.split("\n")) {
    const cols = line.trim().split(/\s+/);
    if (cols.length < 3 || !/^\d+$/.test(cols[0])) continue;
    rows.push({ vmid: Number(cols[0]), name: cols[1], status: cols[2] });
  }
  return rows;
}

/**
 * First non-loopback IPv4 from `qm guest cmd <id> network-get-interfaces`.
 * The agent answers with a bare array or `{ "return": [...] }`.
 */
export function parseGuestIpv4(stdout: string): string | null {
  const parsed = tryParseJson(stdout);
  const ifaces: unknown[] = Array.isArray(parsed) ? parsed : isRecord(parsed) && Array.isArray(parsed.return) ? parsed.return : [];

  for (const iface of ifaces) {
    if (!isRecord(iface) || stringField(iface, "name") === "lo") continue;
    const addrs: unknown = iface["ip-addresses"];
    if (!Array.isArray(addrs)) continue;
    for (const addr of addrs) {
      if (!isRecord(addr) || stringField(addr, "ip-address-type") !== "ipv4") continue;
      const ip = stringField(addr, "ip-address");
      if (ip && ip !== "127.0.0.1") return ip;
    }
  }
  return null;
}

/** Argument builders and probes over `qm` on the Proxmox host. */
export class Qm {
  constructor(private readonly host: ProxmoxHost) {}

  config(vmId: number, opts?: HostExecOptions): Promise<CommandResult> {
    return this.host.exec(["qm", "config", String(vmId)], opts);
  }

  async exists(vmId: number, opts?: HostExecOptions): Promise<boolean> {
    const res = await this.host.exec(["qm", "status", String(vmId)], opts);
    return res.exitCode === 0;
  }

  async isTemplate(vmId: number, opts?: HostExecOptions): Promise<boolean> {
    const res = await this.config(vmId, opts);
    return res.exitCode === 0 && parseQmConfig(res.stdout).template === "1";
  }

  /** "running", "stopped", ... or null when the VM does not exist. */
  async status(vmId: number, opts?: HostExecOptions): Promise<string | null> {
    const res = await this.host.exec(["qm", "status", String(vmId)], opts);
    if (res.exitCode !== 0) return null;
    const m = /status:\s*(\S+)/.exec(res.stdout);
    return m ? m[1] : null;
  }

  async list(opts?: HostExecOptions): Promise<VmListEntry[]> {
    const res = await this.host.exec(["qm", "list"], opts);
    return res.exitCode === 0 ? parseQmList(res.stdout) : [];
  }

  create(vmId: number, args: readonly string[], opts?: HostExecOptions): Promise<CommandResult> {
    return this.host.exec(["qm", "create", String(vmId), ...args], opts);
  }

  set(vmId: number, args: readonly string[], opts?: HostExecOptions): Promise<CommandResult> {
    return this.host.exec(["qm", "set", String(vmId), ...args], opts);
  }

  importDisk(vmId: number, image: string, storage: string, opts?: HostExecOptions): Promise<CommandResult> {
    return this.host.exec(["qm", "importdisk", String(vmId), image, storage, "--format", "raw"], opts);
  }

  resize(vmId: number, disk: string, size: string, opts?: HostExecOptions): Promise<CommandResult> {
    return this.host.exec(["qm", "resize", String(vmId), disk, size], opts);
  }

  template(vmId: number, opts?: HostExecOptions): Promise<CommandResult> {
    return this.host.exec(["qm", "template", String(vmId)], opts);
  }

  stop(vmId: number, opts?: HostExecOptions): Promise<CommandResult> {
    return this.host.exec(["qm", "stop", String(vmId)], opts);
  }

  destroy(vmId: number, opts?: HostExecOptions): Promise<CommandResult> {
    return this.host.exec(["qm", "destroy", String(vmId), "--purge"], opts);
  }

  async guestIpv4(vmId: number, opts?: HostExecOptions): Promise<string | null> {
    const res = await this.host.exec(["qm", "guest", "cmd", String(vmId), "network-get-interfaces"], opts);
    return res.exitCode === 0 ? parseGuestIpv4(res.stdout) : null;
  }

  /** Poll the guest agent until the VM reports an IPv4 address. */
  async waitForIp(
    vmId: number,
    attempts: number,
    delaySec: number,
    opts: HostExecOptions = {},
  ): Promise<string | null> {
    const res = await retry(
      async () => {
        const ip = await this.guestIpv4(vmId, { ...opts, timeoutSec: opts.timeoutSec ?? 30 });
        return ip ? { ok: true as const, value: ip } : { ok: false as const, error: "no address yet" };
      },
      { attempts, delayMs: delaySec * 1000, signal: opts.signal },
    );
    return res.ok ? res.value : null;
  }

  /**
   * A VM is in use when it is running, or when it is a template that other
   * VMs were linked-cloned from (their disks reference `base-<id>-`).
   */
  async isInUse(vmId: number, opts?: HostExecOptions): Promise<boolean> {
    const status = await this.status(vmId, opts);
    if (status === null) return false;
    if (status === "running") return true;
    if (!(await this.isTemplate(vmId, opts))) return false;

    const marker = `base-${vmId}-`;
    for (const vm of await this.list(opts)) {
      if (vm.vmid === vmId) continue;
      const cfg = await this.config(vm.vmid, opts);
      if (cfg.exitCode === 0 && cfg.stdout.includes(marker)) return true;
    }
    return false;
  }
}
