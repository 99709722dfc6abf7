import type { CommandResult } from "../exec/command-runner.js";
import type { HostExecOptions, ProxmoxHost } from "./proxmox-host.js";

export function rbdDevice(pool: string, image: string): string {
  return `/dev/rbd/${pool}/${image}`;
}

/** Ceph RBD volume handling on the Proxmox host. */
export class Rbd {
  constructor(private readonly host: ProxmoxHost) {}

  async list(pool?: string, opts?: HostExecOptions): Promise<{ ok: true; images: string[] } | { ok: false; error: string }> {
    const res = await this.host.exec(pool ? ["rbd", "ls", pool] : ["rbd", "ls"], opts);
    if (res.exitCode !== 0) return { ok: false, error: res.stderr.trim() || `exit ${res.exitCode}` };
    return { ok: true, images: res.stdout.split("\n").map((l) => l.trim()).filter((l) => l.length > 0) };
  }

  create(pool: string, image: string, size: string, opts?: HostExecOptions): Promise<CommandResult> {
    return this.host.exec(["rbd", "create", `${pool}/${image}`, "--size", size], opts);
  }

  map(pool: string, image: string, opts?: HostExecOptions): Promise<CommandResult> {
    return this.host.exec(["rbd", "map", `${pool}/${image}`], opts);
  }

  /** Filesystem type on a block device, or null when blkid finds none. */
  async fsType(device: string, opts?: HostExecOptions): Promise<string | null> {
    const res = await this.host.exec(["blkid", "-o", "value", "-s", "TYPE", device], opts);
    const type = res.stdout.trim();
    return res.exitCode === 0 && type ? type : null;
  }

  mkfsExt4(device: string, opts?: HostExecOptions): Promise<CommandResult> {
    return this.host.exec(["mkfs.ext4", "-F", device], opts);
  }

  async isMounted(mountPoint: string, opts?: HostExecOptions): Promise<boolean> {
    const res = await this.host.exec(["mountpoint", "-q", mountPoint], opts);
    return res.exitCode === 0;
  }

  mount(device: string, mountPoint: string, opts?: HostExecOptions): Promise<CommandResult> {
    return this.host.exec(["mount", device, mountPoint], opts);
  }

  mkdirs(paths: readonly string[], opts?: HostExecOptions): Promise<CommandResult> {
    return this.host.exec(["mkdir", "-p", ...paths], opts);
  }

  chown(owner: string, path: string, opts?: HostExecOptions): Promise<CommandResult> {
    return this.host.exec(["chown", "-R", owner, path], opts);
  }
}
