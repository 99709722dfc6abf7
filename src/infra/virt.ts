import type { CommandResult } from "../exec/command-runner.js";
import type { HostExecOptions, ProxmoxHost } from "./proxmox-host.js";

/** libguestfs image customization (virt-customize / virt-sysprep) on the host. */
export class VirtCustomize {
  constructor(private readonly host: ProxmoxHost) {}

  install(image: string, packages: readonly string[], opts?: HostExecOptions): Promise<CommandResult> {
    return this.host.exec(["virt-customize", "--quiet", "-a", image, "--install", packages.join(",")], opts);
  }

  runCommand(image: string, command: string, opts?: HostExecOptions): Promise<CommandResult> {
    return this.host.exec(["virt-customize", "--quiet", "-a", image, "--run-command", command], opts);
  }

  sshInject(image: string, user: string, keyFile: string, opts?: HostExecOptions): Promise<CommandResult> {
    return this.host.exec(["virt-customize", "--quiet", "-a", image, "--ssh-inject", `${user}:file:${keyFile}`], opts);
  }

  sysprep(image: string, opts?: HostExecOptions): Promise<CommandResult> {
    return this.host.exec(["virt-sysprep", "--quiet", "-a", image], opts);
  }
}
