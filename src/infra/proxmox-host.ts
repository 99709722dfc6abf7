import type { ClusterConfig } from "../types/config.js";
import {
  type CommandExecutor,
  type CommandResult,
  type LogSink,
  type SshTarget,
  shellQuote,
} from "../exec/command-runner.js";

export type HostExecOptions = {
  timeoutSec?: number;
  input?: string;
  logStream?: LogSink;
  signal?: AbortSignal;
};

export type PathKind = "dir" | "file";

/** The Proxmox node, reached over ssh as the configured admin user. */
export class ProxmoxHost {
  readonly target: SshTarget;

  constructor(
    readonly executor: CommandExecutor,
    target: Omit<SshTarget, "kind">,
  ) {
    this.target = { kind: "ssh", ...target };
  }

  static fromConfig(executor: CommandExecutor, config: ClusterConfig): ProxmoxHost {
    return new ProxmoxHost(executor, {
      host: config.proxmox.host,
      user: config.proxmox.ssh_user,
      identityFile: config.ssh.private_key_path,
      connectTimeoutSec: config.ssh.connect_timeout_sec,
    });
  }

  exec(argv: readonly string[], opts: HostExecOptions = {}): Promise<CommandResult> {
    return this.executor.run(argv, { ...opts, target: this.target });
  }

  /** Run a script through the remote /bin/sh, for pipes and redirects. */
  shell(script: string, opts: HostExecOptions = {}): Promise<CommandResult> {
    return this.exec(["sh", "-c", script], opts);
  }

  async test(path: string, kind: PathKind, opts: HostExecOptions = {}): Promise<boolean> {
    const res = await this.exec(["test", kind === "dir" ? "-d" : "-f", path], opts);
    return res.exitCode === 0;
  }

  /** Write `content` to a remote file via stdin, optionally setting its mode. */
  async writeFile(path: string, content: string, opts: HostExecOptions & { mode?: string } = {}): Promise<CommandResult> {
    const { mode, ...rest } = opts;
    const res = await this.shell(`cat > ${shellQuote(path)}`, { ...rest, input: content });
    if (res.exitCode !== 0 || !mode) return res;
    return this.exec(["chmod", mode, path], rest);
  }
}
