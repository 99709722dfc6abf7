import type { CommandExecutor, CommandResult } from "../exec/command-runner.js";
import type { LocalExecOptions } from "./terraform.js";

export function ansiblePlaybookArgv(opts: {
  inventory: string;
  playbook: string;
  become?: boolean;
  user?: string;
  privateKey?: string;
  extraVars?: Record<string, string>;
}): string[] {
  const argv = ["ansible-playbook", "-i", opts.inventory];
  if (opts.become) argv.push("-b");
  if (opts.user) argv.push("-u", opts.user);
  if (opts.privateKey) argv.push("--private-key", opts.privateKey);
  for (const [k, v] of Object.entries(opts.extraVars ?? {})) argv.push("-e", `${k}=${v}`);
  argv.push(opts.playbook);
  return argv;
}

/** packer init / validate / build for one template in its working directory. */
export class Packer {
  constructor(
    private readonly exec: CommandExecutor,
    readonly workingDir: string,
  ) {}

  private run(args: readonly string[], opts: LocalExecOptions = {}): Promise<CommandResult> {
    return this.exec.run(["packer", ...args], { ...opts, cwd: this.workingDir });
  }

  init(template: string, opts?: LocalExecOptions): Promise<CommandResult> {
    return this.run(["init", template], opts);
  }

  validate(template: string, opts?: LocalExecOptions): Promise<CommandResult> {
    return this.run(["validate", template], opts);
  }

  build(template: string, opts?: LocalExecOptions): Promise<CommandResult> {
    return this.run(["build", "-force", template], opts);
  }
}

export function kubectlReadyzArgv(kubeconfig: string): string[] {
  return ["kubectl", "--kubeconfig", kubeconfig, "get", "--raw", "/readyz"];
}

export function scpFromArgv(opts: {
  user: string;
  host: string;
  remotePath: string;
  localPath: string;
  identityFile?: string;
  connectTimeoutSec: number;
}): string[] {
  const argv = [
    "scp",
    "-o", "BatchMode=yes",
    "-o", `ConnectTimeout=${opts.connectTimeoutSec}`,
    "-o", "StrictHostKeyChecking=accept-new",
  ];
  if (opts.identityFile) argv.push("-i", opts.identityFile);
  argv.push(`${opts.user}@${opts.host}:${opts.remotePath}`, opts.localPath);
  return argv;
}

/** Locate a program on PATH with `command -v`-like semantics. */
export async function hasProgram(exec: CommandExecutor, program: string, opts: LocalExecOptions = {}): Promise<boolean> {
  const res = await exec.run(["which", program], { timeoutSec: opts.timeoutSec ?? 10, signal: opts.signal });
  return res.exitCode === 0;
}
