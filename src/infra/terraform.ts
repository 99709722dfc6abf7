import type { CommandExecutor, CommandResult, LogSink } from "../exec/command-runner.js";
import type { ClusterProfile, InfrastructureTool } from "../types/config.js";
import { isRecord, tryParseJson } from "./json.js";

export type TfTool = "terraform" | "tofu";

export type LocalExecOptions = {
  timeoutSec?: number;
  logStream?: LogSink;
  signal?: AbortSignal;
  env?: Record<string, string>;
};

export const NODE_COUNTS: Record<ClusterProfile, { controlPlanes: number; workers: number }> = {
  "single-node": { controlPlanes: 1, workers: 0 },
  "single-master": { controlPlanes: 1, workers: 2 },
  "ha-cluster": { controlPlanes: 3, workers: 3 },
};

/**
 * Pick the infrastructure binary: an explicit choice must answer `version`;
 * "auto" prefers tofu, then terraform.
 */
export async function detectTool(
  exec: CommandExecutor,
  preferred: InfrastructureTool,
  opts: LocalExecOptions = {},
): Promise<TfTool | null> {
  const candidates: TfTool[] = preferred === "auto" ? ["tofu", "terraform"] : [preferred];
  for (const tool of candidates) {
    const res = await exec.run([tool, "version"], { timeoutSec: opts.timeoutSec ?? 30, signal: opts.signal });
    if (res.exitCode === 0) return tool;
  }
  return null;
}

/** VM ids from a `-json` output: a list of ids or a name → id map. */
export function parseVmIds(value: unknown): number[] {
  const items: unknown[] = Array.isArray(value) ? value : isRecord(value) ? Object.values(value) : [];
  const ids: number[] = [];
  for (const item of items) {
    const n = typeof item === "number" ? item : typeof item === "string" ? Number(item) : NaN;
    if (Number.isInteger(n) && n > 0) ids.push(n);
  }
  return ids;
}

export function parseStringList(value: unknown): string[] {
  const items: unknown[] = Array.isArray(value) ? value : isRecord(value) ? Object.values(value) : [];
  return items.filter((v): v is string => typeof v === "string" && v.length > 0);
}

/** terraform / tofu in one working directory. */
export class Terraform {
  constructor(
    private readonly exec: CommandExecutor,
    readonly tool: TfTool,
    readonly workingDir: string,
  ) {}

  private run(args: readonly string[], opts: LocalExecOptions = {}): Promise<CommandResult> {
    return this.exec.run([this.tool, ...args], { ...opts, cwd: this.workingDir });
  }

  init(opts?: LocalExecOptions): Promise<CommandResult> {
    return this.run(["init", "-input=false"], opts);
  }

  plan(vars: Record<string, string | number>, opts?: LocalExecOptions): Promise<CommandResult> {
    return this.run(["plan", "-input=false", "-out=tfplan", ...varArgs(vars)], opts);
  }

  apply(parallelism: number, opts?: LocalExecOptions): Promise<CommandResult> {
    return this.run(["apply", "-input=false", "-auto-approve", `-parallelism=${parallelism}`, "tfplan"], opts);
  }

  destroy(vars: Record<string, string | number>, opts?: LocalExecOptions): Promise<CommandResult> {
    return this.run(["destroy", "-input=false", "-auto-approve", ...varArgs(vars)], opts);
  }

  async outputJson(name: string, opts?: LocalExecOptions): Promise<unknown> {
    const res = await this.run(["output", "-json", name], opts);
    return res.exitCode === 0 ? tryParseJson(res.stdout) : undefined;
  }

  async outputRaw(name: string, opts?: LocalExecOptions): Promise<string | null> {
    const res = await this.run(["output", "-raw", name], opts);
    return res.exitCode === 0 ? res.stdout : null;
  }

  /** Resource addresses in state; null when the listing itself failed. */
  async stateList(opts?: LocalExecOptions): Promise<string[] | null> {
    const res = await this.run(["state", "list"], opts);
    if (res.exitCode !== 0) return null;
    return res.stdout.split("\n").map((l) => l.trim()).filter((l) => l.length > 0);
  }
}

function varArgs(vars: Record<string, string | number>): string[] {
  return Object.entries(vars).flatMap(([k, v]) => ["-var", `${k}=${v}`]);
}
