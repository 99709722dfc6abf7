import type { Logger } from "pino";
import type { CommandExecutor } from "../exec/command-runner.js";
import { ProxmoxHost } from "../infra/proxmox-host.js";
import { type PreflightReport, runPreflight } from "../phases/preflight.js";
import type { ClusterConfig } from "../types/config.js";

export type ValidateResult = { ok: true; report: PreflightReport } | { ok: false; report: PreflightReport };

/** Preflight checks only; nothing is changed on the host or in the state file. */
export async function validateEnvironment(
  config: ClusterConfig,
  deps: { executor: CommandExecutor; logger: Logger; signal?: AbortSignal },
): Promise<ValidateResult> {
  const host = ProxmoxHost.fromConfig(deps.executor, config);
  const report = await runPreflight({ config, exec: deps.executor, host }, { signal: deps.signal, logger: deps.logger });
  return report.ok ? { ok: true, report } : { ok: false, report };
}
