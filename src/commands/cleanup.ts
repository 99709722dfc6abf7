import path from "node:path";
import type { Logger } from "pino";
import type { CommandExecutor } from "../exec/command-runner.js";
import { Terraform, detectTool } from "../infra/terraform.js";
import { ProxmoxHost } from "../infra/proxmox-host.js";
import { terraformVars } from "../phases/infrastructure.js";
import { StateStore } from "../state/state-store.js";
import type { ClusterConfig } from "../types/config.js";
import { EXIT, type ExitCode } from "./exit-codes.js";

export type CleanupResult =
  | { ok: true; destroyed: string[] }
  | { ok: false; exitCode: ExitCode; error: string };

/**
 * Destroy the provisioned VMs, then forget the infrastructure and kubernetes
 * phases and the vm resources. Templates and the automation user stay.
 */
export async function cleanup(
  config: ClusterConfig,
  opts: { yes?: boolean; signal?: AbortSignal },
  deps: { executor: CommandExecutor; logger: Logger },
): Promise<CleanupResult> {
  if (!opts.yes) {
    return { ok: false, exitCode: EXIT.INVALID_ARGS, error: "cleanup destroys every cluster VM; re-run with --yes to confirm" };
  }

  const tool = await detectTool(deps.executor, config.infrastructure.tool, { signal: opts.signal });
  if (!tool) return { ok: false, exitCode: EXIT.DEPLOY_FAILED, error: "no usable infrastructure tool found" };

  const tf = new Terraform(deps.executor, tool, path.resolve(config.infrastructure.working_dir));
  const host = ProxmoxHost.fromConfig(deps.executor, config);
  deps.logger.warn({ tool }, "destroying cluster infrastructure");
  const res = await tf.destroy(terraformVars({ config, exec: deps.executor, host }), { signal: opts.signal });
  if (res.exitCode !== 0) {
    return { ok: false, exitCode: EXIT.DEPLOY_FAILED, error: `${tool} destroy failed (exit ${res.exitCode})` };
  }

  const state = new StateStore(config.state_file, deps.logger);
  const destroyed = Object.keys(state.resources("vm"));
  for (const id of destroyed) state.removeResource("vm", id);
  state.invalidate("infrastructure");
  state.invalidate("kubernetes");
  deps.logger.info({ vms: destroyed.length }, "infrastructure destroyed; state updated");

  return { ok: true, destroyed };
}
