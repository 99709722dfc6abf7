import type { Logger } from "pino";
import type { RunSummary } from "../core/phase.js";
import { PhaseRunner, validateSelection } from "../core/phase-runner.js";
import type { CommandExecutor } from "../exec/command-runner.js";
import { ProxmoxHost } from "../infra/proxmox-host.js";
import { buildPhases } from "../phases/index.js";
import { type PreflightReport, runPreflight } from "../phases/preflight.js";
import { StateStore } from "../state/state-store.js";
import type { ClusterConfig, ClusterProfile } from "../types/config.js";
import { EXIT, type ExitCode } from "./exit-codes.js";

export type DeployOptions = {
  profile?: ClusterProfile;
  forceRebuild?: boolean;
  skipPhases?: string[];
  resumeFrom?: string;
  until?: string;
  dryRun?: boolean;
  validateOnly?: boolean;
  signal?: AbortSignal;
};

export type DeployDeps = {
  executor: CommandExecutor;
  logger: Logger;
};

export type DeployResult =
  | { ok: true; summary?: RunSummary; preflight?: PreflightReport }
  | { ok: false; exitCode: ExitCode; error: string; summary?: RunSummary; preflight?: PreflightReport };

/**
 * Deploy — build the phase list for the profile and drive it through the
 * Phase Runner. With validateOnly, only the preflight checks run.
 */
export async function deploy(baseConfig: ClusterConfig, opts: DeployOptions, deps: DeployDeps): Promise<DeployResult> {
  const config: ClusterConfig = opts.profile ? { ...baseConfig, profile: opts.profile } : baseConfig;
  const host = ProxmoxHost.fromConfig(deps.executor, config);
  const phaseDeps = { config, exec: deps.executor, host, force: opts.forceRebuild };

  if (opts.validateOnly) {
    const preflight = await runPreflight(phaseDeps, { signal: opts.signal, logger: deps.logger });
    if (preflight.ok) return { ok: true, preflight };
    return { ok: false, exitCode: EXIT.VALIDATION_FAILED, error: "environment validation failed", preflight };
  }

  const phases = buildPhases(phaseDeps);
  const runOpts = {
    force: opts.forceRebuild,
    skip: opts.skipPhases,
    resumeFrom: opts.resumeFrom,
    until: opts.until,
    dryRun: opts.dryRun,
    signal: opts.signal,
  };
  const invalid = validateSelection(phases, runOpts);
  if (invalid) return { ok: false, exitCode: EXIT.INVALID_ARGS, error: invalid };

  deps.logger.info(
    { profile: config.profile, host: config.proxmox.host, state_file: config.state_file, dryRun: Boolean(opts.dryRun) },
    "starting deployment",
  );

  const state = new StateStore(config.state_file, deps.logger);
  const runner = new PhaseRunner({
    state,
    logger: deps.logger,
    logDir: config.log_dir,
    verifyTimeoutSec: config.verify_timeout_sec,
  });
  const summary = await runner.runPhases(phases, runOpts);

  if (summary.success) return { ok: true, summary };
  if (summary.interrupted) {
    return { ok: false, exitCode: EXIT.INTERRUPTED, error: "interrupted", summary };
  }
  const failed = summary.outcomes.find((o) => o.status === "failed");
  return {
    ok: false,
    exitCode: EXIT.DEPLOY_FAILED,
    error: `phase ${summary.failedPhase ?? "unknown"} failed${failed?.error ? `: ${failed.error}` : ""}`,
    summary,
  };
}
