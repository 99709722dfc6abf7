#!/usr/bin/env node

import { Command, Option } from "commander";
import type { LevelWithSilent } from "pino";
import { cleanup } from "./commands/cleanup.js";
import { type ConfigSource, loadClusterConfig } from "./commands/context.js";
import { deploy } from "./commands/deploy.js";
import { EXIT } from "./commands/exit-codes.js";
import { renderPreflight, renderSummary, formatTable } from "./commands/render.js";
import { reset } from "./commands/reset.js";
import { status } from "./commands/status.js";
import { validateEnvironment } from "./commands/validate.js";
import { ProcessRunner } from "./exec/command-runner.js";
import { createLogger, LOG_LEVELS, type OutputFormat } from "./logging/logger.js";
import type { ClusterProfile } from "./types/config.js";

type CommonOpts = ConfigSource & {
  format: OutputFormat;
  logLevel: LevelWithSilent;
};

const PROFILES: ClusterProfile[] = ["single-node", "single-master", "ha-cluster"];

function withCommonOptions(cmd: Command): Command {
  return cmd
    .option("--env <name>", "Environment overlay (config/<name>.yaml)")
    .option("--config <file>", "Extra config file merged above the environment overlay")
    .option("--config-dir <dir>", "Directory holding base.yaml and environment overlays")
    .addOption(new Option("--format <format>", "Output format").choices(["human", "jsonl"]).default("human"))
    .addOption(new Option("--log-level <level>", "Log level").choices([...LOG_LEVELS]).default("info"));
}

function emit(format: OutputFormat, human: string[], rows: object[]): void {
  if (format === "jsonl") {
    for (const row of rows) process.stdout.write(JSON.stringify(row) + "\n");
  } else {
    for (const line of human) console.log(line);
  }
}

function fail(format: OutputFormat, error: string, exitCode: number): never {
  if (format === "jsonl") {
    process.stdout.write(JSON.stringify({ ok: false, error }) + "\n");
  } else {
    console.error(error);
  }
  process.exit(exitCode);
}

/** First SIGINT/SIGTERM aborts the running phase; the runner then stops the sequence. */
function interruptSignal(): AbortSignal {
  const controller = new AbortController();
  const onSignal = (sig: NodeJS.Signals) => {
    if (controller.signal.aborted) return;
    process.stderr.write(`\nreceived ${sig}; aborting current phase\n`);
    controller.abort();
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);
  return controller.signal;
}

function splitList(values: string[] | undefined): string[] | undefined {
  return values?.flatMap((v) => v.split(",")).map((v) => v.trim()).filter((v) => v.length > 0);
}

const program = new Command();

program
  .name("pvekube")
  .description("Phase-tracked Kubernetes bring-up on Proxmox VE")
  .version("0.1.0");

withCommonOptions(
  program
    .command("deploy")
    .description("Run every deployment phase that is not already complete and verified")
    .addOption(new Option("--profile <profile>", "Cluster profile").choices(PROFILES))
    .option("--force-rebuild", "Reset state and re-run every phase")
    .option("--skip-phases <phases...>", "Phase ids or globs to leave out")
    .option("--resume-from <phase>", "Start at this phase")
    .option("--until <phase>", "Stop after this phase (inclusive)")
    .option("--dry-run", "Show what would run without changing anything")
    .option("--validate-only", "Run preflight checks only"),
).action(
  async (
    opts: CommonOpts & {
      profile?: ClusterProfile;
      forceRebuild?: boolean;
      skipPhases?: string[];
      resumeFrom?: string;
      until?: string;
      dryRun?: boolean;
      validateOnly?: boolean;
    },
  ) => {
    const loaded = loadClusterConfig(opts);
    if (!loaded.ok) fail(opts.format, loaded.error, loaded.exitCode);

    const logger = createLogger({ format: opts.format, level: opts.logLevel });
    const res = await deploy(
      loaded.config,
      {
        profile: opts.profile,
        forceRebuild: opts.forceRebuild,
        skipPhases: splitList(opts.skipPhases),
        resumeFrom: opts.resumeFrom,
        until: opts.until,
        dryRun: opts.dryRun,
        validateOnly: opts.validateOnly,
        signal: interruptSignal(),
      },
      { executor: new ProcessRunner(), logger },
    );

    if (res.summary) emit(opts.format, renderSummary(res.summary), res.summary.outcomes);
    if (res.preflight) emit(opts.format, renderPreflight(res.preflight), res.preflight.checks);
    if (!res.ok) fail(opts.format, res.error, res.exitCode);
  },
);

withCommonOptions(
  program.command("status").description("Show recorded phases and resources from the state file"),
).action((opts: CommonOpts) => {
  const loaded = loadClusterConfig(opts);
  if (!loaded.ok) fail(opts.format, loaded.error, loaded.exitCode);

  const res = status(loaded.config.state_file);
  if (opts.format === "jsonl") {
    emit(opts.format, [], [
      ...res.phases.map((p) => ({ kind: "phase", ...p })),
      ...res.resources.map((r) => ({ kind: "resource", ...r })),
    ]);
    return;
  }

  console.log(`State file: ${res.stateFile} (updated ${res.lastUpdated})`);
  for (const line of formatTable(["PHASE", "STATUS", "TIMESTAMP"], res.phases.map((p) => [p.phase, p.status, p.timestamp ?? "-"]))) {
    console.log(line);
  }
  if (res.resources.length > 0) {
    console.log("");
    for (const line of formatTable(["TYPE", "ID", "CREATED"], res.resources.map((r) => [r.type, r.id, r.created]))) {
      console.log(line);
    }
  }
});

withCommonOptions(
  program.command("reset").description("Forget all recorded phases and resources"),
).action((opts: CommonOpts) => {
  const loaded = loadClusterConfig(opts);
  if (!loaded.ok) fail(opts.format, loaded.error, loaded.exitCode);

  const res = reset(loaded.config.state_file, createLogger({ format: opts.format, level: opts.logLevel }));
  emit(opts.format, [`State reset: ${res.stateFile}`], [res]);
});

withCommonOptions(
  program
    .command("cleanup")
    .description("Destroy the cluster VMs and forget the infrastructure and kubernetes phases")
    .option("--yes", "Confirm destruction"),
).action(async (opts: CommonOpts & { yes?: boolean }) => {
  const loaded = loadClusterConfig(opts);
  if (!loaded.ok) fail(opts.format, loaded.error, loaded.exitCode);

  const logger = createLogger({ format: opts.format, level: opts.logLevel });
  const res = await cleanup(
    loaded.config,
    { yes: opts.yes, signal: interruptSignal() },
    { executor: new ProcessRunner(), logger },
  );
  if (!res.ok) fail(opts.format, res.error, res.exitCode);
  emit(opts.format, [`Destroyed ${res.destroyed.length} VMs.`], [res]);
});

withCommonOptions(
  program.command("validate").description("Run preflight checks against the Proxmox host"),
).action(async (opts: CommonOpts) => {
  const loaded = loadClusterConfig(opts);
  if (!loaded.ok) fail(opts.format, loaded.error, loaded.exitCode);

  const logger = createLogger({ format: opts.format, level: opts.logLevel });
  const res = await validateEnvironment(loaded.config, { executor: new ProcessRunner(), logger, signal: interruptSignal() });
  emit(opts.format, renderPreflight(res.report), res.report.checks);
  if (!res.ok) process.exit(EXIT.VALIDATION_FAILED);
});

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(1);
});
