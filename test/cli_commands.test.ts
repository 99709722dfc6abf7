import { describe, expect, it, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { cleanup } from "../src/commands/cleanup.js";
import { deploy } from "../src/commands/deploy.js";
import { EXIT } from "../src/commands/exit-codes.js";
import { formatDuration, formatTable, renderPreflight, renderSummary } from "../src/commands/render.js";
import { reset } from "../src/commands/reset.js";
import { status } from "../src/commands/status.js";
import { validateEnvironment } from "../src/commands/validate.js";
import { silentLogger } from "../src/logging/logger.js";
import { StateStore } from "../src/state/state-store.js";
import type { ClusterConfig } from "../src/types/config.js";
import { FakeExecutor, type Responder } from "./fake-executor.js";
import { makeHome, testConfig } from "./helpers.js";

const healthy: Responder = (argv) => {
  if (argv[0] === "echo") return { stdout: "ok\n" };
  if (argv[0] === "free") return { stdout: "Mem: 16000000000 1 1 1 1 12000000000\n" };
  if (argv[0] === "pvesm") return { stdout: "rbd rbd active 1000000000 200000000 800000000 20.00%\n" };
  return {};
};

describe("exit codes", () => {
  it("maps outcomes to process exit codes", () => {
    expect(EXIT.SUCCESS).toBe(0);
    expect(EXIT.DEPLOY_FAILED).toBe(1);
    expect(EXIT.VALIDATION_FAILED).toBe(1);
    expect(EXIT.INVALID_ARGS).toBe(2);
    expect(EXIT.INTERRUPTED).toBe(130);
  });
});

describe("commands", () => {
  let home: string;
  let config: ClusterConfig;

  beforeEach(() => {
    home = makeHome();
    config = testConfig(home);
  });

  afterEach(() => {
    fs.rmSync(home, { recursive: true, force: true });
  });

  describe("status", () => {
    it("lists known phases in order, then extra phases and resources", () => {
      const store = new StateStore(config.state_file);
      store.markComplete("validation");
      store.markComplete("custom_step");
      store.markResourceCreated("template", "9000");
      const doc = store.snapshot();

      const res = status(config.state_file);
      expect(res.phases.map((p) => p.phase)).toEqual([
        "validation", "tools_storage", "automation_user", "cloud_image", "base_template", "packer_config",
        "golden_image", "infrastructure", "kubernetes", "custom_step",
      ]);
      expect(res.phases[0]).toEqual({ phase: "validation", status: "COMPLETED", timestamp: doc.phases.validation.timestamp });
      expect(res.phases[1]).toEqual({ phase: "tools_storage", status: "pending", timestamp: null });
      expect(res.resources).toEqual([{ type: "template", id: "9000", created: doc.resources.template["9000"].created }]);
    });

    it("reads a missing state file as all pending without creating it", () => {
      const res = status(config.state_file);
      expect(res.phases.every((p) => p.status === "pending")).toBe(true);
      expect(fs.existsSync(config.state_file)).toBe(false);
    });
  });

  describe("reset", () => {
    it("empties the state document", () => {
      const store = new StateStore(config.state_file);
      store.markComplete("validation");
      store.markResourceCreated("vm", "101");

      expect(reset(config.state_file, silentLogger())).toEqual({ ok: true, stateFile: config.state_file });
      const doc = new StateStore(config.state_file).snapshot();
      expect(doc.phases).toEqual({});
      expect(doc.resources).toEqual({});
    });
  });

  describe("cleanup", () => {
    it("refuses without confirmation", async () => {
      const exec = new FakeExecutor();
      const res = await cleanup(config, {}, { executor: exec, logger: silentLogger() });
      expect(res).toEqual({
        ok: false,
        exitCode: EXIT.INVALID_ARGS,
        error: "cleanup destroys every cluster VM; re-run with --yes to confirm",
      });
      expect(exec.calls).toHaveLength(0);
    });

    it("destroys VMs and forgets infrastructure and kubernetes", async () => {
      const store = new StateStore(config.state_file);
      for (const phase of ["validation", "infrastructure", "kubernetes"]) store.markComplete(phase);
      store.markResourceCreated("vm", "101");
      store.markResourceCreated("vm", "111");
      store.markResourceCreated("template", "9000");

      const exec = new FakeExecutor();
      const res = await cleanup(config, { yes: true }, { executor: exec, logger: silentLogger() });
      expect(res).toEqual({ ok: true, destroyed: ["101", "111"] });

      const destroy = exec.calls[1];
      expect(destroy.argv.slice(0, 4)).toEqual(["tofu", "destroy", "-input=false", "-auto-approve"]);
      expect(destroy.argv).toContain("control_plane_count=3");
      expect(destroy.opts.cwd).toBe(path.resolve("terraform"));

      const after = new StateStore(config.state_file);
      expect(after.isComplete("validation")).toBe(true);
      expect(after.isComplete("infrastructure")).toBe(false);
      expect(after.isComplete("kubernetes")).toBe(false);
      expect(after.resources("vm")).toEqual({});
      expect(Object.keys(after.resources("template"))).toEqual(["9000"]);
    });

    it("leaves state alone when destroy fails", async () => {
      new StateStore(config.state_file).markComplete("infrastructure");
      const exec = new FakeExecutor((argv) => (argv[1] === "destroy" ? { exitCode: 1 } : {}));
      const res = await cleanup(config, { yes: true }, { executor: exec, logger: silentLogger() });
      expect(res).toEqual({ ok: false, exitCode: EXIT.DEPLOY_FAILED, error: "tofu destroy failed (exit 1)" });
      expect(new StateStore(config.state_file).isComplete("infrastructure")).toBe(true);
    });
  });

  describe("deploy", () => {
    const logger = silentLogger();

    it("rejects an unknown phase name", async () => {
      const res = await deploy(config, { skipPhases: ["nope"] }, { executor: new FakeExecutor(), logger });
      expect(res).toMatchObject({ ok: false, exitCode: EXIT.INVALID_ARGS });
      if (!res.ok) expect(res.error.startsWith("Unknown phase in skip list: nope")).toBe(true);
    });

    it("plans every phase on a dry run without touching state", async () => {
      const exec = new FakeExecutor(healthy);
      const res = await deploy(config, { dryRun: true }, { executor: exec, logger });
      expect(res.ok).toBe(true);
      expect(res.summary?.outcomes.every((o) => o.status === "planned")).toBe(true);
      expect(exec.calls).toHaveLength(0);
      expect(fs.existsSync(config.state_file)).toBe(false);
    });

    it("runs up to the requested phase and records it", async () => {
      const res = await deploy(config, { until: "validation" }, { executor: new FakeExecutor(healthy), logger });
      expect(res.ok).toBe(true);
      expect(res.summary?.outcomes.map((o) => `${o.phase}:${o.status}`)).toEqual([
        "validation:completed",
        "tools_storage:excluded",
        "automation_user:excluded",
        "cloud_image:excluded",
        "base_template:excluded",
        "packer_config:excluded",
        "infrastructure:excluded",
        "kubernetes:excluded",
      ]);
      expect(new StateStore(config.state_file).isComplete("validation")).toBe(true);
      expect(fs.existsSync(path.join(config.log_dir, "validation.log"))).toBe(true);
    });

    it("reports the failing phase and its error", async () => {
      const exec = new FakeExecutor((argv, opts) => (argv[0] === "sh" ? { exitCode: 100, stderr: "boom" } : healthy(argv, opts)));
      const res = await deploy(config, { until: "tools_storage" }, { executor: exec, logger });
      expect(res).toMatchObject({
        ok: false,
        exitCode: EXIT.DEPLOY_FAILED,
        error: "phase tools_storage failed: install libguestfs-tools failed (exit 100): boom",
      });
      const state = new StateStore(config.state_file);
      expect(state.isComplete("validation")).toBe(true);
      expect(state.isComplete("tools_storage")).toBe(false);
    });

    it("maps an interrupt to exit 130", async () => {
      const controller = new AbortController();
      controller.abort();
      const res = await deploy(config, { signal: controller.signal }, { executor: new FakeExecutor(healthy), logger });
      expect(res).toMatchObject({ ok: false, exitCode: EXIT.INTERRUPTED, error: "interrupted" });
    });

    it("runs only preflight with validateOnly", async () => {
      const exec = new FakeExecutor(healthy);
      const res = await deploy(config, { validateOnly: true }, { executor: exec, logger });
      expect(res.ok).toBe(true);
      expect(res.preflight?.checks).toHaveLength(9);
      expect(res.summary).toBeUndefined();
      expect(fs.existsSync(config.state_file)).toBe(false);
    });
  });

  describe("validate", () => {
    it("fails when ssh is unreachable", async () => {
      const exec = new FakeExecutor((argv, opts) =>
        opts.target ? { exitCode: 255, stderr: "ssh: connect to host 192.0.2.10 port 22: No route to host" } : healthy(argv, opts),
      );
      const res = await validateEnvironment(config, { executor: exec, logger: silentLogger() });
      expect(res.ok).toBe(false);
      expect(res.report.checks[0]).toEqual({
        name: "ssh",
        ok: false,
        severity: "error",
        message: "cannot reach 192.0.2.10 over ssh: ssh: connect to host 192.0.2.10 port 22: No route to host",
      });
    });
  });
});

describe("rendering", () => {
  it("formats durations", () => {
    expect(formatDuration(250)).toBe("250ms");
    expect(formatDuration(4200)).toBe("4s");
    expect(formatDuration(125_000)).toBe("2m05s");
  });

  it("pads every column but the last", () => {
    expect(formatTable(["A", "BB"], [["long", "x"]])).toEqual(["A     BB", "long  x"]);
  });

  it("renders a run summary", () => {
    expect(
      renderSummary({
        success: false,
        failedPhase: "cloud_image",
        outcomes: [
          { phase: "validation", status: "skipped", durationMs: 12 },
          { phase: "cloud_image", status: "failed", durationMs: 61_000, error: "wget failed" },
        ],
      }),
    ).toEqual([
      "PHASE        OUTCOME  DURATION",
      "validation   skipped  12ms",
      "cloud_image  failed   1m01s",
      "Deployment failed at cloud_image.",
    ]);
  });

  it("renders a preflight report", () => {
    expect(
      renderPreflight({
        ok: true,
        checks: [
          { name: "ssh", ok: true, severity: "error", message: "connected" },
          { name: "memory", ok: false, severity: "warning", message: "low" },
        ],
      }),
    ).toEqual(["CHECK   RESULT  MESSAGE", "ssh     pass    connected", "memory  warn    low", "Environment OK."]);
  });
});
