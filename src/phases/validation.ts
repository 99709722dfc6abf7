import type { PhaseDefinition } from "../core/phase.js";
import { allOf, localFileExists } from "../verifiers/verifiers.js";
import { type PhaseDeps, timeoutFor } from "./common.js";
import { runPreflight } from "./preflight.js";

export function validationPhase(deps: PhaseDeps): PhaseDefinition {
  const { config, host } = deps;
  return {
    id: "validation",
    title: "Validating environment",
    timeoutSec: timeoutFor(config, "validation"),
    verify: ({ timeoutSec, signal }) =>
      allOf(
        async () => (await host.exec(["echo", "ok"], { timeoutSec, signal })).exitCode === 0,
        () => localFileExists(config.ssh.private_key_path),
        () => localFileExists(config.ssh.public_key_path),
      )(),
    run: async ({ signal, logStream, logger }) => {
      const report = await runPreflight(deps, { signal, logStream, logger });
      if (!report.ok) {
        const failed = report.checks.filter((c) => !c.ok && c.severity === "error").map((c) => c.name);
        return { ok: false, error: `preflight failed: ${failed.join(", ")}` };
      }
      return { ok: true };
    },
  };
}
