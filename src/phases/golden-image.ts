import path from "node:path";
import type { PhaseDefinition } from "../core/phase.js";
import { ensureOk } from "../exec/command-runner.js";
import { Packer } from "../infra/local-tools.js";
import { tokenId } from "../infra/pveum.js";
import { templateExists } from "../verifiers/verifiers.js";
import { type PhaseDeps, detailString, timeoutFor } from "./common.js";

/** Optional Packer build of a Kubernetes-ready template cloned from the base template. */
export function goldenImagePhase(deps: PhaseDeps): PhaseDefinition {
  const { config, exec, host } = deps;
  const goldenId = config.packer.golden_vm_id;

  return {
    id: "golden_image",
    title: "Building golden image with Packer",
    timeoutSec: timeoutFor(config, "golden_image"),
    verify: ({ timeoutSec, signal }) => templateExists(host, goldenId, { requireTemplate: true, timeoutSec, signal }),
    run: async ({ signal, logStream, state, logger }) => {
      const secret = detailString(state, "automation_user", "token");
      if (!secret) return { ok: false, error: "no API token recorded; run automation_user first" };
      const id =
        detailString(state, "automation_user", "token_id") ??
        tokenId(config.automation_user.user, config.automation_user.token_name);

      const packer = new Packer(exec, path.resolve(config.packer.working_dir));
      const template = config.packer.template;
      const env = {
        PKR_VAR_proxmox_url: `https://${config.proxmox.host}:${config.proxmox.api_port}/api2/json`,
        PKR_VAR_proxmox_token_id: id,
        PKR_VAR_proxmox_token: secret,
        PKR_VAR_base_template_id: String(config.template.vm_id),
        PKR_VAR_vm_id: String(goldenId),
        PKR_VAR_kubernetes_version: config.kubernetes.version,
      };
      const opts = { signal, logStream, env };

      ensureOk(await packer.init(template, { ...opts, timeoutSec: 300 }), "packer init");
      ensureOk(await packer.validate(template, { ...opts, timeoutSec: 120 }), "packer validate");
      logger.info({ template, vmId: goldenId }, "packer build started");
      ensureOk(await packer.build(template, opts), "packer build");

      return {
        ok: true,
        details: { vm_id: goldenId },
        resources: [{ type: "template", id: String(goldenId), details: { name: path.basename(template, ".pkr.hcl") } }],
      };
    },
  };
}
