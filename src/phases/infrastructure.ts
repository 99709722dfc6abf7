import fs from "node:fs";
import path from "node:path";
import type { CreatedResource, PhaseDefinition } from "../core/phase.js";
import { retry } from "../core/retry.js";
import { ensureOk } from "../exec/command-runner.js";
import { Qm } from "../infra/qm.js";
import { NODE_COUNTS, Terraform, detectTool, parseStringList, parseVmIds } from "../infra/terraform.js";
import { terraformStateNonEmpty } from "../verifiers/verifiers.js";
import { type PhaseDeps, timeoutFor } from "./common.js";

export function terraformVars(deps: PhaseDeps): Record<string, string | number> {
  const { config } = deps;
  const counts = NODE_COUNTS[config.profile];
  return {
    proxmox_host: config.proxmox.host,
    template_vm_id: config.packer.enabled ? config.packer.golden_vm_id : config.template.vm_id,
    control_plane_count: counts.controlPlanes,
    worker_count: counts.workers,
    bridge: config.proxmox.bridge,
    storage: config.proxmox.storage,
  };
}

/** Provision the cluster VMs with terraform/tofu and wait for each to report an address. */
export function infrastructurePhase(deps: PhaseDeps): PhaseDefinition {
  const { config, exec, host } = deps;
  const infra = config.infrastructure;
  const workingDir = path.resolve(infra.working_dir);

  return {
    id: "infrastructure",
    title: "Provisioning infrastructure",
    timeoutSec: timeoutFor(config, "infrastructure"),
    verify: async ({ timeoutSec, signal }) => {
      const tool = await detectTool(exec, infra.tool, { timeoutSec, signal });
      if (!tool) return false;
      return terraformStateNonEmpty(new Terraform(exec, tool, workingDir), { timeoutSec, signal });
    },
    run: async ({ signal, logStream, logger }) => {
      const opts = { signal, logStream };
      const tool = await detectTool(exec, infra.tool, opts);
      if (!tool) return { ok: false, error: `no usable infrastructure tool (wanted ${infra.tool})` };
      logger.info({ tool, workingDir }, "using infrastructure tool");

      const tf = new Terraform(exec, tool, workingDir);
      const vars = terraformVars(deps);
      ensureOk(await tf.init({ ...opts, timeoutSec: 300 }), `${tool} init`);

      const applied = await retry(
        async (attempt) => {
          const plan = await tf.plan(vars, { ...opts, timeoutSec: 300 });
          if (plan.exitCode !== 0) return { ok: false, error: `${tool} plan failed (exit ${plan.exitCode})` };
          const apply = await tf.apply(infra.parallelism, opts);
          if (apply.exitCode !== 0) return { ok: false, error: `${tool} apply failed on attempt ${attempt} (exit ${apply.exitCode})` };
          return { ok: true, value: attempt };
        },
        {
          attempts: infra.apply_attempts,
          delayMs: infra.retry_delay_sec * 1000,
          signal,
          onRetry: (attempt, error) => logger.warn({ attempt, err: error }, "apply failed; retrying"),
        },
      );
      if (!applied.ok) return { ok: false, error: applied.error };

      const inventory = await tf.outputRaw(infra.inventory_output, opts);
      if (inventory === null) return { ok: false, error: `output ${infra.inventory_output} missing` };
      await fs.promises.mkdir(path.dirname(infra.inventory_path), { recursive: true });
      await fs.promises.writeFile(infra.inventory_path, inventory);
      logger.info({ inventory_path: infra.inventory_path }, "inventory written");

      const vmIds = parseVmIds(await tf.outputJson(infra.vm_ids_output, opts));
      if (vmIds.length === 0) return { ok: false, error: `output ${infra.vm_ids_output} missing or holds no VM ids` };
      const controlPlaneIps = parseStringList(await tf.outputJson(infra.control_plane_output, opts));
      if (controlPlaneIps.length === 0) {
        return { ok: false, error: `output ${infra.control_plane_output} missing or holds no addresses` };
      }

      const qm = new Qm(host);
      const vmIps: Record<string, string> = {};
      const resources: CreatedResource[] = [];
      for (const vmId of vmIds) {
        const ip = await qm.waitForIp(vmId, infra.ip_wait_attempts, infra.ip_wait_delay_sec, { signal, logStream });
        if (!ip) return { ok: false, error: `VM ${vmId} reported no IPv4 address via the guest agent` };
        vmIps[String(vmId)] = ip;
        resources.push({ type: "vm", id: String(vmId), details: { ip } });
        logger.info({ vmId, ip }, "VM is up");
      }

      return {
        ok: true,
        details: { tool, inventory_path: infra.inventory_path, vm_ips: vmIps, control_plane_ips: controlPlaneIps },
        resources,
      };
    },
  };
}
