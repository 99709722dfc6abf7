import fs from "node:fs";
import path from "node:path";
import type { PhaseDefinition } from "../core/phase.js";
import { ensureOk } from "../exec/command-runner.js";
import { ansiblePlaybookArgv, scpFromArgv } from "../infra/local-tools.js";
import { kubeApiReady } from "../verifiers/verifiers.js";
import { type PhaseDeps, detailStringList, timeoutFor } from "./common.js";

export function bootstrapArgv(deps: PhaseDeps): { argv: string[]; cwd: string } {
  const { config } = deps;
  const k8s = config.kubernetes;
  const inventory = path.resolve(config.infrastructure.inventory_path);
  const common = {
    inventory,
    user: k8s.remote_user,
    privateKey: config.ssh.private_key_path,
  };

  if (k8s.bootstrap === "kubespray") {
    return {
      argv: ansiblePlaybookArgv({ ...common, playbook: "cluster.yml", become: true, extraVars: { kube_version: `v${k8s.version}` } }),
      cwd: path.resolve(k8s.kubespray_dir),
    };
  }
  const playbook = path.resolve(k8s.playbook);
  return {
    argv: ansiblePlaybookArgv({ ...common, playbook, extraVars: { kubernetes_version: k8s.version } }),
    cwd: path.dirname(playbook),
  };
}

/** Bootstrap Kubernetes with Ansible, then fetch the admin kubeconfig. */
export function kubernetesPhase(deps: PhaseDeps): PhaseDefinition {
  const { config, exec } = deps;
  const k8s = config.kubernetes;

  return {
    id: "kubernetes",
    title: `Bootstrapping Kubernetes ${k8s.version} (${k8s.bootstrap})`,
    timeoutSec: timeoutFor(config, "kubernetes"),
    verify: ({ timeoutSec, signal }) => kubeApiReady(exec, k8s.kubeconfig_path, { timeoutSec, signal }),
    run: async ({ signal, logStream, state, logger }) => {
      const controlPlanes = detailStringList(state, "infrastructure", "control_plane_ips");
      if (controlPlanes.length === 0) {
        return { ok: false, error: "no control plane address recorded; run infrastructure first" };
      }

      const { argv, cwd } = bootstrapArgv(deps);
      logger.info({ method: k8s.bootstrap, cwd }, "running ansible-playbook");
      ensureOk(
        await exec.run(argv, { cwd, signal, logStream, env: { ANSIBLE_HOST_KEY_CHECKING: "False", ANSIBLE_FORCE_COLOR: "0" } }),
        "ansible-playbook",
      );

      await fs.promises.mkdir(path.dirname(k8s.kubeconfig_path), { recursive: true });
      ensureOk(
        await exec.run(
          scpFromArgv({
            user: k8s.remote_user,
            host: controlPlanes[0],
            remotePath: k8s.remote_kubeconfig,
            localPath: k8s.kubeconfig_path,
            identityFile: config.ssh.private_key_path,
            connectTimeoutSec: config.ssh.connect_timeout_sec,
          }),
          { signal, logStream, timeoutSec: 60 },
        ),
        "fetch kubeconfig",
      );
      await fs.promises.chmod(k8s.kubeconfig_path, 0o600);
      logger.info({ kubeconfig: k8s.kubeconfig_path }, "kubeconfig installed");

      return { ok: true, details: { kubeconfig: k8s.kubeconfig_path, method: k8s.bootstrap } };
    },
  };
}
