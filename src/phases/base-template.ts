import type { PhaseDefinition } from "../core/phase.js";
import { ensureOk } from "../exec/command-runner.js";
import { Qm } from "../infra/qm.js";
import { templateExists } from "../verifiers/verifiers.js";
import { type PhaseDeps, imagePath, readPublicKey, remotePublicKeyPath, timeoutFor } from "./common.js";

/** Disk id from `qm importdisk` output, e.g. "unused0:rbd:vm-9000-disk-1" → "rbd:vm-9000-disk-1". */
export function parseImportedDisk(stdout: string): string | null {
  const m = /unused\d+:([^'"\s]+)/.exec(stdout);
  return m ? m[1] : null;
}

export function baseTemplatePhase(deps: PhaseDeps): PhaseDefinition {
  const { config, host } = deps;
  const { vm_id: vmId, name, memory_mb: memory, cores, disk_size: diskSize } = config.template;
  const storage = config.proxmox.storage;

  return {
    id: "base_template",
    title: "Creating base VM template",
    timeoutSec: timeoutFor(config, "base_template"),
    verify: ({ timeoutSec, signal }) => templateExists(host, vmId, { requireTemplate: true, timeoutSec, signal }),
    run: async ({ phase, signal, logStream, logger }) => {
      const opts = { signal, logStream, timeoutSec: 120 };
      const qm = new Qm(host);

      if (await qm.isInUse(vmId, opts)) {
        if (!deps.force) {
          return { ok: false, error: `VM ${vmId} is in use (running or has linked clones); use --force-rebuild to replace it` };
        }
        logger.warn({ vmId }, "VM in use; replacing because of --force-rebuild");
      }

      if (await qm.exists(vmId, opts)) {
        logger.info({ vmId }, "removing existing VM");
        await qm.stop(vmId, opts);
        ensureOk(await qm.destroy(vmId, opts), `qm destroy ${vmId}`);
      }

      ensureOk(
        await qm.create(
          vmId,
          [
            "--name", name,
            "--memory", String(memory),
            "--cores", String(cores),
            "--net0", `virtio,bridge=${config.proxmox.bridge}`,
            "--scsihw", "virtio-scsi-pci",
            "--ostype", "l26",
            "--cpu", "host",
            "--agent", "enabled=1",
            "--machine", "q35",
            "--bios", "ovmf",
          ],
          opts,
        ),
        `qm create ${vmId}`,
      );
      ensureOk(await qm.set(vmId, ["--efidisk0", `${storage}:1,efitype=4m,pre-enrolled-keys=0`], opts), "add EFI disk");

      logger.info({ vmId, image: imagePath(config) }, "importing disk");
      const imported = ensureOk(await qm.importDisk(vmId, imagePath(config), storage, { ...opts, timeoutSec: 600 }), "qm importdisk");
      const disk = parseImportedDisk(imported.stdout) ?? `${storage}:vm-${vmId}-disk-1`;

      ensureOk(await qm.set(vmId, ["--scsi0", disk], opts), "attach imported disk");
      ensureOk(await qm.set(vmId, ["--boot", "order=scsi0"], opts), "set boot order");
      ensureOk(await qm.set(vmId, ["--ide2", `${storage}:cloudinit`], opts), "add cloud-init drive");

      const keyPath = remotePublicKeyPath(config);
      ensureOk(await host.writeFile(keyPath, readPublicKey(config, phase), { ...opts, mode: "0644" }), "upload public key");
      ensureOk(
        await qm.set(vmId, ["--ciuser", config.image.guest_user, "--sshkeys", keyPath, "--ipconfig0", "ip=dhcp"], opts),
        "configure cloud-init",
      );

      const resized = await qm.resize(vmId, "scsi0", diskSize, opts);
      if (resized.exitCode !== 0) logger.warn({ vmId, diskSize }, "disk resize failed; keeping imported size");

      ensureOk(await qm.template(vmId, opts), `qm template ${vmId}`);

      return {
        ok: true,
        details: { vm_id: vmId, name },
        resources: [{ type: "template", id: String(vmId), details: { name } }],
      };
    },
  };
}
