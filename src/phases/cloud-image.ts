import type { PhaseDefinition } from "../core/phase.js";
import { ensureOk } from "../exec/command-runner.js";
import { VirtCustomize } from "../infra/virt.js";
import { remotePathExists } from "../verifiers/verifiers.js";
import { type PhaseDeps, imagePath, readPublicKey, remotePublicKeyPath, timeoutFor } from "./common.js";

/**
 * Download the cloud image and bake in guest packages, the guest user, its SSH
 * key and passwordless sudo. Work happens on a .partial file that is renamed
 * into place last, so the verifier never sees a half-built image.
 */
export function cloudImagePhase(deps: PhaseDeps): PhaseDefinition {
  const { config, host } = deps;
  const finalPath = imagePath(config);
  const workPath = `${finalPath}.partial`;
  const guestUser = config.image.guest_user;

  return {
    id: "cloud_image",
    title: "Preparing cloud image",
    timeoutSec: timeoutFor(config, "cloud_image"),
    verify: ({ timeoutSec, signal }) => remotePathExists(host, finalPath, "file", { timeoutSec, signal }),
    run: async ({ phase, signal, logStream, logger }) => {
      const opts = { signal, logStream, timeoutSec: 600 };
      const virt = new VirtCustomize(host);

      const sources = [config.image.mirror_url, config.image.url].filter((u): u is string => Boolean(u));
      let downloaded = false;
      for (const url of sources) {
        logger.info({ url }, "downloading cloud image");
        const res = await host.exec(["wget", "-q", "-O", workPath, url], opts);
        if (res.exitCode === 0) {
          downloaded = true;
          break;
        }
        logger.warn({ url, exitCode: res.exitCode }, "download failed");
      }
      if (!downloaded) return { ok: false, error: `could not download image from ${sources.join(" or ")}` };

      logger.info({ packages: config.image.packages }, "installing packages into image");
      ensureOk(await virt.install(workPath, config.image.packages, opts), "virt-customize --install");

      const sysprep = await virt.sysprep(workPath, opts);
      if (sysprep.exitCode !== 0) logger.warn({ exitCode: sysprep.exitCode }, "virt-sysprep failed; continuing");

      ensureOk(
        await virt.runCommand(
          workPath,
          `id -u ${guestUser} >/dev/null 2>&1 || useradd -m -s /bin/bash ${guestUser}; usermod -aG sudo ${guestUser}`,
          opts,
        ),
        `create guest user ${guestUser}`,
      );

      const keyPath = remotePublicKeyPath(config);
      ensureOk(await host.writeFile(keyPath, readPublicKey(config, phase), { ...opts, mode: "0644" }), "upload public key");
      ensureOk(await virt.sshInject(workPath, guestUser, keyPath, opts), "virt-customize --ssh-inject");

      ensureOk(
        await virt.runCommand(
          workPath,
          `echo '${guestUser} ALL=(ALL) NOPASSWD:ALL' > /etc/sudoers.d/${guestUser} && chmod 0440 /etc/sudoers.d/${guestUser}`,
          opts,
        ),
        "configure sudoers",
      );

      ensureOk(await host.exec(["mv", "-f", workPath, finalPath], opts), "move image into place");
      return { ok: true, details: { image_path: finalPath } };
    },
  };
}
