import type { PhaseDefinition } from "../core/phase.js";
import { ensureOk } from "../exec/command-runner.js";
import { Rbd, rbdDevice } from "../infra/rbd.js";
import { remotePathExists } from "../verifiers/verifiers.js";
import { type PhaseDeps, imagesDir, isoDir, timeoutFor } from "./common.js";

/** libguestfs tools plus an RBD-backed filesystem for images and ISOs. */
export function toolsStoragePhase(deps: PhaseDeps): PhaseDefinition {
  const { config, host } = deps;
  const { rbd_pool: pool, rbd_image: image, size, mount_point: mountPoint } = config.storage;

  return {
    id: "tools_storage",
    title: "Installing tools and preparing image storage",
    timeoutSec: timeoutFor(config, "tools_storage"),
    verify: ({ timeoutSec, signal }) => remotePathExists(host, imagesDir(config), "dir", { timeoutSec, signal }),
    run: async ({ signal, logStream, logger }) => {
      const opts = { signal, logStream, timeoutSec: 120 };
      const rbd = new Rbd(host);

      logger.info("installing libguestfs-tools");
      ensureOk(
        await host.shell("DEBIAN_FRONTEND=noninteractive apt-get update && DEBIAN_FRONTEND=noninteractive apt-get install -y libguestfs-tools", {
          ...opts,
          timeoutSec: 300,
        }),
        "install libguestfs-tools",
      );

      const images = await rbd.list(pool, opts);
      if (!images.ok) return { ok: false, error: `cannot list pool ${pool}: ${images.error}` };
      if (!images.images.includes(image)) {
        logger.info({ pool, image, size }, "creating RBD volume");
        ensureOk(await rbd.create(pool, image, size, opts), `rbd create ${pool}/${image}`);
      }

      const device = rbdDevice(pool, image);
      const mapped = await host.exec(["test", "-b", device], opts);
      if (mapped.exitCode !== 0) {
        ensureOk(await rbd.map(pool, image, opts), `rbd map ${pool}/${image}`);
      }

      const fsType = await rbd.fsType(device, opts);
      if (fsType === null) {
        logger.info({ device }, "formatting volume as ext4");
        ensureOk(await rbd.mkfsExt4(device, { ...opts, timeoutSec: 300 }), `mkfs.ext4 ${device}`);
      } else if (fsType !== "ext4") {
        return { ok: false, error: `${device} already holds a ${fsType} filesystem; refusing to format` };
      }

      ensureOk(await rbd.mkdirs([mountPoint], opts), `mkdir ${mountPoint}`);
      if (!(await rbd.isMounted(mountPoint, opts))) {
        ensureOk(await rbd.mount(device, mountPoint, opts), `mount ${device}`);
      }

      ensureOk(await rbd.mkdirs([isoDir(config), imagesDir(config)], opts), "create template directories");
      ensureOk(await rbd.chown("root:www-data", mountPoint, opts), `chown ${mountPoint}`);
      ensureOk(await host.exec(["chmod", "-R", "755", mountPoint], opts), `chmod ${mountPoint}`);

      return { ok: true, details: { mount_point: mountPoint } };
    },
  };
}
