import fs from "node:fs";
import path from "node:path";
import type { PhaseDefinition } from "../core/phase.js";
import { tokenId } from "../infra/pveum.js";
import { localFileExists } from "../verifiers/verifiers.js";
import { type PhaseDeps, detailString, timeoutFor } from "./common.js";

export function renderPackerEnv(opts: { host: string; apiPort: number; tokenId: string; secret: string }): string {
  return [
    "# Packer environment, written by pvekube",
    `export PROXMOX_HOST="${opts.host}:${opts.apiPort}"`,
    `export PROXMOX_USER="${opts.tokenId}"`,
    `export PROXMOX_TOKEN="${opts.secret}"`,
    "",
  ].join("\n");
}

/** Writes the Packer env file (mode 0600) from the automation token. */
export function packerConfigPhase(deps: PhaseDeps): PhaseDefinition {
  const { config } = deps;
  const envFile = config.packer.env_file;

  return {
    id: "packer_config",
    title: "Writing Packer configuration",
    timeoutSec: timeoutFor(config, "packer_config"),
    verify: () => localFileExists(envFile),
    run: async ({ state, logger }) => {
      const secret = detailString(state, "automation_user", "token");
      if (!secret) return { ok: false, error: "no API token recorded; run automation_user first" };
      const id =
        detailString(state, "automation_user", "token_id") ??
        tokenId(config.automation_user.user, config.automation_user.token_name);

      await fs.promises.mkdir(path.dirname(envFile), { recursive: true });
      await fs.promises.writeFile(
        envFile,
        renderPackerEnv({ host: config.proxmox.host, apiPort: config.proxmox.api_port, tokenId: id, secret }),
        { mode: 0o600 },
      );
      await fs.promises.chmod(envFile, 0o600);
      logger.info({ env_file: envFile }, "Packer env file written");

      return { ok: true, details: { env_file: envFile } };
    },
  };
}
