import type { PhaseDefinition } from "../core/phase.js";
import { ensureOk } from "../exec/command-runner.js";
import { Pveum, tokenId } from "../infra/pveum.js";
import { tokenAuthenticates, userExists } from "../verifiers/verifiers.js";
import { type PhaseDeps, detailString, timeoutFor } from "./common.js";

/**
 * Automation user with a role, an ACL on "/", and a fresh API token with
 * privilege separation off. The token secret is kept in the phase details.
 */
export function automationUserPhase(deps: PhaseDeps): PhaseDefinition {
  const { config, exec, host } = deps;
  const { user, role, token_name: tokenName, privileges } = config.automation_user;

  return {
    id: "automation_user",
    title: "Configuring automation user and API token",
    timeoutSec: timeoutFor(config, "automation_user"),
    verify: async ({ timeoutSec, signal, state }) => {
      const secret = detailString(state, "automation_user", "token");
      const id = detailString(state, "automation_user", "token_id") ?? tokenId(user, tokenName);
      if (!secret) return false;
      if (!(await userExists(host, user, { timeoutSec, signal }))) return false;
      return tokenAuthenticates(exec, config.proxmox.host, config.proxmox.api_port, id, secret, { timeoutSec, signal });
    },
    run: async ({ signal, logStream, logger }) => {
      const opts = { signal, logStream, timeoutSec: 60 };
      const pveum = new Pveum(host);

      const users = await pveum.userList(opts);
      if (!users.ok) return { ok: false, error: `cannot list users: ${users.error}` };
      if (users.users.includes(user)) {
        logger.info({ user }, "user exists; updating permissions");
      } else {
        logger.info({ user }, "creating user");
        ensureOk(await pveum.userAdd(user, "pvekube automation user", opts), `pveum user add ${user}`);
      }

      const added = await pveum.roleAdd(role, privileges, opts);
      if (added.exitCode !== 0) {
        ensureOk(await pveum.roleModify(role, privileges, opts), `pveum role modify ${role}`);
      }
      ensureOk(await pveum.aclModify("/", user, role, opts), `pveum acl modify / ${user}`);

      // a token secret is only shown once, so always mint a new one
      await pveum.tokenRemove(user, tokenName, opts);
      const token = await pveum.tokenAdd(user, tokenName, "pvekube automation token", opts);
      if (!token.ok) return { ok: false, error: `token creation failed: ${token.error}` };
      ensureOk(await pveum.tokenDisablePrivsep(user, tokenName, opts), "disable token privilege separation");

      logger.info({ token_id: token.token.tokenId }, "API token created");
      return { ok: true, details: { token_id: token.token.tokenId, token: token.token.secret } };
    },
  };
}
