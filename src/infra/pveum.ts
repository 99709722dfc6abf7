import type { CommandResult } from "../exec/command-runner.js";
import { isRecord, stringField, tryParseJson } from "./json.js";
import type { HostExecOptions, ProxmoxHost } from "./proxmox-host.js";

export type ApiToken = { tokenId: string; secret: string };

/** User ids from `pveum user list --output-format json`. */
export function parseUserList(stdout: string): string[] {
  const parsed = tryParseJson(stdout);
  if (!Array.isArray(parsed)) return [];
  const ids: string[] = [];
  for (const entry of parsed) {
    const id = isRecord(entry) ? stringField(entry, "userid") : undefined;
    if (id) ids.push(id);
  }
  return ids;
}

/** Secret from `pveum user token add ... --output-format json` (the `value` field). */
export function parseTokenAdd(stdout: string, fallbackTokenId: string): ApiToken | null {
  const parsed = tryParseJson(stdout);
  if (!isRecord(parsed)) return null;
  const secret = stringField(parsed, "value");
  if (!secret) return null;
  return { tokenId: stringField(parsed, "full-tokenid") ?? fallbackTokenId, secret };
}

export function tokenId(user: string, tokenName: string): string {
  return `${user}!${tokenName}`;
}

/** Proxmox user, role, ACL and API token management. */
export class Pveum {
  constructor(private readonly host: ProxmoxHost) {}

  async userList(opts?: HostExecOptions): Promise<{ ok: true; users: string[] } | { ok: false; error: string }> {
    const res = await this.host.exec(["pveum", "user", "list", "--output-format", "json"], opts);
    if (res.exitCode !== 0) return { ok: false, error: res.stderr.trim() || `exit ${res.exitCode}` };
    return { ok: true, users: parseUserList(res.stdout) };
  }

  userAdd(user: string, comment: string, opts?: HostExecOptions): Promise<CommandResult> {
    return this.host.exec(["pveum", "user", "add", user, "--comment", comment], opts);
  }

  roleAdd(role: string, privileges: readonly string[], opts?: HostExecOptions): Promise<CommandResult> {
    return this.host.exec(["pveum", "role", "add", role, "--privs", privileges.join(",")], opts);
  }

  roleModify(role: string, privileges: readonly string[], opts?: HostExecOptions): Promise<CommandResult> {
    return this.host.exec(["pveum", "role", "modify", role, "--privs", privileges.join(",")], opts);
  }

  aclModify(path: string, user: string, role: string, opts?: HostExecOptions): Promise<CommandResult> {
    return this.host.exec(["pveum", "acl", "modify", path, "--users", user, "--roles", role], opts);
  }

  tokenRemove(user: string, tokenName: string, opts?: HostExecOptions): Promise<CommandResult> {
    return this.host.exec(["pveum", "user", "token", "remove", user, tokenName], opts);
  }

  async tokenAdd(
    user: string,
    tokenName: string,
    comment: string,
    opts?: HostExecOptions,
  ): Promise<{ ok: true; token: ApiToken } | { ok: false; error: string }> {
    const res = await this.host.exec(
      ["pveum", "user", "token", "add", user, tokenName, "--comment", comment, "--output-format", "json"],
      opts,
    );
    if (res.exitCode !== 0) return { ok: false, error: res.stderr.trim() || `exit ${res.exitCode}` };
    const token = parseTokenAdd(res.stdout, tokenId(user, tokenName));
    if (!token) return { ok: false, error: "token add returned no secret" };
    return { ok: true, token };
  }

  tokenDisablePrivsep(user: string, tokenName: string, opts?: HostExecOptions): Promise<CommandResult> {
    return this.host.exec(["pveum", "user", "token", "modify", user, tokenName, "--privsep", "0"], opts);
  }
}
