import { describe, expect, it } from "vitest";
import {
  CommandFailedError,
  EXIT_ABORTED,
  EXIT_SPAWN_FAILED,
  EXIT_TIMEOUT,
  ProcessRunner,
  buildSshArgv,
  ensureOk,
  shellQuote,
  type CommandResult,
} from "../src/exec/command-runner.js";
import { formatCommand } from "../src/logging/redact.js";

const node = process.execPath;

function collector(): { chunks: string[]; write: (chunk: string | Buffer) => boolean; text: () => string } {
  const chunks: string[] = [];
  return {
    chunks,
    write: (chunk) => {
      chunks.push(chunk.toString());
      return true;
    },
    text: () => chunks.join(""),
  };
}

describe("ProcessRunner", () => {
  const runner = new ProcessRunner();

  it("captures stdout and exit code", async () => {
    const res = await runner.run([node, "-e", "process.stdout.write('hi'); process.exit(3)"]);
    expect(res.exitCode).toBe(3);
    expect(res.stdout).toBe("hi");
    expect(res.timedOut).toBe(false);
  });

  it("captures stderr separately", async () => {
    const res = await runner.run([node, "-e", "process.stderr.write('oops')"]);
    expect(res.exitCode).toBe(0);
    expect(res.stdout).toBe("");
    expect(res.stderr).toBe("oops");
  });

  it("feeds input on stdin", async () => {
    const res = await runner.run([node, "-e", "process.stdin.pipe(process.stdout)"], { input: "Authorization: x\n" });
    expect(res.stdout).toBe("Authorization: x\n");
  });

  it("kills the child on timeout", async () => {
    const res = await runner.run([node, "-e", "setTimeout(() => {}, 30000)"], { timeoutSec: 0.2 });
    expect(res.exitCode).toBe(EXIT_TIMEOUT);
    expect(res.timedOut).toBe(true);
    expect(res.durationMs).toBeLessThan(10_000);
  });

  it("reports a missing program as a failed result", async () => {
    const res = await runner.run(["pvekube-no-such-program"]);
    expect(res.exitCode).toBe(EXIT_SPAWN_FAILED);
    expect(res.stderr).toContain("failed to start pvekube-no-such-program");
  });

  it("rejects an empty argv without spawning", async () => {
    const res = await runner.run([]);
    expect(res).toMatchObject({ exitCode: EXIT_SPAWN_FAILED, stderr: "empty command" });
  });

  it("returns 130 when the signal fires", async () => {
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 50);
    const res = await runner.run([node, "-e", "setTimeout(() => {}, 30000)"], { signal: controller.signal });
    expect(res.exitCode).toBe(EXIT_ABORTED);
  });

  it("returns 130 without spawning when already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const res = await runner.run([node, "-e", ""], { signal: controller.signal });
    expect(res).toMatchObject({ exitCode: EXIT_ABORTED, stderr: "aborted before start" });
  });

  it("streams a header, the output and an exit trailer to the log", async () => {
    const log = collector();
    await runner.run([node, "-e", "console.log(42)"], { logStream: log });
    const text = log.text();
    expect(text.startsWith(`$ ${formatCommand([node, "-e", "console.log(42)"])}\n`)).toBe(true);
    expect(text.endsWith("42\n\nexit=0\n")).toBe(true);
  });

  it("redacts secrets in the logged command line", async () => {
    const log = collector();
    await runner.run([node, "-e", "", "token=test-secret"], { logStream: log });
    expect(log.chunks[0]).toBe("$ " + formatCommand([node]) + " -e '' token=***\n");
  });
});

describe("ssh argv", () => {
  it("wraps the remote argv for ssh", () => {
    const argv = buildSshArgv(
      { kind: "ssh", host: "192.0.2.10", user: "root", identityFile: "/keys/id_test", connectTimeoutSec: 10 },
      ["qm", "set", "9000", "--ciuser", "sys admin"],
    );
    expect(argv).toEqual([
      "ssh",
      "-o", "BatchMode=yes",
      "-o", "ConnectTimeout=10",
      "-o", "ServerAliveInterval=5",
      "-o", "ServerAliveCountMax=3",
      "-o", "StrictHostKeyChecking=accept-new",
      "-i", "/keys/id_test",
      "root@192.0.2.10",
      "--",
      "'qm' 'set' '9000' '--ciuser' 'sys admin'",
    ]);
  });

  it("omits -i without an identity file", () => {
    const argv = buildSshArgv({ kind: "ssh", host: "h", user: "u", connectTimeoutSec: 5 }, ["true"]);
    expect(argv).not.toContain("-i");
    expect(argv.slice(-3)).toEqual(["u@h", "--", "'true'"]);
  });

  it("quotes single quotes", () => {
    expect(shellQuote("it's")).toBe(`'it'\\''s'`);
  });
});

describe("ensureOk", () => {
  const result = (over: Partial<CommandResult>): CommandResult => ({
    exitCode: 0,
    stdout: "",
    stderr: "",
    timedOut: false,
    durationMs: 1,
    ...over,
  });

  it("passes a zero exit through", () => {
    const res = result({ stdout: "ok" });
    expect(ensureOk(res, "qm list")).toBe(res);
  });

  it("throws with the stderr tail", () => {
    expect(() => ensureOk(result({ exitCode: 2, stderr: "boom\n" }), "qm create")).toThrow(CommandFailedError);
    expect(() => ensureOk(result({ exitCode: 2, stderr: "boom\n" }), "qm create")).toThrow("qm create failed (exit 2): boom");
  });

  it("names a timeout and redacts secrets", () => {
    expect(() => ensureOk(result({ exitCode: 124, timedOut: true, stderr: "password=hunter" }), "curl")).toThrow(
      "curl failed (timed out): password=***",
    );
  });
});
