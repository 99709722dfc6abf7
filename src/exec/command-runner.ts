import { spawn, type ChildProcessWithoutNullStreams } from "node:child_process";
import type { Logger } from "pino";
import { errorMessage, formatCommand, redactSensitiveInfo } from "../logging/redact.js";

export const EXIT_TIMEOUT = 124;
export const EXIT_SPAWN_FAILED = 127;
export const EXIT_ABORTED = 130;

const MAX_CAPTURE_BYTES = 50 * 1024 * 1024;

export type LocalTarget = { kind: "local" };

export type SshTarget = {
  kind: "ssh";
  host: string;
  user: string;
  identityFile?: string;
  /** Applies to connection setup only, never to the remote command. */
  connectTimeoutSec: number;
};

export type CommandTarget = LocalTarget | SshTarget;

export const LOCAL: LocalTarget = { kind: "local" };

export type CommandResult = {
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  durationMs: number;
};

/** Anything that accepts raw output chunks (a file stream in practice). */
export type LogSink = { write: (chunk: string | Buffer) => unknown };

export type RunOptions = {
  target?: CommandTarget;
  timeoutSec?: number;
  cwd?: string;
  env?: Record<string, string>;
  /** Written to the child's stdin, which is then closed. */
  input?: string;
  logStream?: LogSink;
  signal?: AbortSignal;
};

export interface CommandExecutor {
  run(argv: readonly string[], opts?: RunOptions): Promise<CommandResult>;
}

/** POSIX single-quote escaping: wraps in '' and escapes internal quotes as '\'' */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, "'\\''")}'`;
}

export function describeTarget(target: CommandTarget): string {
  return target.kind === "local" ? "local" : `${target.user}@${target.host}`;
}

/** Full local argv that runs `remote` on the SSH target. */
export function buildSshArgv(target: SshTarget, remote: readonly string[]): string[] {
  const argv = [
    "ssh",
    "-o", "BatchMode=yes",
    "-o", `ConnectTimeout=${target.connectTimeoutSec}`,
    "-o", "ServerAliveInterval=5",
    "-o", "ServerAliveCountMax=3",
    "-o", "StrictHostKeyChecking=accept-new",
  ];
  if (target.identityFile) argv.push("-i", target.identityFile);
  argv.push(`${target.user}@${target.host}`, "--", remote.map(shellQuote).join(" "));
  return argv;
}

const SIGNAL_NUMBERS: Partial<Record<NodeJS.Signals, number>> = { SIGHUP: 1, SIGINT: 2, SIGKILL: 9, SIGTERM: 15 };

function signalExitCode(signal: NodeJS.Signals | null): number {
  const num = signal ? SIGNAL_NUMBERS[signal] : undefined;
  return num === undefined ? 1 : 128 + num;
}

/**
 * Runs argument vectors as child processes, locally or over ssh.
 * Never rejects: every failure mode comes back as a CommandResult.
 */
export class ProcessRunner implements CommandExecutor {
  constructor(private readonly logger?: Logger) {}

  run(argv: readonly string[], opts: RunOptions = {}): Promise<CommandResult> {
    const target = opts.target ?? LOCAL;
    const full = target.kind === "ssh" ? buildSshArgv(target, argv) : [...argv];
    const started = Date.now();
    const display = formatCommand(argv);

    this.logger?.debug({ target: describeTarget(target), timeoutSec: opts.timeoutSec }, `exec ${display}`);
    opts.logStream?.write(`$ ${display}\n`);

    const finishEarly = (exitCode: number, stderr: string): Promise<CommandResult> => {
      opts.logStream?.write(`${stderr}\nexit=${exitCode}\n`);
      return Promise.resolve({ exitCode, stdout: "", stderr, timedOut: false, durationMs: Date.now() - started });
    };

    if (full.length === 0) return finishEarly(EXIT_SPAWN_FAILED, "empty command");
    if (opts.signal?.aborted) return finishEarly(EXIT_ABORTED, "aborted before start");

    let child: ChildProcessWithoutNullStreams;
    try {
      child = spawn(full[0], full.slice(1), {
        cwd: opts.cwd,
        env: { ...process.env, ...opts.env },
        detached: true,
      });
    } catch (e) {
      return finishEarly(EXIT_SPAWN_FAILED, errorMessage(e));
    }

    return new Promise<CommandResult>((resolve) => {
      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let captured = 0;
      let timedOut = false;
      let aborted = false;
      let settled = false;
      let spawnError: string | null = null;

      const capture = (into: Buffer[]) => (chunk: Buffer) => {
        opts.logStream?.write(chunk);
        if (captured + chunk.length <= MAX_CAPTURE_BYTES) {
          into.push(chunk);
          captured += chunk.length;
        }
      };
      child.stdout.on("data", capture(stdout));
      child.stderr.on("data", capture(stderr));

      const killGroup = () => {
        const pid = child.pid;
        if (pid === undefined) return;
        try {
          process.kill(-pid, "SIGKILL");
        } catch (e) {
          this.logger?.debug({ pid, err: errorMessage(e) }, "process group already gone");
          child.kill("SIGKILL");
        }
      };

      const timer =
        opts.timeoutSec !== undefined && opts.timeoutSec > 0
          ? setTimeout(() => {
              timedOut = true;
              killGroup();
            }, opts.timeoutSec * 1000)
          : undefined;

      const onAbort = () => {
        aborted = true;
        killGroup();
      };
      opts.signal?.addEventListener("abort", onAbort, { once: true });

      const finish = (code: number | null, signal: NodeJS.Signals | null) => {
        if (settled) return;
        settled = true;
        if (timer) clearTimeout(timer);
        opts.signal?.removeEventListener("abort", onAbort);

        let exitCode: number;
        let err = Buffer.concat(stderr).toString("utf8");
        if (spawnError !== null) {
          exitCode = EXIT_SPAWN_FAILED;
          err = err ? `${err}\n${spawnError}` : spawnError;
        } else if (timedOut) {
          exitCode = EXIT_TIMEOUT;
        } else if (aborted) {
          exitCode = EXIT_ABORTED;
        } else {
          exitCode = code ?? signalExitCode(signal);
        }

        const durationMs = Date.now() - started;
        opts.logStream?.write(`\nexit=${exitCode}${timedOut ? " (timeout)" : ""}\n`);
        this.logger?.debug({ exitCode, durationMs }, `done ${display}`);
        resolve({ exitCode, stdout: Buffer.concat(stdout).toString("utf8"), stderr: err, timedOut, durationMs });
      };

      child.on("error", (e) => {
        if (child.pid === undefined) {
          spawnError = `failed to start ${full[0]}: ${errorMessage(e)}`;
          finish(null, null);
        } else {
          this.logger?.debug({ err: errorMessage(e) }, "child process error");
        }
      });
      child.on("close", finish);

      child.stdin.on("error", (e) => {
        this.logger?.debug({ err: errorMessage(e) }, "stdin closed early");
      });
      if (opts.input !== undefined) child.stdin.end(opts.input);
      else child.stdin.end();
    });
  }
}

export class CommandFailedError extends Error {
  constructor(
    readonly description: string,
    readonly result: CommandResult,
  ) {
    const tail = redactSensitiveInfo((result.stderr || result.stdout).trim().slice(-500));
    const why = result.timedOut ? "timed out" : `exit ${result.exitCode}`;
    super(tail ? `${description} failed (${why}): ${tail}` : `${description} failed (${why})`);
    this.name = "CommandFailedError";
  }
}

/** Throw CommandFailedError unless the command exited 0. */
export function ensureOk(result: CommandResult, description: string): CommandResult {
  if (result.exitCode !== 0) throw new CommandFailedError(description, result);
  return result;
}
