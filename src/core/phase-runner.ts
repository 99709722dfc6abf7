import fs from "node:fs";
import path from "node:path";
import { minimatch } from "minimatch";
import type { Logger } from "pino";
import type { LogSink } from "../exec/command-runner.js";
import { errorMessage } from "../logging/redact.js";
import type { StateStore } from "../state/state-store.js";
import { StepRangeError } from "./errors.js";
import type { PhaseDefinition, PhaseOutcome, PhaseWorkResult, RunSummary } from "./phase.js";
import { PhaseTracker } from "./state-machine.js";

export type RunPhasesOptions = {
  /** Reset the state document and ignore cached completion. */
  force?: boolean;
  /** Phase ids or glob patterns to leave out of this run. */
  skip?: string[];
  resumeFrom?: string;
  until?: string;
  dryRun?: boolean;
  /** User interrupt; aborts the running phase and stops the sequence. */
  signal?: AbortSignal;
};

export type PhaseRunnerDeps = {
  state: StateStore;
  logger: Logger;
  /** Per-phase command logs go to `<logDir>/<phase>.log` when set. */
  logDir?: string;
  verifyTimeoutSec?: number;
};

const GLOB_CHARS = /[*?[\]{}!]/;

/**
 * Check --skip-phases / --resume-from / --until against the phase list.
 * Returns an error message, or null when the selection is valid.
 */
export function validateSelection(phases: readonly PhaseDefinition[], opts: RunPhasesOptions): string | null {
  const ids = phases.map((p) => p.id);
  const indexOf = (id: string) => ids.indexOf(id);

  for (const pattern of opts.skip ?? []) {
    if (!GLOB_CHARS.test(pattern) && indexOf(pattern) === -1) {
      return `Unknown phase in skip list: ${pattern} (known: ${ids.join(", ")})`;
    }
  }
  if (opts.resumeFrom !== undefined && indexOf(opts.resumeFrom) === -1) {
    return `Unknown phase for resume-from: ${opts.resumeFrom}`;
  }
  if (opts.until !== undefined && indexOf(opts.until) === -1) {
    return `Unknown phase for until: ${opts.until}`;
  }
  if (opts.resumeFrom !== undefined && opts.until !== undefined && indexOf(opts.until) < indexOf(opts.resumeFrom)) {
    return `until (${opts.until}) comes before resume-from (${opts.resumeFrom})`;
  }
  return null;
}

function exclusionReason(
  phase: PhaseDefinition,
  index: number,
  ids: string[],
  opts: RunPhasesOptions,
): string | null {
  if ((opts.skip ?? []).some((pattern) => minimatch(phase.id, pattern))) return "skip-phases";
  if (opts.resumeFrom !== undefined && index < ids.indexOf(opts.resumeFrom)) return "before resume-from";
  if (opts.until !== undefined && index > ids.indexOf(opts.until)) return "after until";
  return null;
}

type VerifyVerdict = "verified" | "missing" | "aborted";

type PhaseLog = LogSink & { close: () => Promise<void> };

const NULL_LOG: PhaseLog = { write: () => true, close: () => Promise.resolve() };

function openPhaseLog(logDir: string | undefined, phase: string): PhaseLog {
  if (!logDir) return NULL_LOG;
  fs.mkdirSync(logDir, { recursive: true });
  const stream = fs.createWriteStream(path.join(logDir, `${phase}.log`), { flags: "a" });
  stream.write(`# ${new Date().toISOString()} ${phase}\n`);
  return {
    write: (chunk) => stream.write(chunk),
    close: () => new Promise<void>((resolve) => stream.end(() => resolve())),
  };
}

/**
 * Phase Runner — walks the ordered phase list once.
 *
 * Per phase: filter → cached & verified? skip : (drift → invalidate) → run under
 * timeout → persist. The first failure stops the sequence; a failed phase is never
 * recorded complete.
 */
export class PhaseRunner {
  private readonly state: StateStore;
  private readonly logger: Logger;
  private readonly logDir?: string;
  private readonly verifyTimeoutSec: number;

  constructor(deps: PhaseRunnerDeps) {
    this.state = deps.state;
    this.logger = deps.logger;
    this.logDir = deps.logDir;
    this.verifyTimeoutSec = deps.verifyTimeoutSec ?? 10;
  }

  async runPhases(phases: readonly PhaseDefinition[], opts: RunPhasesOptions = {}): Promise<RunSummary> {
    const invalid = validateSelection(phases, opts);
    if (invalid) throw new StepRangeError(invalid);

    if (opts.force && !opts.dryRun) {
      this.logger.warn("force rebuild: resetting deployment state");
      this.state.reset();
    }

    const ids = phases.map((p) => p.id);
    const tracker = new PhaseTracker();
    const outcomes: PhaseOutcome[] = [];

    for (const [index, phase] of phases.entries()) {
      const excluded = exclusionReason(phase, index, ids, opts);
      if (excluded) {
        this.logger.debug({ phase: phase.id, reason: excluded }, `excluding ${phase.id}`);
        outcomes.push({ phase: phase.id, status: "excluded", durationMs: 0, reason: excluded });
        continue;
      }

      if (opts.signal?.aborted) {
        this.logger.warn({ phase: phase.id }, "interrupted; not starting further phases");
        return { success: false, interrupted: true, failedPhase: phase.id, outcomes };
      }

      const started = Date.now();
      let reason: string | undefined;

      if (!opts.force && this.state.isComplete(phase.id)) {
        tracker.seedCompleted(phase.id);
        const verdict = await this.verify(phase, opts.signal);
        if (verdict === "aborted") {
          this.logger.warn({ phase: phase.id }, "interrupted while verifying; keeping the recorded completion");
          outcomes.push({ phase: phase.id, status: "failed", durationMs: Date.now() - started, error: "interrupted" });
          return { success: false, interrupted: true, failedPhase: phase.id, outcomes };
        }
        if (verdict === "verified") {
          this.logger.info({ phase: phase.id }, `skip ${phase.id}: already completed and verified`);
          outcomes.push({ phase: phase.id, status: "skipped", durationMs: Date.now() - started });
          continue;
        }
        reason = "resource missing";
        if (opts.dryRun) {
          this.logger.warn({ phase: phase.id }, `${phase.id} is recorded complete but its resource is missing`);
        } else {
          this.logger.warn({ phase: phase.id }, `${phase.id} is recorded complete but its resource is missing; re-running`);
          this.state.invalidate(phase.id);
          tracker.apply(phase.id, "invalidate");
        }
      }

      if (opts.dryRun) {
        this.logger.info({ phase: phase.id }, `would run ${phase.id}: ${phase.title}`);
        outcomes.push({ phase: phase.id, status: "planned", durationMs: 0, reason });
        continue;
      }

      tracker.apply(phase.id, "start");
      this.logger.info({ phase: phase.id, timeoutSec: phase.timeoutSec }, `${phase.title}`);

      const result = await this.execute(phase, opts.signal);
      const durationMs = Date.now() - started;

      if (!result.ok) {
        tracker.apply(phase.id, "fail");
        this.logger.error({ phase: phase.id, durationMs, err: result.error }, `${phase.id} failed`);
        outcomes.push({ phase: phase.id, status: "failed", durationMs, error: result.error, reason });
        return { success: false, failedPhase: phase.id, interrupted: opts.signal?.aborted ? true : undefined, outcomes };
      }

      for (const resource of result.resources ?? []) {
        this.state.markResourceCreated(resource.type, resource.id, resource.details ?? {});
      }
      this.state.markComplete(phase.id, result.details ?? {});
      tracker.apply(phase.id, "succeed");
      this.logger.info({ phase: phase.id, durationMs }, `${phase.id} completed`);
      outcomes.push({ phase: phase.id, status: "completed", durationMs, reason });
    }

    return { success: true, outcomes };
  }

  /**
   * A cached phase without a verifier is trusted; a throwing or slow verifier counts
   * as drift. A verdict reached after the user interrupt is "aborted", never drift.
   */
  private async verify(phase: PhaseDefinition, outer?: AbortSignal): Promise<VerifyVerdict> {
    if (!phase.verify) return "verified";
    const verifyFn = phase.verify;

    const controller = new AbortController();
    const onOuterAbort = () => controller.abort();
    outer?.addEventListener("abort", onOuterAbort, { once: true });
    let timer: NodeJS.Timeout | undefined;

    try {
      const probe = (async () =>
        verifyFn({
          signal: controller.signal,
          timeoutSec: this.verifyTimeoutSec,
          logger: this.logger,
          state: this.state,
        }))();
      const timeout = new Promise<boolean>((resolve) => {
        timer = setTimeout(() => {
          controller.abort();
          resolve(false);
        }, this.verifyTimeoutSec * 1000 * 3);
      });
      const cancelled = new Promise<boolean>((resolve) => {
        controller.signal.addEventListener("abort", () => resolve(false), { once: true });
      });
      const found = await Promise.race([probe, timeout, cancelled]);
      if (outer?.aborted) return "aborted";
      return found ? "verified" : "missing";
    } catch (e) {
      if (outer?.aborted) return "aborted";
      this.logger.warn({ phase: phase.id, err: errorMessage(e) }, "verifier raised; treating resource as missing");
      return "missing";
    } finally {
      if (timer) clearTimeout(timer);
      outer?.removeEventListener("abort", onOuterAbort);
    }
  }

  private async execute(phase: PhaseDefinition, outer?: AbortSignal): Promise<PhaseWorkResult> {
    const controller = new AbortController();
    const log = openPhaseLog(this.logDir, phase.id);
    let timer: NodeJS.Timeout | undefined;
    let onOuterAbort: (() => void) | undefined;

    const work = (async () =>
      phase.run({
        phase: phase.id,
        signal: controller.signal,
        logStream: log,
        logger: this.logger.child({ phase: phase.id }),
        state: this.state,
      }))().catch((e: unknown): PhaseWorkResult => ({ ok: false, error: errorMessage(e) }));

    const timeout = new Promise<PhaseWorkResult>((resolve) => {
      timer = setTimeout(() => {
        controller.abort();
        resolve({ ok: false, error: `timed out after ${phase.timeoutSec}s` });
      }, phase.timeoutSec * 1000);
    });

    const interrupted = new Promise<PhaseWorkResult>((resolve) => {
      onOuterAbort = () => {
        controller.abort();
        resolve({ ok: false, error: "interrupted" });
      };
      if (outer?.aborted) onOuterAbort();
      else outer?.addEventListener("abort", onOuterAbort, { once: true });
    });

    try {
      return await Promise.race([work, timeout, interrupted]);
    } finally {
      if (timer) clearTimeout(timer);
      if (onOuterAbort) outer?.removeEventListener("abort", onOuterAbort);
      await log.close();
    }
  }
}
