import type { Logger } from "pino";
import type { LogSink } from "../exec/command-runner.js";
import type { Details, StateStore } from "../state/state-store.js";

export type CreatedResource = { type: string; id: string; details?: Details };

export type PhaseWorkResult =
  | { ok: true; details?: Details; resources?: CreatedResource[] }
  | { ok: false; error: string };

/** Handed to phase work; `signal` fires on timeout or user interrupt. */
export type PhaseRunContext = {
  phase: string;
  signal: AbortSignal;
  logStream: LogSink;
  logger: Logger;
  state: StateStore;
};

export type VerifyContext = {
  signal: AbortSignal;
  timeoutSec: number;
  logger: Logger;
  state: StateStore;
};

export type PhaseDefinition = {
  id: string;
  title: string;
  timeoutSec: number;
  /** Read-only probe that the resource this phase produced still exists. */
  verify?: (ctx: VerifyContext) => Promise<boolean>;
  run: (ctx: PhaseRunContext) => Promise<PhaseWorkResult>;
};

export type OutcomeStatus = "skipped" | "completed" | "failed" | "excluded" | "planned";

export type PhaseOutcome = {
  phase: string;
  status: OutcomeStatus;
  durationMs: number;
  error?: string;
  reason?: string;
};

export type RunSummary = {
  success: boolean;
  failedPhase?: string;
  interrupted?: boolean;
  outcomes: PhaseOutcome[];
};
