/**
 * Per-phase lifecycle during a run.
 *
 *   pending ──start──▶ in_progress ──succeed──▶ completed
 *                          │                       │
 *                          └──fail──▶ failed       └──invalidate──▶ pending
 *                                       │
 *                                       └──retry──▶ pending
 */
export const PHASE_STATUSES = ["pending", "in_progress", "completed", "failed"] as const;

export type PhaseStatus = (typeof PHASE_STATUSES)[number];

export type PhaseEvent = "start" | "succeed" | "fail" | "invalidate" | "retry";

const TRANSITIONS: Record<PhaseStatus, Partial<Record<PhaseEvent, PhaseStatus>>> = {
  pending: { start: "in_progress" },
  in_progress: { succeed: "completed", fail: "failed" },
  completed: { invalidate: "pending" },
  failed: { retry: "pending" },
};

export class InvalidTransitionError extends Error {
  constructor(
    readonly from: PhaseStatus,
    readonly event: PhaseEvent,
  ) {
    super(`Invalid phase transition: ${event} from ${from}`);
    this.name = "InvalidTransitionError";
  }
}

/** Pure function: given current status + event, return the next status. */
export function transition(current: PhaseStatus, event: PhaseEvent): PhaseStatus {
  const next = TRANSITIONS[current][event];
  if (!next) throw new InvalidTransitionError(current, event);
  return next;
}

export function canTransition(current: PhaseStatus, event: PhaseEvent): boolean {
  return TRANSITIONS[current][event] !== undefined;
}

/** Tracks every phase of one run through the transition table. */
export class PhaseTracker {
  private readonly statuses = new Map<string, PhaseStatus>();

  status(phase: string): PhaseStatus {
    return this.statuses.get(phase) ?? "pending";
  }

  /** Seed a phase already recorded complete in the state document. */
  seedCompleted(phase: string): void {
    this.statuses.set(phase, "completed");
  }

  apply(phase: string, event: PhaseEvent): PhaseStatus {
    const next = transition(this.status(phase), event);
    this.statuses.set(phase, next);
    return next;
  }

  entries(): Array<[string, PhaseStatus]> {
    return [...this.statuses.entries()];
  }
}
