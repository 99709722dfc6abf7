/** Thrown inside phase work to abort the phase with a message. */
export class PhaseError extends Error {
  constructor(
    readonly phase: string,
    message: string,
  ) {
    super(message);
    this.name = "PhaseError";
  }
}

/** Raised before any work when --resume-from / --until do not describe a valid range. */
export class StepRangeError extends Error {
  readonly code = "STEP_RANGE_INVALID";

  constructor(message: string) {
    super(message);
    this.name = "StepRangeError";
  }
}
