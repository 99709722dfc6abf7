import { describe, expect, it } from "vitest";
import {
  InvalidTransitionError,
  PhaseTracker,
  canTransition,
  transition,
} from "../src/core/state-machine.js";

describe("phase state machine", () => {
  it("follows the happy path", () => {
    expect(transition("pending", "start")).toBe("in_progress");
    expect(transition("in_progress", "succeed")).toBe("completed");
    expect(transition("in_progress", "fail")).toBe("failed");
  });

  it("allows invalidate from completed and retry from failed", () => {
    expect(transition("completed", "invalidate")).toBe("pending");
    expect(transition("failed", "retry")).toBe("pending");
  });

  it("rejects failed → completed", () => {
    expect(canTransition("failed", "succeed")).toBe(false);
    expect(() => transition("failed", "succeed")).toThrow(InvalidTransitionError);
    expect(() => transition("failed", "succeed")).toThrow("Invalid phase transition: succeed from failed");
  });

  it("rejects starting a completed phase without invalidating it", () => {
    expect(canTransition("completed", "start")).toBe(false);
  });

  it("tracker defaults to pending and records each step", () => {
    const t = new PhaseTracker();
    expect(t.status("validation")).toBe("pending");
    t.apply("validation", "start");
    t.apply("validation", "succeed");
    t.seedCompleted("tools_storage");
    t.apply("tools_storage", "invalidate");
    expect(t.entries()).toEqual([
      ["validation", "completed"],
      ["tools_storage", "pending"],
    ]);
  });
});
