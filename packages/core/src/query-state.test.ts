import { describe, it, expect } from "vitest";
import { QueryRun, canTransition, isFinal, validNextPhases } from "./query-state.js";

describe("query phase transitions", () => {
  it("follows the happy path", () => {
    const run = new QueryRun();
    run.transition("validating");
    run.transition("retrieving");
    run.transition("generating");
    run.transition("responding");

    expect(run.phase).toBe("responding");
    expect(run.history).toEqual(["idle", "validating", "retrieving", "generating", "responding"]);
  });

  it("allows responding straight from retrieving", () => {
    expect(canTransition("retrieving", "responding")).toBe(true);
  });

  it("rejects skipping validation", () => {
    const run = new QueryRun();
    expect(() => run.transition("retrieving")).toThrow(
      "Invalid query phase transition: idle -> retrieving (allowed: validating, failed)",
    );
  });

  it("allows failing from any non-final phase", () => {
    for (const phase of ["idle", "validating", "retrieving", "generating"] as const) {
      expect(canTransition(phase, "failed")).toBe(true);
    }
  });

  it("treats responding and failed as final", () => {
    expect(isFinal("responding")).toBe(true);
    expect(isFinal("failed")).toBe(true);
    expect(isFinal("generating")).toBe(false);
    expect(validNextPhases("failed")).toEqual([]);
  });

  it("fail() is a no-op once the run is finished", () => {
    const run = new QueryRun();
    run.transition("validating");
    run.fail();
    run.fail();

    expect(run.history).toEqual(["idle", "validating", "failed"]);
  });
});
