import type { QueryPhase } from "@lexrag/types";
import type { Logger } from "@lexrag/logger";

const VALID_TRANSITIONS: Record<QueryPhase, readonly QueryPhase[]> = {
  idle: ["validating", "failed"],
  validating: ["retrieving", "failed"],
  // Straight to responding when nothing relevant was found.
  retrieving: ["generating", "responding", "failed"],
  generating: ["responding", "failed"],
  responding: [],
  failed: [],
};

const FINAL_PHASES: ReadonlySet<QueryPhase> = new Set<QueryPhase>(["responding", "failed"]);

export function canTransition(from: QueryPhase, to: QueryPhase): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

export function isFinal(phase: QueryPhase): boolean {
  return FINAL_PHASES.has(phase);
}

export function validNextPhases(phase: QueryPhase): readonly QueryPhase[] {
  return VALID_TRANSITIONS[phase];
}

/**
 * Lifecycle of one query. Each service call owns its own instance, so the
 * phase of one request never leaks into another.
 */
export class QueryRun {
  private current: QueryPhase = "idle";
  private readonly trail: QueryPhase[] = ["idle"];

  constructor(private readonly logger?: Logger) {}

  get phase(): QueryPhase {
    return this.current;
  }

  /** Phases visited so far, starting with `idle`. */
  get history(): readonly QueryPhase[] {
    return this.trail;
  }

  transition(to: QueryPhase): void {
    const from = this.current;
    if (!canTransition(from, to)) {
      const allowed = validNextPhases(from).join(", ") || "none";
      throw new Error(`Invalid query phase transition: ${from} -> ${to} (allowed: ${allowed})`);
    }
    this.current = to;
    this.trail.push(to);
    this.logger?.debug({ from, to }, "Query phase transition");
  }

  /** Move to `failed` unless the run already finished. */
  fail(): void {
    if (!isFinal(this.current)) {
      this.transition("failed");
    }
  }
}
