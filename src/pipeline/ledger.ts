import type { ResolvedTarget, TargetOutcome, TargetStatus } from "../types.js";
import { isTerminal } from "../types.js";
import { nowIso } from "../util.js";

export type RoundReport =
  | { canonicalId: string; kind: "status"; status: TargetStatus; message: string }
  | { canonicalId: string; kind: "retry"; message: string };

/**
 * Owns the outcome of every dispatched target. Terminal outcomes are frozen:
 * reports against them are dropped and do not count as attempts.
 */
export class OutcomeLedger {
  private readonly outcomes = new Map<string, TargetOutcome>();

  constructor(targets: readonly ResolvedTarget[]) {
    const now = nowIso();
    for (const target of targets) {
      if (this.outcomes.has(target.canonicalId)) {
        throw new Error(`duplicate target: ${target.canonicalId}`);
      }
      this.outcomes.set(target.canonicalId, {
        target,
        status: "Pending",
        message: "",
        lastCheckedAt: now,
        attempts: 0
      });
    }
  }

  pending(): ResolvedTarget[] {
    return [...this.outcomes.values()]
      .filter((outcome) => !isTerminal(outcome.status))
      .map((outcome) => outcome.target);
  }

  settled(): boolean {
    return this.pending().length === 0;
  }

  apply(report: RoundReport): boolean {
    const outcome = this.outcomes.get(report.canonicalId);
    if (!outcome) {
      throw new Error(`unknown target: ${report.canonicalId}`);
    }
    if (isTerminal(outcome.status)) {
      return false;
    }
    outcome.attempts += 1;
    outcome.lastCheckedAt = nowIso();
    outcome.message = report.message;
    // InProgress never falls back to Pending
    if (report.kind === "status" && !(report.status === "Pending" && outcome.status === "InProgress")) {
      outcome.status = report.status;
    }
    return true;
  }

  /** Marks every non-terminal outcome TimedOut. Returns how many were expired. */
  expire(message: string): number {
    let expired = 0;
    const now = nowIso();
    for (const outcome of this.outcomes.values()) {
      if (isTerminal(outcome.status)) continue;
      outcome.status = "TimedOut";
      outcome.message = outcome.message ? `${message} (last: ${outcome.message})` : message;
      outcome.lastCheckedAt = now;
      expired += 1;
    }
    return expired;
  }

  snapshot(): Map<string, TargetOutcome> {
    return new Map(
      [...this.outcomes.entries()].map(([id, outcome]) => [id, structuredClone(outcome)] as const)
    );
  }
}
