import type {
  AvailabilityResult,
  BatchReport,
  ResolvedTarget,
  TargetOutcome,
  TargetSpec
} from "../types.js";
import { isTerminal } from "../types.js";

export interface AggregateInput {
  requested: number;
  resolved: readonly ResolvedTarget[];
  unresolved: readonly TargetSpec[];
  availability: ReadonlyMap<string, AvailabilityResult>;
  /** Absent when the run stopped before dispatch; reachable targets then carry no outcome. */
  outcomes?: ReadonlyMap<string, TargetOutcome>;
  batchId?: string;
  /** Timestamp stamped on synthesized Unavailable outcomes. */
  checkedAt: string;
}

/**
 * Reconciles the requested, resolved, available and terminal sets into one
 * report. Shape violations are programming errors and throw.
 */
export function aggregate(input: AggregateInput): BatchReport {
  const perTarget: Record<string, TargetOutcome> = {};
  const unavailable: ResolvedTarget[] = [];
  let available = 0;
  let succeeded = 0;
  let failed = 0;

  const resolvedIds = new Set(input.resolved.map((target) => target.canonicalId));
  const outcomes = input.outcomes;
  for (const id of outcomes?.keys() ?? []) {
    if (!resolvedIds.has(id)) {
      throw new Error(`outcome for unresolved target: ${id}`);
    }
  }

  for (const target of input.resolved) {
    const availability = input.availability.get(target.canonicalId);
    if (!availability) {
      throw new Error(`missing availability for ${target.canonicalId}`);
    }

    if (!availability.reachable) {
      unavailable.push(target);
      perTarget[target.canonicalId] = {
        target,
        status: "Unavailable",
        message: "not registered with the execution channel",
        lastCheckedAt: input.checkedAt,
        attempts: 0
      };
      continue;
    }

    available += 1;
    if (!outcomes) continue;
    const outcome = outcomes.get(target.canonicalId);
    if (!outcome) {
      throw new Error(`missing outcome for ${target.canonicalId}`);
    }
    if (!isTerminal(outcome.status)) {
      throw new Error(`outcome for ${target.canonicalId} is not terminal: ${outcome.status}`);
    }
    // only dispatched targets are counted: succeeded + failed == available
    if (outcome.status === "Succeeded") {
      succeeded += 1;
    } else {
      failed += 1;
    }
    perTarget[target.canonicalId] = outcome;
  }

  return {
    batchId: input.batchId,
    requested: input.requested,
    resolved: input.resolved.length,
    available,
    succeeded,
    failed,
    perTarget,
    unresolved: [...input.unresolved],
    unavailable
  };
}
