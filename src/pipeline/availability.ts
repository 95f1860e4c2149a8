import { AvailabilityCheckError, errorMessage } from "../errors.js";
import type { AvailabilityResult, ExecutionChannel, ResolvedTarget } from "../types.js";

export class AvailabilityChecker {
  constructor(private readonly channel: ExecutionChannel) {}

  async check(targets: readonly ResolvedTarget[]): Promise<Map<string, AvailabilityResult>> {
    const results = new Map<string, AvailabilityResult>();
    if (targets.length === 0) return results;

    const wanted = new Set(targets.map((target) => target.canonicalId));
    const registered = new Set<string>();
    try {
      // every page has to be seen before anything is declared unreachable
      for await (const id of this.channel.listRegisteredTargets()) {
        if (wanted.has(id)) registered.add(id);
      }
    } catch (error) {
      throw new AvailabilityCheckError(`execution channel listing failed: ${errorMessage(error)}`, {
        cause: error
      });
    }

    for (const target of targets) {
      results.set(target.canonicalId, { target, reachable: registered.has(target.canonicalId) });
    }
    return results;
  }
}

export function partitionAvailability(availability: ReadonlyMap<string, AvailabilityResult>): {
  available: ResolvedTarget[];
  unavailable: ResolvedTarget[];
} {
  const available: ResolvedTarget[] = [];
  const unavailable: ResolvedTarget[] = [];
  for (const { target, reachable } of availability.values()) {
    (reachable ? available : unavailable).push(target);
  }
  return { available, unavailable };
}
