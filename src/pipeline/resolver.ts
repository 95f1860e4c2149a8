import { ResolutionError, errorMessage } from "../errors.js";
import type { InventoryService, ResolutionResult, ResolvedTarget, TargetSpec } from "../types.js";

const ACTIVE_STATES = new Set(["running", "active"]);

// explicit > address > tag
const SPECIFICITY: Record<TargetSpec["kind"], number> = {
  id: 3,
  address: 2,
  tag: 1
};

export function describeSpec(spec: TargetSpec): string {
  switch (spec.kind) {
    case "id":
      return spec.id;
    case "address":
      return spec.address;
    case "tag":
      return `tag:${spec.key}=${spec.value}`;
  }
}

export class TargetResolver {
  constructor(private readonly inventory: InventoryService) {}

  async resolve(specs: readonly TargetSpec[]): Promise<ResolutionResult> {
    const byId = new Map<string, ResolvedTarget>();
    const unresolved: TargetSpec[] = [];

    const keep = (candidate: ResolvedTarget) => {
      const existing = byId.get(candidate.canonicalId);
      if (!existing || SPECIFICITY[candidate.source.kind] > SPECIFICITY[existing.source.kind]) {
        byId.set(candidate.canonicalId, candidate);
      }
    };

    for (const spec of specs) {
      const matches = await this.expand(spec);
      if (matches.length === 0) {
        unresolved.push(spec);
        continue;
      }
      for (const match of matches) keep(match);
    }

    return { resolved: [...byId.values()], unresolved };
  }

  private async expand(spec: TargetSpec): Promise<ResolvedTarget[]> {
    switch (spec.kind) {
      case "id": {
        const id = spec.id.trim();
        return id ? [{ canonicalId: id, label: id, source: spec }] : [];
      }
      case "address": {
        const canonicalId = await this.lookup(spec, () => this.inventory.lookupByAddress(spec.address));
        return canonicalId ? [{ canonicalId, label: spec.address, source: spec }] : [];
      }
      case "tag": {
        const entries = await this.lookup(spec, () => this.inventory.lookupByTag(spec.key, spec.value));
        return entries
          .filter((entry) => ACTIVE_STATES.has(entry.lifecycleState.toLowerCase()))
          .map((entry) => ({ canonicalId: entry.canonicalId, label: entry.label, source: spec }));
      }
    }
  }

  private async lookup<T>(spec: TargetSpec, query: () => Promise<T>): Promise<T> {
    try {
      return await query();
    } catch (error) {
      throw new ResolutionError(`inventory lookup failed for ${describeSpec(spec)}: ${errorMessage(error)}`, {
        cause: error
      });
    }
  }
}
