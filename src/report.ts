import { describeSpec } from "./pipeline/resolver.js";
import type { BatchReport } from "./types.js";

export function formatReport(report: BatchReport): string[] {
  const lines: string[] = [];
  if (report.batchId) lines.push(`batch ${report.batchId}`);
  lines.push(
    `requested ${report.requested}, resolved ${report.resolved}, available ${report.available}`,
    `succeeded ${report.succeeded}/${report.available}, failed ${report.failed}/${report.available}`
  );

  const failures = Object.values(report.perTarget).filter(
    (outcome) => outcome.status !== "Succeeded" && outcome.status !== "Unavailable"
  );
  if (failures.length > 0) {
    lines.push("failed targets:");
    for (const outcome of failures) {
      lines.push(`  - ${outcome.target.label} (${outcome.target.canonicalId}): ${outcome.status} - ${outcome.message}`);
    }
  }

  if (report.unavailable.length > 0) {
    lines.push("unavailable targets:");
    for (const target of report.unavailable) {
      lines.push(`  - ${target.label} (${target.canonicalId})`);
    }
  }

  if (report.unresolved.length > 0) {
    lines.push("unresolved selectors:");
    for (const spec of report.unresolved) {
      lines.push(`  - ${describeSpec(spec)}`);
    }
  }
  return lines;
}

/** Unreachable targets do not count as failures; `--strict` makes them fatal before dispatch. */
export function exitCodeFor(report: BatchReport): number {
  return report.failed === 0 ? 0 : 1;
}
