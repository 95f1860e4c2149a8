import type { Secret } from "./secret.js";

export type TargetSpec =
  | { kind: "id"; id: string }
  | { kind: "address"; address: string }
  | { kind: "tag"; key: string; value: string };

export interface ResolvedTarget {
  readonly canonicalId: string;
  readonly label: string;
  readonly source: TargetSpec;
}

export interface ResolutionResult {
  resolved: ResolvedTarget[];
  unresolved: TargetSpec[];
}

export interface AvailabilityResult {
  target: ResolvedTarget;
  reachable: boolean;
}

export interface CommandTemplate {
  /** Text the channel runs on each target. Must not embed secret material. */
  text: string;
  parameters?: Record<string, string>;
  /** Delivered through the channel's parameter primitive, never spliced into `text`. */
  secret?: Secret;
  comment?: string;
}

export interface CommandBatch {
  readonly batchId: string;
  readonly commandText: string;
  readonly targets: readonly ResolvedTarget[];
  readonly issuedAt: string;
}

export type TargetStatus =
  | "Pending"
  | "InProgress"
  | "Succeeded"
  | "Failed"
  | "Error"
  | "Unavailable"
  | "TimedOut";

export const TERMINAL_STATUSES: ReadonlySet<TargetStatus> = new Set<TargetStatus>([
  "Succeeded",
  "Failed",
  "Error",
  "Unavailable",
  "TimedOut"
]);

export function isTerminal(status: TargetStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

export interface TargetOutcome {
  target: ResolvedTarget;
  status: TargetStatus;
  message: string;
  lastCheckedAt: string;
  attempts: number;
}

export interface BatchReport {
  batchId?: string;
  requested: number;
  resolved: number;
  available: number;
  succeeded: number;
  failed: number;
  perTarget: Record<string, TargetOutcome>;
  unresolved: TargetSpec[];
  unavailable: ResolvedTarget[];
}

export interface InventoryEntry {
  canonicalId: string;
  label: string;
  lifecycleState: string;
}

export interface InventoryService {
  lookupByAddress(address: string): Promise<string | undefined>;
  lookupByTag(key: string, value: string): Promise<InventoryEntry[]>;
}

export interface InvocationStatus {
  status: string;
  detail?: string;
}

export interface ExecutionChannel {
  listRegisteredTargets(): AsyncIterable<string>;
  submitBatch(targetIds: readonly string[], command: CommandTemplate): Promise<string>;
  getInvocationStatus(batchId: string, targetId: string, signal?: AbortSignal): Promise<InvocationStatus>;
}

export interface SecretSource {
  read(): Promise<Secret>;
}

export interface RoundProgress {
  round: number;
  maxAttempts: number;
  queried: number;
  remaining: number;
}
