import type { BatchReport } from "./types.js";

export type FleetErrorCode =
  | "RESOLUTION_FAILED"
  | "AVAILABILITY_CHECK_FAILED"
  | "EMPTY_BATCH"
  | "DISPATCH_FAILED"
  | "TARGETS_UNAVAILABLE"
  | "TARGET_NOT_REGISTERED"
  | "INVALID_CONFIG";

export class FleetError extends Error {
  constructor(
    readonly code: FleetErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ResolutionError extends FleetError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("RESOLUTION_FAILED", message, options);
  }
}

export class AvailabilityCheckError extends FleetError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("AVAILABILITY_CHECK_FAILED", message, options);
  }
}

export class EmptyBatchError extends FleetError {
  constructor(
    message: string,
    readonly report?: BatchReport
  ) {
    super("EMPTY_BATCH", message);
  }
}

export class DispatchError extends FleetError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("DISPATCH_FAILED", message, options);
  }
}

export class UnavailableTargetsError extends FleetError {
  constructor(
    message: string,
    readonly report: BatchReport
  ) {
    super("TARGETS_UNAVAILABLE", message);
  }
}

/** Raised by a channel when the queried target is unknown to it. */
export class TargetNotRegisteredError extends FleetError {
  constructor(readonly targetId: string) {
    super("TARGET_NOT_REGISTERED", `target not registered: ${targetId}`);
  }
}

export class ConfigError extends FleetError {
  constructor(message: string) {
    super("INVALID_CONFIG", message);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
