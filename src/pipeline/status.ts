import type { InvocationStatus, TargetStatus } from "../types.js";
import { truncate } from "../util.js";

export const DETAIL_LIMIT = 200;

const SUCCESS = new Set(["success"]);
const FAILURE = new Set(["failed", "cancelled", "timedout"]);
const ACTIVE = new Set(["inprogress", "delayed", "cancelling"]);

export interface StatusUpdate {
  status: TargetStatus;
  message: string;
}

/** Maps the channel's raw invocation status onto the per-target state machine. */
export function classifyStatus(raw: InvocationStatus, redact: (text: string) => string = (text) => text): StatusUpdate {
  const code = raw.status.trim();
  const key = code.toLowerCase();
  if (SUCCESS.has(key)) {
    return { status: "Succeeded", message: "completed successfully" };
  }
  if (FAILURE.has(key)) {
    const detail = raw.detail?.trim() || "unknown error";
    return { status: "Failed", message: `${code}: ${truncate(redact(detail), DETAIL_LIMIT)}` };
  }
  if (key === "pending") {
    return { status: "Pending", message: "waiting for the target to pick up the command" };
  }
  if (ACTIVE.has(key)) {
    return { status: "InProgress", message: `running (${code})` };
  }
  return { status: "Error", message: `unrecognized status: ${truncate(redact(code), DETAIL_LIMIT)}` };
}
