import { TargetNotRegisteredError, errorMessage } from "../errors.js";
import type { Logger } from "../log.js";
import type { CommandBatch, ExecutionChannel, ResolvedTarget, RoundProgress, TargetOutcome } from "../types.js";
import { mapWithConcurrency, sleep, truncate, watchAbort } from "../util.js";
import { OutcomeLedger, type RoundReport } from "./ledger.js";
import { DETAIL_LIMIT, classifyStatus } from "./status.js";

export const DEFAULT_POLL_INTERVAL_MS = 10_000;
export const DEFAULT_MAX_ATTEMPTS = 30;
export const DEFAULT_CONCURRENCY = 8;

export interface ConvergeOptions {
  pollIntervalMs?: number;
  maxAttempts?: number;
  concurrency?: number;
  signal?: AbortSignal;
  onRound?: (progress: RoundProgress) => void;
}

export class ConvergencePoller {
  constructor(
    private readonly channel: ExecutionChannel,
    private readonly logger: Logger
  ) {}

  async converge(batch: CommandBatch, options: ConvergeOptions = {}): Promise<Map<string, TargetOutcome>> {
    const pollIntervalMs = Math.max(0, options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS);
    const maxAttempts = Math.max(1, Math.floor(options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS));
    const concurrency = Math.max(1, Math.floor(options.concurrency ?? DEFAULT_CONCURRENCY));
    const { signal } = options;

    const ledger = new OutcomeLedger(batch.targets);
    const abort = watchAbort(signal);
    let rounds = 0;

    try {
      while (rounds < maxAttempts && !ledger.settled() && !signal?.aborted) {
        if (rounds > 0) {
          await sleep(pollIntervalMs, signal);
          if (signal?.aborted) break;
        }
        rounds += 1;

        const targets = ledger.pending();
        const reports = await Promise.race([
          this.pollRound(batch.batchId, targets, concurrency, signal),
          abort.aborted.then(() => undefined)
        ]);
        if (!reports) break;

        // single merge point per round
        for (const report of reports) ledger.apply(report);

        const remaining = ledger.pending().length;
        options.onRound?.({ round: rounds, maxAttempts, queried: targets.length, remaining });
      }
    } finally {
      abort.dispose();
    }

    if (signal?.aborted) {
      const expired = ledger.expire("cancelled before reaching a terminal status");
      if (expired > 0) this.logger.warn(`batch ${batch.batchId} cancelled with ${expired} target(s) unfinished`);
    } else {
      const expired = ledger.expire(`no terminal status after ${rounds} polling round(s)`);
      if (expired > 0) this.logger.warn(`batch ${batch.batchId}: ${expired} target(s) timed out`);
    }

    return ledger.snapshot();
  }

  private pollRound(
    batchId: string,
    targets: readonly ResolvedTarget[],
    concurrency: number,
    signal: AbortSignal | undefined
  ): Promise<RoundReport[]> {
    return mapWithConcurrency(targets, concurrency, (target) => this.pollTarget(batchId, target, signal));
  }

  private async pollTarget(
    batchId: string,
    target: ResolvedTarget,
    signal: AbortSignal | undefined
  ): Promise<RoundReport> {
    const { canonicalId } = target;
    const redact = (text: string) => this.logger.redactor.redact(text);
    if (signal?.aborted) {
      return { canonicalId, kind: "retry", message: "cancelled" };
    }
    try {
      const raw = await this.channel.getInvocationStatus(batchId, canonicalId, signal);
      return { canonicalId, kind: "status", ...classifyStatus(raw, redact) };
    } catch (error) {
      if (error instanceof TargetNotRegisteredError) {
        return {
          canonicalId,
          kind: "status",
          status: "Error",
          message: "target not found or not registered with the execution channel"
        };
      }
      return {
        canonicalId,
        kind: "retry",
        message: `retrying: ${truncate(redact(errorMessage(error)), DETAIL_LIMIT)}`
      };
    }
  }
}
