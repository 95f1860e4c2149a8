import { EmptyBatchError, UnavailableTargetsError } from "../errors.js";
import { createLogger, type Logger } from "../log.js";
import type {
  AvailabilityResult,
  BatchReport,
  CommandTemplate,
  ExecutionChannel,
  InventoryService,
  TargetSpec
} from "../types.js";
import { nowIso } from "../util.js";
import { aggregate } from "./aggregator.js";
import { AvailabilityChecker, partitionAvailability } from "./availability.js";
import { CommandDispatcher } from "./dispatcher.js";
import { ConvergencePoller, type ConvergeOptions } from "./poller.js";
import { TargetResolver, describeSpec } from "./resolver.js";

export interface BatchRunnerDeps {
  inventory: InventoryService;
  channel: ExecutionChannel;
  logger?: Logger;
}

export interface RunBatchOptions extends ConvergeOptions {
  /** Abort before dispatch when any resolved target is unreachable. */
  requireAllAvailable?: boolean;
}

export async function runBatch(
  deps: BatchRunnerDeps,
  specs: readonly TargetSpec[],
  command: CommandTemplate,
  options: RunBatchOptions = {}
): Promise<BatchReport> {
  const logger = deps.logger ?? createLogger();
  const forget = command.secret ? logger.redactor.register(command.secret) : () => {};

  try {
    const { resolved, unresolved } = await new TargetResolver(deps.inventory).resolve(specs);
    logger.info(`resolved ${resolved.length} target(s) from ${specs.length} selector(s)`);
    for (const spec of unresolved) {
      logger.warn(`could not resolve ${describeSpec(spec)}`);
    }

    const availability: Map<string, AvailabilityResult> =
      resolved.length > 0 ? await new AvailabilityChecker(deps.channel).check(resolved) : new Map();
    const { available, unavailable } = partitionAvailability(availability);
    for (const target of unavailable) {
      logger.warn(`not reachable through the execution channel: ${target.label} (${target.canonicalId})`);
    }

    const partial = () =>
      aggregate({ requested: specs.length, resolved, unresolved, availability, checkedAt: nowIso() });

    if (available.length === 0) {
      throw new EmptyBatchError("none of the requested targets are available", partial());
    }
    if (options.requireAllAvailable && unavailable.length > 0) {
      throw new UnavailableTargetsError(`${unavailable.length} target(s) are unavailable`, partial());
    }

    const batch = await new CommandDispatcher(deps.channel, logger).dispatch(available, command);
    const outcomes = await new ConvergencePoller(deps.channel, logger).converge(batch, options);

    return aggregate({
      requested: specs.length,
      resolved,
      unresolved,
      availability,
      outcomes,
      batchId: batch.batchId,
      checkedAt: batch.issuedAt
    });
  } finally {
    forget();
  }
}
