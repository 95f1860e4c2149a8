import { DispatchError, EmptyBatchError, errorMessage } from "../errors.js";
import type { Logger } from "../log.js";
import type { CommandBatch, CommandTemplate, ExecutionChannel, ResolvedTarget } from "../types.js";
import { nowIso, truncate } from "../util.js";

export class CommandDispatcher {
  constructor(
    private readonly channel: ExecutionChannel,
    private readonly logger: Logger
  ) {}

  async dispatch(targets: readonly ResolvedTarget[], command: CommandTemplate): Promise<CommandBatch> {
    if (targets.length === 0) {
      throw new EmptyBatchError("no available targets to dispatch to");
    }

    const targetIds = targets.map((target) => target.canonicalId);
    let batchId: string;
    try {
      batchId = await this.channel.submitBatch(targetIds, command);
    } catch (error) {
      const reason = truncate(this.logger.redactor.redact(errorMessage(error)), 200);
      throw new DispatchError(`command submission rejected: ${reason}`, { cause: error });
    }

    this.logger.info(`dispatched batch ${batchId} to ${targets.length} target(s)`);
    return Object.freeze({
      batchId,
      commandText: command.text,
      targets: Object.freeze([...targets]),
      issuedAt: nowIso()
    });
  }
}
