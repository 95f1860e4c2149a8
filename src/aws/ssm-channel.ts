import {
  GetCommandInvocationCommand,
  SSMClient,
  SendCommandCommand,
  paginateDescribeInstanceInformation
} from "@aws-sdk/client-ssm";
import { TargetNotRegisteredError } from "../errors.js";
import type { CommandTemplate, ExecutionChannel, InvocationStatus } from "../types.js";
import { truncate } from "../util.js";
import type { AwsClientOptions } from "./ec2-inventory.js";

// SendCommand accepts at most 50 instance ids per call
export const MAX_TARGETS_PER_COMMAND = 50;

export interface SsmChannelOptions extends AwsClientOptions {
  documentName?: string;
  /** Document taking `commands` plus a `secret` parameter; required for secret-bearing commands. */
  secretDocumentName?: string;
}

export class SsmChannel implements ExecutionChannel {
  private readonly client: SSMClient;
  private readonly documentName: string;
  private readonly secretDocumentName?: string;

  constructor(options: SsmChannelOptions = {}, client?: SSMClient) {
    this.client = client ?? new SSMClient({ region: options.region });
    this.documentName = options.documentName ?? "AWS-RunShellScript";
    this.secretDocumentName = options.secretDocumentName;
  }

  async *listRegisteredTargets(): AsyncIterable<string> {
    for await (const page of paginateDescribeInstanceInformation({ client: this.client }, {})) {
      for (const info of page.InstanceInformationList ?? []) {
        if (info.InstanceId && info.PingStatus === "Online") {
          yield info.InstanceId;
        }
      }
    }
  }

  async submitBatch(targetIds: readonly string[], command: CommandTemplate): Promise<string> {
    if (targetIds.length > MAX_TARGETS_PER_COMMAND) {
      throw new Error(`SSM accepts at most ${MAX_TARGETS_PER_COMMAND} targets per command, got ${targetIds.length}`);
    }

    const parameters: Record<string, string[]> = { commands: [command.text] };
    for (const [key, value] of Object.entries(command.parameters ?? {})) {
      parameters[key] = [value];
    }

    let documentName = this.documentName;
    if (command.secret) {
      if (!this.secretDocumentName) {
        throw new Error("secret-bearing commands need a document that accepts a secret parameter");
      }
      documentName = this.secretDocumentName;
      parameters.secret = [command.secret.reveal()];
    }

    const response = await this.client.send(
      new SendCommandCommand({
        InstanceIds: [...targetIds],
        DocumentName: documentName,
        Parameters: parameters,
        Comment: command.comment ? truncate(command.comment, 100) : undefined
      })
    );
    const commandId = response.Command?.CommandId;
    if (!commandId) {
      throw new Error("SendCommand returned no command id");
    }
    return commandId;
  }

  async getInvocationStatus(batchId: string, targetId: string, signal?: AbortSignal): Promise<InvocationStatus> {
    if (signal?.aborted) {
      throw new Error("status query aborted");
    }
    try {
      const result = await this.client.send(
        new GetCommandInvocationCommand({ CommandId: batchId, InstanceId: targetId }),
        { abortSignal: signal }
      );
      return {
        status: result.Status ?? "Pending",
        detail: result.StandardErrorContent || result.StatusDetails
      };
    } catch (error) {
      if (error instanceof Error && error.name === "InvalidInstanceId") {
        throw new TargetNotRegisteredError(targetId);
      }
      throw error;
    }
  }
}
