import { EC2Client, paginateDescribeInstances, type Filter, type Instance } from "@aws-sdk/client-ec2";
import type { InventoryEntry, InventoryService } from "../types.js";

export interface AwsClientOptions {
  region?: string;
}

/** EC2 instances as the fleet inventory: instance id is the canonical id. */
export class Ec2Inventory implements InventoryService {
  private readonly client: EC2Client;

  constructor(options: AwsClientOptions = {}, client?: EC2Client) {
    this.client = client ?? new EC2Client({ region: options.region });
  }

  async lookupByAddress(address: string): Promise<string | undefined> {
    const instances = await this.describe([
      { Name: "private-ip-address", Values: [address] },
      { Name: "instance-state-name", Values: ["running"] }
    ]);
    return instances.find((instance) => instance.PrivateIpAddress === address)?.InstanceId;
  }

  async lookupByTag(key: string, value: string): Promise<InventoryEntry[]> {
    const instances = await this.describe([{ Name: `tag:${key}`, Values: [value] }]);
    const entries: InventoryEntry[] = [];
    for (const instance of instances) {
      if (!instance.InstanceId) continue;
      entries.push({
        canonicalId: instance.InstanceId,
        label: instanceLabel(instance),
        lifecycleState: instance.State?.Name ?? "unknown"
      });
    }
    return entries;
  }

  private async describe(filters: Filter[]): Promise<Instance[]> {
    const instances: Instance[] = [];
    for await (const page of paginateDescribeInstances({ client: this.client }, { Filters: filters })) {
      for (const reservation of page.Reservations ?? []) {
        instances.push(...(reservation.Instances ?? []));
      }
    }
    return instances;
  }
}

export function instanceLabel(instance: Instance): string {
  const name = instance.Tags?.find((tag) => tag.Key === "Name")?.Value || "Unnamed";
  return `${name} (${instance.PrivateIpAddress ?? "no ip"})`;
}
