import { describe, expect, it } from "vitest";
import { EmptyBatchError, ResolutionError, UnavailableTargetsError } from "../src/errors.js";
import { createMemoryLogger } from "../src/log.js";
import { runBatch } from "../src/pipeline/run-batch.js";
import { Secret } from "../src/secret.js";
import { FakeChannel, FakeInventory } from "./fakes.js";

describe("runBatch", () => {
  it("reports two reachable targets that succeed on the first poll", async () => {
    const channel = new FakeChannel().script("i-1", { status: "Success" }).script("i-2", { status: "Success" });
    channel.registered = ["i-1", "i-2"];
    const report = await runBatch(
      { inventory: new FakeInventory(), channel, logger: createMemoryLogger() },
      [
        { kind: "id", id: "i-1" },
        { kind: "id", id: "i-2" }
      ],
      { text: "uptime" },
      { pollIntervalMs: 0 }
    );

    expect(report).toMatchObject({ batchId: "cmd-1", requested: 2, resolved: 2, available: 2, succeeded: 2, failed: 0 });
    expect(report.unresolved).toEqual([]);
    expect(report.unavailable).toEqual([]);
  });

  it("aborts without dispatching when nothing resolves", async () => {
    const channel = new FakeChannel();
    const logger = createMemoryLogger();
    const run = runBatch(
      { inventory: new FakeInventory(), channel, logger },
      [{ kind: "address", address: "10.0.0.5" }],
      { text: "uptime" },
      { pollIntervalMs: 0 }
    );

    const error = await run.then(
      () => undefined,
      (e: unknown) => e
    );
    expect(error).toBeInstanceOf(EmptyBatchError);
    if (!(error instanceof EmptyBatchError)) return;
    expect(error.report).toMatchObject({ requested: 1, resolved: 0, available: 0, succeeded: 0, failed: 0 });
    expect(error.report?.unresolved).toEqual([{ kind: "address", address: "10.0.0.5" }]);
    expect(channel.submitted).toEqual([]);
    expect(channel.listCalls).toBe(0);
    expect(logger.lines).toContainEqual({ level: "warn", message: "[fleetcmd] could not resolve 10.0.0.5" });
  });

  it("dispatches to the reachable subset and marks the rest Unavailable", async () => {
    const inventory = new FakeInventory();
    inventory.tags.set("env=prod", [
      { canonicalId: "i-1", label: "web (10.0.0.1)", lifecycleState: "running" },
      { canonicalId: "i-2", label: "db (10.0.0.2)", lifecycleState: "running" }
    ]);
    const channel = new FakeChannel().script("i-1", { status: "InProgress" }, { status: "Success" });
    channel.registered = ["i-1"];

    const report = await runBatch(
      { inventory, channel, logger: createMemoryLogger() },
      [{ kind: "tag", key: "env", value: "prod" }],
      { text: "uptime" },
      { pollIntervalMs: 0 }
    );

    expect(channel.submitted.map((s) => s.targetIds)).toEqual([["i-1"]]);
    expect(report).toMatchObject({ requested: 1, resolved: 2, available: 1, succeeded: 1, failed: 0 });
    expect(report.succeeded + report.failed).toBe(report.available);
    expect(report.perTarget["i-2"].status).toBe("Unavailable");
    expect(report.unavailable.map((t) => t.label)).toEqual(["db (10.0.0.2)"]);
  });

  it("keeps an unregistered explicit id out of the failure count", async () => {
    const channel = new FakeChannel().script("i-1", { status: "Success" });
    channel.registered = ["i-1"];
    const report = await runBatch(
      { inventory: new FakeInventory(), channel, logger: createMemoryLogger() },
      [
        { kind: "id", id: "i-1" },
        { kind: "id", id: "i-2" }
      ],
      { text: "uptime" },
      { pollIntervalMs: 0 }
    );
    expect(report).toMatchObject({ resolved: 2, available: 1, succeeded: 1, failed: 0 });
    expect(report.perTarget["i-2"]).toMatchObject({ status: "Unavailable", attempts: 0 });
    expect(report.unavailable.map((t) => t.canonicalId)).toEqual(["i-2"]);
  });

  it("times out one target while keeping its sibling's success", async () => {
    const channel = new FakeChannel().script("i-1", { status: "Success" }).script("i-2", { status: "InProgress" });
    channel.registered = ["i-1", "i-2"];
    const report = await runBatch(
      { inventory: new FakeInventory(), channel, logger: createMemoryLogger() },
      [
        { kind: "id", id: "i-1" },
        { kind: "id", id: "i-2" }
      ],
      { text: "uptime" },
      { pollIntervalMs: 0, maxAttempts: 3 }
    );
    expect(report.perTarget["i-1"].status).toBe("Succeeded");
    expect(report.perTarget["i-2"].status).toBe("TimedOut");
    expect(report).toMatchObject({ succeeded: 1, failed: 1 });
  });

  it("refuses to dispatch when all targets are required and one is unreachable", async () => {
    const channel = new FakeChannel();
    channel.registered = ["i-1"];
    const run = runBatch(
      { inventory: new FakeInventory(), channel, logger: createMemoryLogger() },
      [
        { kind: "id", id: "i-1" },
        { kind: "id", id: "i-2" }
      ],
      { text: "uptime" },
      { requireAllAvailable: true }
    );
    await expect(run).rejects.toThrow(UnavailableTargetsError);
    await expect(run).rejects.toThrow("1 target(s) are unavailable");
    expect(channel.submitted).toEqual([]);
  });

  it("stops at resolution failures", async () => {
    const inventory = new FakeInventory();
    inventory.failWith = new Error("timeout");
    const channel = new FakeChannel();
    await expect(
      runBatch(
        { inventory, channel, logger: createMemoryLogger() },
        [{ kind: "address", address: "10.0.0.1" }],
        { text: "uptime" }
      )
    ).rejects.toThrow(ResolutionError);
    expect(channel.listCalls).toBe(0);
  });

  it("hands the secret to the channel without logging or reporting it", async () => {
    const channel = new FakeChannel().script("i-1", { status: "Failed", detail: "rejected test-secret" });
    channel.registered = ["i-1"];
    const logger = createMemoryLogger();
    const secret = new Secret("test-secret");

    const report = await runBatch(
      { inventory: new FakeInventory(), channel, logger },
      [{ kind: "id", id: "i-1" }],
      { text: "chpasswd", parameters: { username: "deploy" }, secret },
      { pollIntervalMs: 0 }
    );

    expect(channel.submitted[0].command.secret?.reveal()).toBe("test-secret");
    expect(report.perTarget["i-1"].message).toBe("Failed: rejected ***");
    expect(JSON.stringify(report)).not.toContain("test-secret");
    expect(logger.lines.map((line) => line.message).join("\n")).not.toContain("test-secret");
    expect(logger.redactor.redact("test-secret")).toBe("test-secret");
  });
});
