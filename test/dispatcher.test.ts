import { describe, expect, it } from "vitest";
import { DispatchError, EmptyBatchError } from "../src/errors.js";
import { createMemoryLogger } from "../src/log.js";
import { CommandDispatcher } from "../src/pipeline/dispatcher.js";
import { Secret } from "../src/secret.js";
import { FakeChannel, target } from "./fakes.js";

describe("CommandDispatcher", () => {
  it("refuses an empty target set without submitting", async () => {
    const channel = new FakeChannel();
    const dispatcher = new CommandDispatcher(channel, createMemoryLogger());
    await expect(dispatcher.dispatch([], { text: "uptime" })).rejects.toThrow(EmptyBatchError);
    expect(channel.submitted).toEqual([]);
  });

  it("submits once for the whole set and returns a frozen batch", async () => {
    const channel = new FakeChannel();
    const logger = createMemoryLogger();
    const batch = await new CommandDispatcher(channel, logger).dispatch([target("i-1"), target("i-2")], {
      text: "uptime"
    });

    expect(channel.submitted).toEqual([{ targetIds: ["i-1", "i-2"], command: { text: "uptime" } }]);
    expect(batch.batchId).toBe("cmd-1");
    expect(batch.commandText).toBe("uptime");
    expect(batch.targets.map((t) => t.canonicalId)).toEqual(["i-1", "i-2"]);
    expect(Object.isFrozen(batch)).toBe(true);
    expect(logger.lines).toEqual([{ level: "info", message: "[fleetcmd] dispatched batch cmd-1 to 2 target(s)" }]);
  });

  it("wraps submission failures in DispatchError with secrets redacted", async () => {
    const channel = new FakeChannel();
    channel.submitError = new Error("ValidationException: parameter value test-secret rejected");
    const logger = createMemoryLogger();
    const secret = new Secret("test-secret");
    logger.redactor.register(secret);

    const dispatch = new CommandDispatcher(channel, logger).dispatch([target("i-1")], { text: "chpasswd", secret });
    await expect(dispatch).rejects.toThrow(DispatchError);
    await expect(dispatch).rejects.toThrow(
      "command submission rejected: ValidationException: parameter value *** rejected"
    );
  });
});
