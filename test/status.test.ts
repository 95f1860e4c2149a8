import { describe, expect, it } from "vitest";
import { classifyStatus } from "../src/pipeline/status.js";

describe("classifyStatus", () => {
  it("maps the channel vocabulary onto target statuses", () => {
    const cases: Array<[string, string]> = [
      ["Success", "Succeeded"],
      ["Failed", "Failed"],
      ["Cancelled", "Failed"],
      ["TimedOut", "Failed"],
      ["Pending", "Pending"],
      ["InProgress", "InProgress"],
      ["Delayed", "InProgress"],
      ["Cancelling", "InProgress"],
      ["success", "Succeeded"],
      ["Undeliverable", "Error"]
    ];
    for (const [raw, expected] of cases) {
      expect(classifyStatus({ status: raw }).status, raw).toBe(expected);
    }
  });

  it("carries the failure detail", () => {
    expect(classifyStatus({ status: "Failed", detail: "chpasswd: user 'bob' does not exist\n" })).toEqual({
      status: "Failed",
      message: "Failed: chpasswd: user 'bob' does not exist"
    });
    expect(classifyStatus({ status: "Failed" }).message).toBe("Failed: unknown error");
  });

  it("truncates long details", () => {
    const update = classifyStatus({ status: "Failed", detail: "x".repeat(500) });
    expect(update.message).toBe(`Failed: ${"x".repeat(197)}...`);
  });

  it("redacts failure details", () => {
    const update = classifyStatus({ status: "Failed", detail: "bad input hunter2" }, (text) =>
      text.replace("hunter2", "***")
    );
    expect(update.message).toBe("Failed: bad input ***");
  });

  it("names unrecognized codes", () => {
    expect(classifyStatus({ status: "Exploded" })).toEqual({
      status: "Error",
      message: "unrecognized status: Exploded"
    });
  });
});
