import fs from "node:fs";
import { isIP } from "node:net";
import type { TargetSpec } from "./types.js";

/**
 * `tag:Key=Value` selects by tag, an IP address selects by private address and
 * anything else is taken as a canonical id.
 */
export function parseSelector(input: string): TargetSpec {
  const raw = input.trim();
  if (raw.startsWith("tag:")) {
    const body = raw.slice("tag:".length);
    const eq = body.indexOf("=");
    if (eq <= 0) {
      throw new Error(`invalid tag selector: ${raw} (expected tag:Key=Value)`);
    }
    return { kind: "tag", key: body.slice(0, eq).trim(), value: body.slice(eq + 1).trim() };
  }
  if (isIP(raw) !== 0) {
    return { kind: "address", address: raw };
  }
  return { kind: "id", id: raw };
}

export function parseSelectorList(text: string): TargetSpec[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line && !line.startsWith("#"))
    .map(parseSelector);
}

export function readSelectorsFile(filePath: string): TargetSpec[] {
  return parseSelectorList(fs.readFileSync(filePath, "utf8"));
}
