import { inspect } from "node:util";
import type { SecretSource } from "./types.js";

const REDACTED = "[redacted]";

export class Secret {
  // an ECMAScript private field stays out of spreads, Object.entries and structuredClone
  readonly #value: string;

  constructor(value: string) {
    this.#value = value;
  }

  reveal(): string {
    return this.#value;
  }

  toString(): string {
    return REDACTED;
  }

  toJSON(): string {
    return REDACTED;
  }

  [inspect.custom](): string {
    return REDACTED;
  }
}

export class EnvSecretSource implements SecretSource {
  constructor(
    private readonly variable: string,
    private readonly env: NodeJS.ProcessEnv = process.env
  ) {}

  async read(): Promise<Secret> {
    const value = this.env[this.variable];
    if (!value) {
      throw new Error(`secret variable ${this.variable} is not set`);
    }
    return new Secret(value);
  }
}
