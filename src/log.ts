import type { Secret } from "./secret.js";

export type LogLevel = "info" | "warn" | "error";

export interface LogLine {
  level: LogLevel;
  message: string;
}

export class Redactor {
  private readonly values = new Set<string>();

  register(secret: Secret): () => void {
    const value = secret.reveal();
    if (!value) return () => {};
    this.values.add(value);
    return () => {
      this.values.delete(value);
    };
  }

  redact(text: string): string {
    let out = text;
    for (const value of this.values) {
      out = out.split(value).join("***");
    }
    return out;
  }
}

export interface Logger {
  readonly redactor: Redactor;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

type Write = (level: LogLevel, line: string) => void;

class PrefixedLogger implements Logger {
  readonly redactor = new Redactor();

  constructor(
    private readonly prefix: string,
    private readonly write: Write
  ) {}

  info(message: string): void {
    this.emit("info", message);
  }

  warn(message: string): void {
    this.emit("warn", message);
  }

  error(message: string): void {
    this.emit("error", message);
  }

  private emit(level: LogLevel, message: string): void {
    this.write(level, `[${this.prefix}] ${this.redactor.redact(message)}`);
  }
}

export function createLogger(prefix = "fleetcmd"): Logger {
  return new PrefixedLogger(prefix, (level, line) => {
    if (level === "info") {
      process.stdout.write(`${line}\n`);
    } else {
      process.stderr.write(`${line}\n`);
    }
  });
}

export interface MemoryLogger extends Logger {
  readonly lines: LogLine[];
}

export function createMemoryLogger(prefix = "fleetcmd"): MemoryLogger {
  const lines: LogLine[] = [];
  const logger = new PrefixedLogger(prefix, (level, message) => {
    lines.push({ level, message });
  });
  return Object.assign(logger, { lines });
}
