import { parseArgs } from "node:util";
import { Ec2Inventory } from "./aws/ec2-inventory.js";
import { SsmChannel } from "./aws/ssm-channel.js";
import { configFromEnv, type FleetConfig } from "./config.js";
import { EmptyBatchError, UnavailableTargetsError } from "./errors.js";
import type { Logger } from "./log.js";
import { AvailabilityChecker, partitionAvailability } from "./pipeline/availability.js";
import { TargetResolver, describeSpec } from "./pipeline/resolver.js";
import { runBatch, type BatchRunnerDeps } from "./pipeline/run-batch.js";
import { exitCodeFor, formatReport } from "./report.js";
import { EnvSecretSource } from "./secret.js";
import { parseSelector, readSelectorsFile } from "./selectors.js";
import type { CommandTemplate, TargetSpec } from "./types.js";

export const HELP = `fleetcmd - run one administrative command across a fleet

Usage:
  fleetcmd run --command <text> [targets] [--secret-env VAR] [--comment <text>] [--strict]
  fleetcmd set-password --user <name> --secret-env VAR [targets]
  fleetcmd check [targets]

Targets:
  --target <selector>     repeatable; tag:Key=Value, an IP address, or an instance id
  --targets-file <path>   one selector per line, # for comments

Environment:
  FLEETCMD_POLL_MS=10000
  FLEETCMD_MAX_ATTEMPTS=30
  FLEETCMD_CONCURRENCY=8
  FLEETCMD_SSM_DOCUMENT=AWS-RunShellScript
  FLEETCMD_SSM_SECRET_DOCUMENT=<document taking a secret parameter>
  AWS_REGION=<region>
`;

export interface CommandContext {
  env: NodeJS.ProcessEnv;
  logger: Logger;
  print: (line: string) => void;
  /** Overrides the AWS-backed collaborators. */
  deps?: (config: FleetConfig) => Omit<BatchRunnerDeps, "logger">;
  signal?: AbortSignal;
}

const OPTIONS = {
  target: { type: "string", multiple: true },
  "targets-file": { type: "string", multiple: true },
  command: { type: "string" },
  user: { type: "string" },
  "secret-env": { type: "string" },
  comment: { type: "string" },
  strict: { type: "boolean" },
  help: { type: "boolean", short: "h" }
} as const;

function parse(argv: string[]) {
  return parseArgs({ args: argv, options: OPTIONS, allowPositionals: true });
}

type ParsedValues = ReturnType<typeof parse>["values"];

function collectTargets(values: ParsedValues): TargetSpec[] {
  const specs = (values.target ?? []).map(parseSelector);
  for (const file of values["targets-file"] ?? []) {
    specs.push(...readSelectorsFile(file));
  }
  if (specs.length === 0) {
    throw new Error("at least one --target or --targets-file is required");
  }
  return specs;
}

function awsDeps(config: FleetConfig): Omit<BatchRunnerDeps, "logger"> {
  return {
    inventory: new Ec2Inventory({ region: config.region }),
    channel: new SsmChannel({
      region: config.region,
      documentName: config.documentName,
      secretDocumentName: config.secretDocumentName
    })
  };
}

async function buildCommand(name: string, values: ParsedValues, env: NodeJS.ProcessEnv): Promise<CommandTemplate> {
  const secretVar = values["secret-env"];
  const secret = secretVar ? await new EnvSecretSource(secretVar, env).read() : undefined;

  if (name === "set-password") {
    const user = values.user?.trim();
    if (!user) throw new Error("set-password requires --user");
    if (!secret) throw new Error("set-password requires --secret-env");
    return {
      text: "chpasswd",
      parameters: { username: user },
      secret,
      comment: values.comment ?? `Update password for user ${user}`
    };
  }

  const text = values.command?.trim();
  if (!text) throw new Error("run requires --command");
  return { text, secret, comment: values.comment };
}

/** Runs one CLI invocation and returns the process exit code. */
export async function runCommand(argv: string[], context: CommandContext): Promise<number> {
  const { values, positionals } = parse(argv);
  const [name] = positionals;

  if (!name || values.help) {
    context.print(HELP);
    return 0;
  }
  if (name !== "run" && name !== "set-password" && name !== "check") {
    throw new Error(`unknown command: ${name}`);
  }

  const config = configFromEnv(context.env);
  const deps = (context.deps ?? awsDeps)(config);
  const specs = collectTargets(values);

  if (name === "check") {
    return check(specs, deps, context);
  }

  const command = await buildCommand(name, values, context.env);
  try {
    const report = await runBatch({ ...deps, logger: context.logger }, specs, command, {
      pollIntervalMs: config.pollIntervalMs,
      maxAttempts: config.maxAttempts,
      concurrency: config.concurrency,
      requireAllAvailable: values.strict ?? false,
      signal: context.signal,
      onRound: ({ round, maxAttempts, remaining }) =>
        context.logger.info(`checking status... ${round}/${maxAttempts} (${remaining} pending)`)
    });
    formatReport(report).forEach((line) => context.print(line));
    return exitCodeFor(report);
  } catch (error) {
    if ((error instanceof EmptyBatchError || error instanceof UnavailableTargetsError) && error.report) {
      context.logger.error(error.message);
      formatReport(error.report).forEach((line) => context.print(line));
      return 1;
    }
    throw error;
  }
}

async function check(
  specs: TargetSpec[],
  deps: Omit<BatchRunnerDeps, "logger">,
  context: CommandContext
): Promise<number> {
  const { resolved, unresolved } = await new TargetResolver(deps.inventory).resolve(specs);
  const availability = await new AvailabilityChecker(deps.channel).check(resolved);
  const { available, unavailable } = partitionAvailability(availability);

  context.print(`available ${available.length}/${resolved.length}`);
  for (const target of available) context.print(`  + ${target.label} (${target.canonicalId})`);
  for (const target of unavailable) context.print(`  - ${target.label} (${target.canonicalId}) unavailable`);
  for (const spec of unresolved) context.print(`  ? ${describeSpec(spec)} unresolved`);

  return unavailable.length === 0 && unresolved.length === 0 && available.length > 0 ? 0 : 1;
}
