#!/usr/bin/env node

import process from "node:process";

import { Command, CommanderError } from "commander";

import { BusConnectionError } from "./bus/errors.js";
import { ProcessContext } from "./service/context.js";
import { EXIT_CODES, runProxyService } from "./service/lifecycle.js";
import { DisplayableError, toErrorMessage } from "./utils/errors.js";
import { createLogger, formatLogLine, type Logger } from "./utils/log.js";
import { getProxyVersion } from "./utils/version.js";

const SHUTDOWN_SIGNALS: readonly NodeJS.Signals[] = [
  "SIGHUP",
  "SIGINT",
  "SIGTERM",
];

export interface CliOptions {
  replace: boolean;
  verbose: boolean;
}

export function createProgram(): Command {
  return new Command()
    .name("native-messaging-proxy")
    .description(
      [
        "Expose native messaging hosts to sandboxed browsers over the session bus.",
        "",
        "Any client on the session bus may launch any installed host; this",
        "service adds no access control of its own.",
      ].join("\n"),
    )
    .version(getProxyVersion(), "--version", "print the proxy version")
    .option("-r, --replace", "replace a running instance", false)
    .option("--verbose", "print debug information", false)
    .allowExcessArguments(false)
    .exitOverride();
}

/**
 * Parses argv. Returns an exit status instead of options when parsing ends
 * the run (`--help`, `--version`, bad flags).
 */
export function parseCliOptions(
  argv: readonly string[],
  program: Command = createProgram(),
): CliOptions | number {
  try {
    program.parse([...argv]);
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  const opts = program.opts<{ replace?: boolean; verbose?: boolean }>();
  return {
    replace: opts.replace === true,
    verbose: opts.verbose === true,
  };
}

export async function runCli(
  argv: readonly string[] = process.argv,
  context: ProcessContext = new ProcessContext(),
): Promise<number> {
  const parsed = parseCliOptions(argv);
  if (typeof parsed === "number") {
    return parsed;
  }

  const logger = createLogger({ verbose: parsed.verbose });
  try {
    return await runProxyService({ replace: parsed.replace, logger }, context);
  } catch (error) {
    reportFailure(logger, error);
    return error instanceof BusConnectionError
      ? EXIT_CODES.busUnavailable
      : EXIT_CODES.failure;
  }
}

export function reportFailure(logger: Logger, error: unknown): void {
  if (!(error instanceof DisplayableError)) {
    logger.error(toErrorMessage(error));
    return;
  }
  logger.error(error.messageForDisplay());
  for (const line of error.detailLines) {
    logger.error(`  ${line}`);
  }
  for (const line of error.hintLines) {
    logger.info(line);
  }
}

export function installProcessGuards(context: ProcessContext): void {
  for (const signal of SHUTDOWN_SIGNALS) {
    process.on(signal, () => {
      context.requestExit(EXIT_CODES.success);
    });
  }

  process.on("uncaughtException", (error) => {
    console.error(
      formatLogLine("error", `Uncaught exception: ${toErrorMessage(error)}`),
    );
    context.requestExit(EXIT_CODES.failure);
  });

  process.on("unhandledRejection", (reason) => {
    console.error(
      formatLogLine("error", `Unhandled rejection: ${toErrorMessage(reason)}`),
    );
    context.requestExit(EXIT_CODES.failure);
  });
}

async function main(): Promise<void> {
  const context = new ProcessContext();
  installProcessGuards(context);
  const status = await runCli(process.argv, context);
  process.exit(status);
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(formatLogLine("error", toErrorMessage(error)));
    process.exit(EXIT_CODES.failure);
  });
}
