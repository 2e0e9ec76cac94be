import { Command, CommanderError, InvalidArgumentError, Option } from "commander";

import { createTableCommand } from "./commands/create-table";
import { issueCommand } from "./commands/issue";
import { revokeCommand } from "./commands/revoke";
import { revokeUserCommand } from "./commands/revoke-user";
import { sweepCommand } from "./commands/sweep";
import { sweeperCommand } from "./commands/sweeper";
import { validateCommand } from "./commands/validate";
import { readStream } from "./utils/payload";

export type RunParameters = {
  argv: string[];
  env: NodeJS.ProcessEnv;
  stdin: NodeJS.ReadableStream;
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
  // Stops long-running commands; defaults to SIGINT and SIGTERM.
  signal?: AbortSignal;
};

function parseSeconds(value: string): number {
  const seconds = Number(value);
  if (!Number.isInteger(seconds) || seconds <= 0) {
    throw new InvalidArgumentError("Must be a positive whole number of seconds.");
  }
  return seconds;
}

function processShutdownSignal(): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const abort = () => controller.abort();
  process.once("SIGINT", abort);
  process.once("SIGTERM", abort);
  return {
    signal: controller.signal,
    dispose: () => {
      process.off("SIGINT", abort);
      process.off("SIGTERM", abort);
    },
  };
}

export async function run(params: RunParameters): Promise<number> {
  const { env } = params;

  const connectionOptions = () => [
    new Option("--table <name>", "DynamoDB table name (default: session-tokens)"),
    new Option("--endpoint <url>", "DynamoDB endpoint URL"),
    new Option("--region <region>", "AWS region (default: us-east-1)"),
    new Option(
      "--config-dir <path>",
      "Config directory (default: ~/.session-tokens)",
    ),
  ];

  const outputOptions = () => [
    new Option("--verbose", "Verbose output"),
    new Option("--quiet", "Minimal output"),
  ];

  const jsonOption = () => new Option("--json", "Output as JSON");

  let exitCode = 0;

  function configureCommandOutput(cmd: Command): void {
    cmd.configureOutput({
      writeOut: (str) => params.stdout.write(str),
      writeErr: (str) => params.stderr.write(str),
      outputError: (str, write) => write(str),
    });
  }

  // Keeps commander from calling process.exit.
  function configureExitOverride(cmd: Command): void {
    cmd.exitOverride((err) => {
      exitCode = err.exitCode ?? 1;
      throw err;
    });
  }

  function addOptions(command: Command, options: Option[]): Command {
    options.forEach((opt) => command.addOption(opt));
    configureCommandOutput(command);
    configureExitOverride(command);
    return command;
  }

  const program = new Command();

  program
    .name("session-tokens")
    .description("CLI for managing session tokens in DynamoDB");

  addOptions(
    program
      .command("create-table")
      .description("Create the token table if it does not exist"),
    [...connectionOptions(), ...outputOptions()],
  ).action(async (options: Parameters<typeof createTableCommand>[0]) => {
    await createTableCommand(options, env);
  });

  addOptions(
    program
      .command("issue")
      .description("Issue a new token")
      .requiredOption(
        "--payload <json>",
        "JSON payload stored with the token ('-' reads stdin)",
      ),
    [...connectionOptions(), ...outputOptions(), jsonOption()],
  ).action(async (options: Parameters<typeof issueCommand>[0]) => {
    const payload =
      options.payload === "-" ? await readStream(params.stdin) : options.payload;
    await issueCommand({ ...options, payload }, env);
  });

  addOptions(
    program
      .command("validate")
      .description("Validate a token, exiting with code 1 if it is not valid")
      .requiredOption("--token <token>", "Token to validate")
      .option("--renew", "Renew the token if it is past the renewal threshold"),
    [...connectionOptions(), ...outputOptions(), jsonOption()],
  ).action(async (options: Parameters<typeof validateCommand>[0]) => {
    await validateCommand(options, env);
  });

  addOptions(
    program
      .command("revoke")
      .description("Revoke a token")
      .requiredOption("--token <token>", "Token to revoke"),
    [...connectionOptions(), ...outputOptions()],
  ).action(async (options: Parameters<typeof revokeCommand>[0]) => {
    await revokeCommand(options, env);
  });

  addOptions(
    program
      .command("revoke-user")
      .description("Revoke every token issued to a user")
      .requiredOption("--user-id <id>", "Value of the payload's user_id"),
    [...connectionOptions(), ...outputOptions(), jsonOption()],
  ).action(async (options: Parameters<typeof revokeUserCommand>[0]) => {
    await revokeUserCommand(options, env);
  });

  addOptions(
    program.command("sweep").description("Delete expired tokens once"),
    [...connectionOptions(), ...outputOptions(), jsonOption()],
  ).action(async (options: Parameters<typeof sweepCommand>[0]) => {
    await sweepCommand(options, env);
  });

  addOptions(
    program
      .command("sweeper")
      .description("Delete expired tokens periodically until interrupted")
      .option(
        "--interval <seconds>",
        "Seconds between sweeps (default: half the TTL, at least 30)",
        parseSeconds,
      ),
    [...connectionOptions(), ...outputOptions()],
  ).action(async (options: Parameters<typeof sweeperCommand>[0]) => {
    if (params.signal) {
      await sweeperCommand(options, params.signal, env);
      return;
    }

    const shutdown = processShutdownSignal();
    try {
      await sweeperCommand(options, shutdown.signal, env);
    } finally {
      shutdown.dispose();
    }
  });

  configureCommandOutput(program);
  configureExitOverride(program);

  try {
    await program.parseAsync(params.argv, { from: "user" });
  } catch (err) {
    // Commander errors were reported and exitCode set by exitOverride.
    if (!(err instanceof CommanderError)) {
      params.stderr.write(
        `Error: ${err instanceof Error ? err.message : String(err)}\n`,
      );
      exitCode = 1;
    }
  }

  return exitCode;
}
