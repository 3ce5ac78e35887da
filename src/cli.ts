#!/usr/bin/env node
// src/cli.ts
import { Command } from "commander";
import { cliEntrypoint } from "./cli-util.js";
import { describeConfig, loadConfig, type HotfolderConfig } from "./config.js";
import { CLI_NAME, VERSION } from "./constants.js";
import {
  cliOptsToOverrides,
  configureRunCommand,
  runDaemon,
  type RunCommandOptions,
} from "./daemon.js";
import {
  ConsoleLogger,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
} from "./logger.js";

export type ProgramIo = {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  write?: (text: string) => void;
  makeLogger?: (level: LogLevel) => Logger;
};

function resolveConfig(
  command: Command,
  opts: RunCommandOptions,
  io: ProgramIo,
): HotfolderConfig {
  const { logLevel } = command.optsWithGlobals<{ logLevel?: string }>();
  const overrides = cliOptsToOverrides(opts);
  if (logLevel) overrides.LOG_LEVEL = logLevel;
  return loadConfig(io.env ?? process.env, overrides, io.cwd ?? process.cwd());
}

export function buildProgram(io: ProgramIo = {}): Command {
  const write = io.write ?? ((text: string) => process.stdout.write(text));
  const makeLogger =
    io.makeLogger ?? ((level: LogLevel) => new ConsoleLogger(level, CLI_NAME));

  const program = new Command()
    .name(CLI_NAME)
    .description(
      "Hot-folder client: hands settled media files to a remote compression service",
    )
    .version(VERSION);

  // global flags available to every command
  program.option(
    "--log-level <level>",
    `log verbosity (${LOG_LEVELS.join(", ")})`,
  );

  configureRunCommand(program.command("run")).action(
    async (opts: RunCommandOptions, command: Command) => {
      const config = resolveConfig(command, opts, io);
      await runDaemon(config, { logger: makeLogger(config.logLevel) });
    },
  );

  configureRunCommand(program.command("config"))
    .description("print the effective configuration and exit")
    .action((opts: RunCommandOptions, command: Command) => {
      const config = resolveConfig(command, opts, io);
      write(`${JSON.stringify(describeConfig(config), null, 2)}\n`);
    });

  return program;
}

cliEntrypoint(require.main === module, () => buildProgram(), {
  label: CLI_NAME,
});
