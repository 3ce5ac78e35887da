// src/cli-util.ts
import type { Command } from "commander";
import { ConfigError } from "./errors.js";

/**
 * Minimal CLI bootstrap:
 * - If this module is the process entry, parse argv and run the action
 * - If imported, do nothing (so tests can build the program themselves)
 *
 * Configuration problems print just the message and exit 2; anything else
 * is reported with its stack and exits 1.
 */
export function cliEntrypoint(
  isMain: boolean,
  buildProgram: () => Command,
  opts?: { label?: string },
): void {
  if (!isMain) return;

  const program = buildProgram();
  program.parseAsync(process.argv).catch((err: unknown) => {
    const label = opts?.label || program.name() || "command";
    if (err instanceof ConfigError) {
      program.error(`${label}: ${err.message}`, {
        exitCode: 2,
        code: "hotfolder.config",
      });
    }
    const msg = err instanceof Error ? (err.stack ?? err.message) : String(err);
    program.error(`${label} fatal:\n${msg}`);
  });
}

/** Handy for tests: run a command with custom argv without process.exit */
export async function parseAndRun(
  buildProgram: () => Command,
  argv: string[],
): Promise<Command> {
  const program = buildProgram();
  program.exitOverride();
  await program.parseAsync(argv, { from: "user" });
  return program;
}
