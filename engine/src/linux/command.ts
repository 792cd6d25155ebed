/**
 * tcsetup Engine - Command Runner
 *
 * Spawns system tools, optionally through sudo. Output is captured unless
 * the command is interactive, in which case it shares the terminal.
 */

import { spawn } from "child_process";
import { Logger } from "../utils/logger";
import { ProvisionError } from "../errors";
import { CommandOptions, CommandResult, CommandRunner } from "./types";

export interface SpawnRunnerOptions {
  logger: Logger;
  /** Prefix privileged commands with sudo. Defaults to "not running as root". */
  useSudo?: boolean;
}

export class SpawnCommandRunner implements CommandRunner {
  private readonly useSudo: boolean;

  constructor(private readonly options: SpawnRunnerOptions) {
    this.useSudo = options.useSudo ?? process.getuid?.() !== 0;
  }

  run(
    command: string,
    args: string[],
    options: CommandOptions = {},
  ): Promise<CommandResult> {
    const sudo = options.privileged && this.useSudo;
    const file = sudo ? "sudo" : command;
    const argv = sudo ? [command, ...args] : args;

    this.options.logger.debug({ command: formatCommand(file, argv) }, "exec");

    return new Promise<CommandResult>((resolve) => {
      const child = spawn(file, argv, {
        stdio: options.interactive ? "inherit" : ["pipe", "pipe", "pipe"],
      });

      let stdout = "";
      let stderr = "";
      child.stdout?.on("data", (chunk: Buffer) => (stdout += chunk.toString()));
      child.stderr?.on("data", (chunk: Buffer) => (stderr += chunk.toString()));

      child.on("error", (err) => {
        resolve({ code: 127, stdout, stderr: stderr || err.message });
      });

      child.on("close", (code) => {
        resolve({ code: code ?? 1, stdout, stderr });
      });

      if (child.stdin) {
        child.stdin.end(options.input ?? "");
      }
    });
  }
}

export function formatCommand(command: string, args: string[]): string {
  return [command, ...args]
    .map((a) => (/^[\w./:=+@%-]+$/.test(a) ? a : `'${a.replace(/'/g, "'\\''")}'`))
    .join(" ");
}

/**
 * Run and require exit code 0.
 *
 * @throws ProvisionError (COMMAND_ERROR) with the command line and stderr
 */
export async function runChecked(
  runner: CommandRunner,
  command: string,
  args: string[],
  options?: CommandOptions,
): Promise<CommandResult> {
  const result = await runner.run(command, args, options);
  if (result.code !== 0) {
    const detail = result.stderr.trim() || result.stdout.trim();
    throw new ProvisionError(
      "COMMAND_ERROR",
      `Command failed (exit ${result.code}): ${formatCommand(command, args)}` +
        (detail ? `\n${detail}` : ""),
      { exit_code: result.code },
    );
  }
  return result;
}
