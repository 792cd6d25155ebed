/**
 * tcsetup CLI - Program
 *
 * Builds the commander program. Kept apart from the entry point so tests
 * can parse argument lists without touching process.argv.
 */

import { Command } from "commander";
import { SetupDependencies, registerSetupCommand } from "./commands/setup";

export function createProgram(deps: SetupDependencies = {}): Command {
  // No program.version(): --version selects the Tomcat release line
  const program = new Command();
  program
    .name("tcsetup")
    .description("Install, reinstall or remove an Apache Tomcat release line as a systemd service");

  registerSetupCommand(program, deps);
  return program;
}
