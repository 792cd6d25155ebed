#!/usr/bin/env node

/**
 * tcsetup CLI - Entry Point
 *
 *   tcsetup [--version <major>] [--uninstall] [--debug]
 */

import { createProgram } from "./program";

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  });
