/**
 * tcsetup Engine - Temporary File Registry
 *
 * Every download lands in a path handed out here. Callers remove their
 * file in a `finally`; whatever is still tracked when the process exits
 * (normally, by error, or by signal) is removed by the exit hooks.
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { Logger } from "./utils/logger";

const SIGNALS: NodeJS.Signals[] = ["SIGINT", "SIGTERM", "SIGHUP"];

/** Conventional exit status for death by signal: 128 + signal number */
const SIGNAL_EXIT_CODES: Record<string, number> = {
  SIGHUP: 129,
  SIGINT: 130,
  SIGTERM: 143,
};

export class TempFileRegistry {
  private readonly files = new Set<string>();
  private dir: string | null = null;
  private nextId = 0;
  private hooksInstalled = false;

  constructor(
    private readonly logger: Logger,
    private readonly baseDir: string = os.tmpdir(),
  ) {}

  /**
   * Reserve a new temporary file path and track it.
   * The file itself is not created.
   */
  create(name: string): string {
    if (!this.dir) {
      this.dir = fs.mkdtempSync(path.join(this.baseDir, "tcsetup-"));
    }
    const filePath = path.join(this.dir, `${this.nextId++}-${path.basename(name)}`);
    this.files.add(filePath);
    return filePath;
  }

  /** Paths still tracked */
  tracked(): string[] {
    return Array.from(this.files);
  }

  /**
   * Remove one file and stop tracking it. Missing files are fine.
   */
  release(filePath: string): void {
    fs.rmSync(filePath, { force: true });
    this.files.delete(filePath);
  }

  /**
   * Remove every tracked file and the scratch directory.
   * Synchronous so it can run inside an "exit" listener.
   */
  cleanup(): void {
    for (const filePath of this.files) {
      try {
        fs.rmSync(filePath, { force: true });
      } catch (err: unknown) {
        const message = err instanceof Error ? err.message : String(err);
        this.logger.warn({ path: filePath, error: message }, "Could not remove temp file");
      }
    }
    this.files.clear();

    if (this.dir) {
      fs.rmSync(this.dir, { recursive: true, force: true });
      this.dir = null;
    }
  }

  /**
   * Register process hooks so tracked files are removed on every exit path.
   * Returns a function that unregisters them.
   */
  installExitHooks(): () => void {
    if (this.hooksInstalled) return () => undefined;
    this.hooksInstalled = true;

    const onExit = () => this.cleanup();
    const onSignal = (signal: NodeJS.Signals) => {
      this.logger.debug({ signal }, "Signal received - removing temp files");
      this.cleanup();
      process.exit(SIGNAL_EXIT_CODES[signal] ?? 1);
    };

    process.on("exit", onExit);
    for (const signal of SIGNALS) process.on(signal, onSignal);

    return () => {
      process.off("exit", onExit);
      for (const signal of SIGNALS) process.off(signal, onSignal);
      this.hooksInstalled = false;
    };
  }
}
