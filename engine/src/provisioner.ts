/**
 * tcsetup Engine - Provisioner
 *
 * Orchestrates one run of the tool:
 *
 *   1. Decide install vs uninstall and the target release line
 *   2. Resolve the newest release of that line (install only)
 *   3. Obtain privileges, start the keep-alive
 *   4. Deal with an existing install of the same line
 *   5. Run the install pipeline, or the uninstaller
 *
 * The Provisioner has NO UI logic. Prompts go through the injected
 * Prompter, progress goes out as events, and the result is a RunOutcome
 * whose exitCode the CLI hands to the OS.
 */

import { AssetFetcher } from "./assets";
import { Settings, installDirFor, serviceNameFor } from "./config";
import { HttpClient } from "./downloader";
import { ProvisionError } from "./errors";
import { INSTALL_STEPS, InstallContext, InstallStep, runPipeline } from "./installer";
import { ensurePrivileges, startKeepAlive, KEEP_ALIVE_INTERVAL_MS } from "./linux/elevate";
import { System } from "./linux/types";
import { VersionResolver } from "./resolver";
import { checkForExistingInstall } from "./state";
import { TempFileRegistry } from "./temp-files";
import {
  Prompter,
  ProvisionerEvent,
  ProvisionerEventHandler,
  RunConfig,
  RunMode,
  RunOutcome,
  VersionSpec,
} from "./types";
import { Uninstaller } from "./uninstaller";
import { createLogger, Logger } from "./utils/logger";

export interface ProvisionerOptions {
  settings: Settings;
  system: System;
  http: HttpClient;
  prompter: Prompter;
  logger?: Logger;
  tempFiles?: TempFileRegistry;
  /** Override the install pipeline (tests) */
  steps?: readonly InstallStep[];
  keepAliveIntervalMs?: number;
}

export class Provisioner {
  private readonly settings: Settings;
  private readonly system: System;
  private readonly http: HttpClient;
  private readonly prompter: Prompter;
  private readonly logger: Logger;
  private readonly tempFiles: TempFileRegistry;
  private readonly resolver: VersionResolver;
  private readonly steps: readonly InstallStep[];
  private readonly keepAliveIntervalMs: number;
  private eventHandlers: ProvisionerEventHandler[] = [];

  constructor(options: ProvisionerOptions) {
    this.settings = options.settings;
    this.system = options.system;
    this.http = options.http;
    this.prompter = options.prompter;
    this.logger = options.logger ?? createLogger({ level: options.settings.logLevel });
    this.tempFiles = options.tempFiles ?? new TempFileRegistry(this.logger);
    this.resolver = new VersionResolver(options.settings.indexUrl, options.http, this.logger);
    this.steps = options.steps ?? INSTALL_STEPS;
    this.keepAliveIntervalMs = options.keepAliveIntervalMs ?? KEEP_ALIVE_INTERVAL_MS;
  }

  // ─── Event System ────────────────────────────────────────────

  /**
   * Register an event handler. The CLI uses this for progress output.
   */
  on(handler: ProvisionerEventHandler): void {
    this.eventHandlers.push(handler);
  }

  private emit(event: ProvisionerEvent): void {
    for (const handler of this.eventHandlers) {
      try {
        handler(event);
      } catch (err: unknown) {
        // A broken display must not break the run
        const message = err instanceof Error ? err.message : String(err);
        this.logger.warn({ error: message }, "Event handler threw");
      }
    }
  }

  private notice(level: "info" | "warn", message: string): void {
    this.emit({ type: "notice", timestamp: now(), level, message });
  }

  // ─── Entry Point ─────────────────────────────────────────────

  /**
   * Execute a run.
   *
   * @throws ProvisionError for resolution, validation and privilege failures
   *         (all raised before anything is changed)
   */
  async run(config: RunConfig): Promise<RunOutcome> {
    const mode: RunMode = config.debugMode ? "automated" : "interactive";
    this.logger.info(
      {
        version: config.targetVersion,
        uninstall: config.uninstallRequested,
        mode,
      },
      "Run started",
    );

    if (config.uninstallRequested) {
      if (!config.targetVersion) {
        throw new ProvisionError(
          "VALIDATION_ERROR",
          "The --version argument is required for uninstalling.",
        );
      }
      return this.uninstall(validateMajor(config.targetVersion), config, mode);
    }

    const major = config.targetVersion
      ? validateMajor(config.targetVersion)
      : await this.selectMajorVersion(mode);

    return this.install(major, config, mode);
  }

  // ─── Install ─────────────────────────────────────────────────

  private async install(
    major: string,
    config: RunConfig,
    mode: RunMode,
  ): Promise<RunOutcome> {
    this.emit({ type: "phase", timestamp: now(), phase: "Resolving version" });
    const version: VersionSpec = {
      major,
      minor: await this.resolver.getLatestMinorVersion(major),
    };
    this.notice("info", `Full version for installation: ${version.minor}`);

    this.emit({ type: "phase", timestamp: now(), phase: "Checking privileges" });
    await ensurePrivileges(this.system, this.logger);
    const stopKeepAlive = startKeepAlive(this.system, this.logger, this.keepAliveIntervalMs);

    try {
      this.emit({
        type: "phase",
        timestamp: now(),
        phase: "Checking for an existing installation",
      });
      const conflict = await checkForExistingInstall(major, mode, {
        system: this.system,
        settings: this.settings,
        logger: this.logger,
        prompter: this.prompter,
        uninstaller: this.createUninstaller(config),
        onNotice: (level, message) => this.notice(level, message),
      });

      if (conflict.action === "exit") {
        return {
          action: "conflict",
          exitCode: conflict.exitCode,
          version,
          steps: [],
          warnings: [],
          message: conflict.message,
        };
      }

      this.emit({ type: "phase", timestamp: now(), phase: `Installing Tomcat ${version.minor}` });
      const ctx: InstallContext = {
        settings: this.settings,
        system: this.system,
        http: this.http,
        tempFiles: this.tempFiles,
        assets: new AssetFetcher({
          http: this.http,
          system: this.system,
          tempFiles: this.tempFiles,
          logger: this.logger,
          owner: { user: this.settings.serviceUser, group: this.settings.serviceGroup },
        }),
        logger: this.logger,
        version,
        installDir: installDirFor(this.settings, major),
        currentUser: config.currentUser,
        warnings: [],
        onProgress: (p) =>
          this.emit({
            type: "progress",
            timestamp: now(),
            step: "download",
            bytesDownloaded: p.bytes_downloaded,
            bytesTotal: p.bytes_total,
            percent: p.percent,
          }),
      };

      const pipeline = await runPipeline(this.steps, ctx, {
        onStart: (step) =>
          this.emit({ type: "step_start", timestamp: now(), step: step.name, title: step.title }),
        onDone: (result) => this.emit({ type: "step_done", timestamp: now(), result }),
      });

      if (pipeline.failed) {
        return {
          action: "install",
          exitCode: 1,
          version,
          installDir: ctx.installDir,
          serviceName: serviceNameFor(major),
          steps: pipeline.results,
          warnings: ctx.warnings,
          message: `Step "${pipeline.failed.name}" failed: ${pipeline.failed.message ?? "unknown error"}`,
        };
      }

      this.logger.info({ major, minor: version.minor }, "Installation complete");
      return {
        action: "install",
        exitCode: 0,
        version,
        installDir: ctx.installDir,
        serviceName: serviceNameFor(major),
        steps: pipeline.results,
        warnings: ctx.warnings,
        serviceStatus: ctx.serviceStatus,
      };
    } finally {
      stopKeepAlive();
    }
  }

  // ─── Uninstall ───────────────────────────────────────────────

  private async uninstall(
    major: string,
    config: RunConfig,
    mode: RunMode,
  ): Promise<RunOutcome> {
    this.emit({ type: "phase", timestamp: now(), phase: "Checking privileges" });
    await ensurePrivileges(this.system, this.logger);
    const stopKeepAlive = startKeepAlive(this.system, this.logger, this.keepAliveIntervalMs);

    try {
      this.emit({ type: "phase", timestamp: now(), phase: `Uninstalling Tomcat ${major}` });
      const report = await this.createUninstaller(config).uninstall(major, mode);

      if (report.cancelled) {
        return {
          action: "cancelled",
          exitCode: 1,
          version: { major, minor: "" },
          steps: [],
          warnings: [],
          message: "Uninstall cancelled.",
        };
      }

      return {
        action: "uninstall",
        exitCode: 0,
        version: { major, minor: "" },
        installDir: installDirFor(this.settings, major),
        serviceName: serviceNameFor(major),
        steps: [],
        warnings: [],
        message: `Tomcat ${major} has been uninstalled.`,
      };
    } finally {
      stopKeepAlive();
    }
  }

  private createUninstaller(config: RunConfig): Uninstaller {
    return new Uninstaller({
      system: this.system,
      settings: this.settings,
      logger: this.logger,
      prompter: this.prompter,
      currentUser: config.currentUser,
      onAction: (message) => this.notice("info", message),
    });
  }

  // ─── Version Selection ───────────────────────────────────────

  /**
   * Ask for a release line until one from the index is entered.
   */
  private async selectMajorVersion(mode: RunMode): Promise<string> {
    if (mode === "automated") {
      throw new ProvisionError(
        "VALIDATION_ERROR",
        "The --version argument is required when running with --debug.",
      );
    }

    this.emit({ type: "phase", timestamp: now(), phase: "Determining target version" });
    const majors = await this.resolver.getAvailableMajorVersions();
    if (majors.length === 0) {
      throw new ProvisionError(
        "RESOLUTION_ERROR",
        `No Tomcat versions found at ${this.settings.indexUrl}`,
      );
    }

    this.notice("info", `Available Tomcat major versions: ${majors.join(", ")}`);
    const hint = majors[majors.length - 1];

    for (;;) {
      const answer = (
        await this.prompter.ask(`Please enter the major version to install (e.g., ${hint}): `)
      ).trim();
      if (majors.includes(answer)) return answer;
      this.notice("warn", "Invalid version. Please select from the list.");
    }
  }
}

function now(): string {
  return new Date().toISOString();
}

function validateMajor(value: string): string {
  const major = value.trim();
  if (!/^\d+$/.test(major)) {
    throw new ProvisionError(
      "VALIDATION_ERROR",
      `Invalid Tomcat major version "${value}". Expected a number such as 10.`,
    );
  }
  return major;
}
