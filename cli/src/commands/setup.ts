/**
 * tcsetup CLI - Setup Command
 *
 * Installs or removes one Tomcat release line.
 *
 * Usage:
 *   tcsetup                          Pick a version interactively, install it
 *   tcsetup --version 10             Install the newest 10.x
 *   tcsetup --version 10 --debug     Same, unattended, with debug logs on stderr
 *   tcsetup --version 10 --uninstall Remove Tomcat 10
 *
 * Output:
 *
 *   ℹ Resolving version
 *   ℹ Full version for installation: 10.1.50
 *     ✔ Installed system packages
 *     ✔ Downloaded Tomcat archive
 *     ...
 *   ✔ Installed Tomcat 10.1.50 in 1m 12s
 */

import { Command } from "commander";
import { Ora } from "ora";
import {
  HttpClient,
  HttpsClient,
  LinuxSystem,
  Logger,
  Prompter,
  ProvisionerEvent,
  Provisioner,
  RunOutcome,
  Settings,
  SpawnCommandRunner,
  System,
  TempFileRegistry,
  createLogger,
  errorMessage,
  isProvisionError,
  isWsl,
  windowsExplorerPath,
} from "@tcsetup/engine";
import { CliOptions, buildRunConfig, loadCliSettings } from "../config";
import { TerminalPrompter } from "../prompt";
import {
  colors,
  createSpinner,
  formatBytes,
  formatDuration,
  formatErrorCategory,
  isDebugMode,
  printBlank,
  printDebug,
  printDetail,
  printError,
  printInfo,
  printStageError,
  printStageInfo,
  printStageSuccess,
  printStageWarn,
  printStepTable,
  printSuccess,
  printWarn,
  setDebugMode,
} from "../output";

/** Spinner text while a step runs */
const STEP_MESSAGES: Record<string, string> = {
  dependencies: "Installing system packages...",
  download: "Downloading Tomcat archive...",
  extract: "Extracting Tomcat...",
  "service-account": "Creating service user and group...",
  permissions: "Setting permissions...",
  "shared-directories": "Creating shared directories...",
  "user-access": "Adding you to the service group...",
  drivers: "Installing JDBC drivers...",
  environment: "Configuring memory settings...",
  service: "Registering the service...",
};

export interface SetupServices {
  system: System;
  http: HttpClient;
  prompter: Prompter;
}

export interface SetupDependencies {
  env?: NodeJS.ProcessEnv;
  /** Replaces the real system, network and terminal */
  services?: (settings: Settings, logger: Logger) => SetupServices;
  /** Report the Windows Explorer path; detected when omitted */
  wsl?: boolean;
  /** Receives the exit code; sets process.exitCode by default */
  exit?: (code: number) => void;
}

function defaultServices(settings: Settings, logger: Logger, spinner: Ora): SetupServices {
  return {
    system: new LinuxSystem(new SpawnCommandRunner({ logger }), logger),
    http: new HttpsClient({
      timeoutMs: settings.http.timeoutMs,
      downloadTimeoutMs: settings.http.downloadTimeoutMs,
      logger,
    }),
    prompter: new TerminalPrompter(process.stdin, process.stdout, () => spinner.stop()),
  };
}

function displayEvent(event: ProvisionerEvent, spinner: Ora): void {
  switch (event.type) {
    case "phase":
      spinner.stop();
      printInfo(event.phase);
      break;

    case "step_start":
      spinner.start(STEP_MESSAGES[event.step] ?? `${event.title}...`);
      break;

    case "step_done": {
      spinner.stop();
      const { result } = event;
      if (result.status === "ok") {
        printStageSuccess(result.title);
      } else if (result.status === "warning") {
        printStageWarn(result.title);
      } else if (result.status === "failed") {
        printStageError(`${result.title}: ${result.message ?? "failed"}`);
      }
      if (result.message) printDebug(`${result.name}: ${result.message}`);
      break;
    }

    case "progress":
      spinner.text =
        event.bytesTotal > 0
          ? `Downloading Tomcat archive... ${event.percent}%`
          : `Downloading Tomcat archive... ${formatBytes(event.bytesDownloaded)}`;
      break;

    case "notice":
      spinner.stop();
      if (event.level === "warn") printStageWarn(event.message);
      else printStageInfo(event.message);
      break;
  }
}

async function reportOutcome(
  outcome: RunOutcome,
  system: System,
  elapsedMs: number,
  deps: SetupDependencies,
): Promise<void> {
  switch (outcome.action) {
    case "install": {
      printBlank();
      printStepTable(outcome.steps);
      for (const warning of outcome.warnings) printWarn(warning);

      if (outcome.exitCode !== 0) {
        printError(outcome.message ?? "Installation failed.");
        return;
      }

      const release = outcome.version?.minor ?? "";
      printSuccess(`Installed Tomcat ${colors.version(release)} in ${formatDuration(elapsedMs)}`);
      if (outcome.installDir) printDetail("Location", outcome.installDir);
      if (outcome.serviceName) printDetail("Service", outcome.serviceName);
      if (outcome.serviceStatus) {
        printBlank();
        console.log(colors.dim(outcome.serviceStatus.trimEnd()));
      }

      printBlank();
      printInfo("A new terminal session is required for the group changes to take effect.");

      const onWsl = deps.wsl ?? isWsl(deps.env ?? process.env);
      if (onWsl && outcome.installDir) {
        const distro =
          (await system.distributionName()) ?? (deps.env ?? process.env).WSL_DISTRO_NAME;
        if (distro) {
          printInfo(
            `From Windows, open ${colors.path(windowsExplorerPath(distro, outcome.installDir))} ` +
              "in Explorer to deploy web applications.",
          );
        }
      }
      return;
    }

    case "uninstall":
      printSuccess(outcome.message ?? "Uninstalled.");
      return;

    case "conflict":
      if (outcome.exitCode === 0) printSuccess(outcome.message ?? "Done.");
      else printWarn(outcome.message ?? "Exiting.");
      return;

    case "cancelled":
      printWarn(outcome.message ?? "Cancelled.");
      return;
  }
}

function reportError(err: unknown): void {
  if (isProvisionError(err)) {
    printError(`${formatErrorCategory(err.category)}: ${err.message}`);
  } else {
    printError(errorMessage(err));
  }
  if (isDebugMode() && err instanceof Error && err.stack) {
    console.error(colors.dim(err.stack));
  }
}

/**
 * Execute one run and return its exit code. Never throws.
 */
export async function runSetup(opts: CliOptions, deps: SetupDependencies = {}): Promise<number> {
  const env = deps.env ?? process.env;
  setDebugMode(Boolean(opts.debug));

  let settings: Settings;
  let config: ReturnType<typeof buildRunConfig>;
  try {
    config = buildRunConfig(opts, env);
    settings = loadCliSettings(opts, env);
  } catch (err: unknown) {
    reportError(err);
    return 1;
  }

  const logger = createLogger({ level: settings.logLevel });
  const spinner = createSpinner("Starting...");
  const services = deps.services
    ? deps.services(settings, logger)
    : defaultServices(settings, logger, spinner);

  const tempFiles = new TempFileRegistry(logger);
  const removeExitHooks = tempFiles.installExitHooks();

  const provisioner = new Provisioner({
    settings,
    system: services.system,
    http: services.http,
    prompter: services.prompter,
    logger,
    tempFiles,
  });
  provisioner.on((event) => displayEvent(event, spinner));

  const startTime = Date.now();
  try {
    const outcome = await provisioner.run(config);
    spinner.stop();
    await reportOutcome(outcome, services.system, Date.now() - startTime, deps);
    return outcome.exitCode;
  } catch (err: unknown) {
    spinner.stop();
    logger.error({ error: errorMessage(err) }, "Run failed");
    reportError(err);
    return 1;
  } finally {
    removeExitHooks();
    tempFiles.cleanup();
  }
}

export function registerSetupCommand(program: Command, deps: SetupDependencies = {}): void {
  program
    .option("--version <major>", "Tomcat major version to install or uninstall (e.g. 10)")
    .option("--uninstall", "Remove the installation of --version", false)
    .option("--debug", "Run unattended with debug logging on stderr", false)
    .allowUnknownOption()
    .allowExcessArguments(true)
    .action(async (opts: CliOptions) => {
      const code = await runSetup(opts, deps);
      if (deps.exit) {
        deps.exit(code);
      } else {
        process.exitCode = code;
      }
    });
}
