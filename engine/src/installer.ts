/**
 * tcsetup Engine - Install Pipeline
 *
 * The install is an ordered list of named steps. The pipeline stops at the
 * first failing step (no rollback); the remaining steps are reported as
 * skipped. Steps only use idempotent creation (mkdir -p, groupadd --force,
 * useradd only when missing) so a rerun over a half-finished install works.
 */

import * as path from "path";
import { AssetFetcher } from "./assets";
import {
  Settings,
  archiveUrlFor,
  resolvePackages,
  serviceNameFor,
  unitFilePathFor,
} from "./config";
import { DownloadProgress, HttpClient } from "./downloader";
import { ProvisionError, errorMessage } from "./errors";
import { OwnerSpec, System } from "./linux/types";
import { renderServiceUnit, renderSetenv } from "./templates";
import { TempFileRegistry } from "./temp-files";
import { StepResult, VersionSpec } from "./types";
import { Logger } from "./utils/logger";

export interface InstallContext {
  settings: Settings;
  system: System;
  http: HttpClient;
  tempFiles: TempFileRegistry;
  assets: AssetFetcher;
  logger: Logger;
  version: VersionSpec;
  installDir: string;
  currentUser: string;
  onProgress?: (progress: DownloadProgress) => void;

  /** Filled in while the pipeline runs */
  archivePath?: string;
  serviceStatus?: string;
  warnings: string[];
}

export interface StepOutput {
  status?: "ok" | "warning";
  message?: string;
}

export interface InstallStep {
  name: string;
  title: string;
  run(ctx: InstallContext): Promise<StepOutput>;
}

export interface PipelineHooks {
  onStart?: (step: InstallStep) => void;
  onDone?: (result: StepResult) => void;
}

export interface PipelineResult {
  results: StepResult[];
  failed?: StepResult;
  error?: unknown;
}

function ownerOf(settings: Settings): OwnerSpec {
  return { user: settings.serviceUser, group: settings.serviceGroup };
}

async function grantGroupAccess(ctx: InstallContext, dir: string): Promise<void> {
  const group = ctx.settings.serviceGroup;
  await ctx.system.applyGroupAcl(dir, group, false);
  await ctx.system.applyGroupAcl(dir, group, true);
}

// ─── Steps ───────────────────────────────────────────────────────

const dependencies: InstallStep = {
  name: "dependencies",
  title: "Installed system packages",
  async run(ctx) {
    const packages = resolvePackages(ctx.settings);
    await ctx.system.updatePackages();
    await ctx.system.installPackages(packages);
    return { message: packages.join(", ") };
  },
};

const download: InstallStep = {
  name: "download",
  title: "Downloaded Tomcat archive",
  async run(ctx) {
    const { major, minor } = ctx.version;
    const url = archiveUrlFor(ctx.settings, major, minor);
    const archivePath = ctx.tempFiles.create(`apache-tomcat-${minor}.tar.gz`);

    try {
      await ctx.http.download(url, archivePath, ctx.onProgress);
    } catch (err: unknown) {
      ctx.tempFiles.release(archivePath);
      throw new ProvisionError(
        "NETWORK_ERROR",
        `Failed to download Tomcat ${minor}: ${errorMessage(err)}`,
        { url },
      );
    }

    ctx.archivePath = archivePath;
    return { message: url };
  },
};

const extract: InstallStep = {
  name: "extract",
  title: "Extracted Tomcat",
  async run(ctx) {
    const archivePath = ctx.archivePath;
    if (!archivePath) {
      throw new ProvisionError("VALIDATION_ERROR", "No archive was downloaded");
    }

    try {
      await ctx.system.makeDirectory(ctx.installDir);
      await ctx.system.extractArchive(archivePath, ctx.installDir, 1);
    } finally {
      ctx.tempFiles.release(archivePath);
      ctx.archivePath = undefined;
    }
    return { message: ctx.installDir };
  },
};

const serviceAccount: InstallStep = {
  name: "service-account",
  title: "Created service user and group",
  async run(ctx) {
    const { system, settings, installDir } = ctx;
    await system.createSystemGroup(settings.serviceGroup);
    if (!(await system.userExists(settings.serviceUser))) {
      await system.createSystemUser(settings.serviceUser, settings.serviceGroup, installDir);
    }
    await system.setOwner(installDir, ownerOf(settings), true);
    return { message: `${settings.serviceUser}:${settings.serviceGroup}` };
  },
};

const permissions: InstallStep = {
  name: "permissions",
  title: "Configured conf, lib and webapps permissions",
  async run(ctx) {
    for (const sub of ["conf", "lib", "webapps"]) {
      const dir = path.posix.join(ctx.installDir, sub);
      await ctx.system.setOwner(dir, ownerOf(ctx.settings), true);
      await ctx.system.setMode(dir, "g+w", true);
      await grantGroupAccess(ctx, dir);
    }
    return {};
  },
};

const sharedDirectories: InstallStep = {
  name: "shared-directories",
  title: "Created Catalina and shared temp directories",
  async run(ctx) {
    const { system, settings, installDir } = ctx;
    const catalina = path.posix.join(installDir, "conf", "Catalina");
    const localhost = path.posix.join(catalina, "localhost");

    await system.makeDirectory(localhost);
    await system.makeDirectory(settings.sharedTempDir);
    await system.setOwner(catalina, ownerOf(settings), true);
    await system.setOwner(settings.sharedTempDir, ownerOf(settings), true);
    await grantGroupAccess(ctx, localhost);
    await grantGroupAccess(ctx, settings.sharedTempDir);
    return { message: `${localhost}, ${settings.sharedTempDir}` };
  },
};

const userAccess: InstallStep = {
  name: "user-access",
  title: "Added you to the service group",
  async run(ctx) {
    await ctx.system.addUserToGroup(ctx.currentUser, ctx.settings.serviceGroup);
    return { message: `${ctx.currentUser} → ${ctx.settings.serviceGroup}` };
  },
};

const drivers: InstallStep = {
  name: "drivers",
  title: "Installed JDBC drivers",
  async run(ctx) {
    const libDir = path.posix.join(ctx.installDir, "lib");
    const installed: string[] = [];
    const failures: string[] = [];

    // One driver failing does not stop the others
    for (const source of ctx.settings.drivers.items) {
      try {
        const asset = await ctx.assets.findAndDownloadAsset(source, libDir);
        installed.push(asset.filename);
      } catch (err: unknown) {
        if (ctx.settings.drivers.onFailure === "fail") throw err;
        const message = `${source.name} JDBC driver not installed: ${errorMessage(err)}`;
        ctx.logger.warn({ driver: source.name, error: errorMessage(err) }, "Driver install failed");
        failures.push(message);
      }
    }

    ctx.warnings.push(...failures);
    if (failures.length > 0) {
      return { status: "warning", message: failures.join("; ") };
    }
    return { message: installed.join(", ") };
  },
};

const environment: InstallStep = {
  name: "environment",
  title: "Configured memory settings",
  async run(ctx) {
    const file = path.posix.join(ctx.installDir, "bin", "setenv.sh");
    await ctx.system.writeFile(
      file,
      renderSetenv({ heapMin: ctx.settings.heap.min, heapMax: ctx.settings.heap.max }),
    );
    await ctx.system.setOwner(file, ownerOf(ctx.settings), false);
    await ctx.system.setMode(file, "755", false);
    return { message: file };
  },
};

const service: InstallStep = {
  name: "service",
  title: "Registered and started the service",
  async run(ctx) {
    const { system, settings, version, installDir } = ctx;
    const javaHome = await system.detectJavaHome(settings.javaVersion);
    if (!javaHome) {
      throw new ProvisionError(
        "COMMAND_ERROR",
        `Could not determine JAVA_HOME for OpenJDK ${settings.javaVersion}.`,
      );
    }

    const serviceName = serviceNameFor(version.major);
    await system.writeFile(
      unitFilePathFor(settings, version.major),
      renderServiceUnit({
        major: version.major,
        installDir,
        javaHome,
        user: settings.serviceUser,
        group: settings.serviceGroup,
      }),
    );
    await system.reloadServices();
    await system.enableService(serviceName);
    await system.startService(serviceName);
    ctx.serviceStatus = await system.serviceStatus(serviceName);
    return { message: serviceName };
  },
};

export const INSTALL_STEPS: readonly InstallStep[] = [
  dependencies,
  download,
  extract,
  serviceAccount,
  permissions,
  sharedDirectories,
  userAccess,
  drivers,
  environment,
  service,
];

// ─── Runner ──────────────────────────────────────────────────────

/**
 * Run steps in order, stopping at the first failure.
 */
export async function runPipeline(
  steps: readonly InstallStep[],
  ctx: InstallContext,
  hooks: PipelineHooks = {},
): Promise<PipelineResult> {
  const results: StepResult[] = [];

  for (let i = 0; i < steps.length; i++) {
    const step = steps[i];
    hooks.onStart?.(step);
    ctx.logger.debug({ step: step.name }, "Step started");
    const startedAt = Date.now();

    try {
      const output = await step.run(ctx);
      const result: StepResult = {
        name: step.name,
        title: step.title,
        status: output.status ?? "ok",
        message: output.message,
        durationMs: Date.now() - startedAt,
      };
      results.push(result);
      hooks.onDone?.(result);
    } catch (err: unknown) {
      const failed: StepResult = {
        name: step.name,
        title: step.title,
        status: "failed",
        message: errorMessage(err),
        durationMs: Date.now() - startedAt,
      };
      ctx.logger.error({ step: step.name, error: failed.message }, "Step failed");
      results.push(failed);
      hooks.onDone?.(failed);

      for (const rest of steps.slice(i + 1)) {
        results.push({
          name: rest.name,
          title: rest.title,
          status: "skipped",
          durationMs: 0,
        });
      }
      return { results, failed, error: err };
    }
  }

  return { results };
}
