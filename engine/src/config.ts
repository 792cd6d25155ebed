/**
 * tcsetup Engine - Settings
 *
 * Defaults, an optional YAML file and TCSETUP_* environment variables,
 * merged in that order and validated once with zod.
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { ProvisionError, errorMessage } from "./errors";

function compiles(pattern: string): boolean {
  try {
    new RegExp(pattern);
    return true;
  } catch {
    return false;
  }
}

const DriverSchema = z.object({
  name: z.string().min(1),
  owner: z.string().min(1),
  repo: z.string().min(1),
  patterns: z.array(z.string().min(1).refine(compiles, "Invalid regular expression")).min(1),
});

export const SettingsSchema = z.object({
  indexUrl: z.string().url(),
  javaVersion: z.string().regex(/^\d+$/),
  installRoot: z.string().min(1),
  sharedTempDir: z.string().min(1),
  systemdDir: z.string().min(1),
  serviceUser: z.string().regex(/^[a-z_][a-z0-9_-]*$/),
  serviceGroup: z.string().regex(/^[a-z_][a-z0-9_-]*$/),
  packages: z.array(z.string().min(1)),
  heap: z.object({
    min: z.string().regex(/^\d+[kmg]$/i),
    max: z.string().regex(/^\d+[kmg]$/i),
  }),
  http: z.object({
    timeoutMs: z.number().int().positive(),
    downloadTimeoutMs: z.number().int().positive(),
  }),
  drivers: z.object({
    onFailure: z.enum(["warn", "fail"]),
    items: z.array(DriverSchema),
  }),
  logLevel: z.enum(["silent", "debug", "info", "warn", "error"]),
});

export type Settings = z.infer<typeof SettingsSchema>;

export const DEFAULT_SETTINGS: Settings = {
  indexUrl: "https://dlcdn.apache.org/tomcat/",
  javaVersion: "21",
  installRoot: "/opt",
  sharedTempDir: "/opt/webtemp",
  systemdDir: "/etc/systemd/system",
  serviceUser: "tomcat",
  serviceGroup: "tomcat",
  packages: ["openjdk-{java}-jdk", "acl", "curl", "wget", "lsb-release", "jq"],
  heap: { min: "512m", max: "1024m" },
  http: { timeoutMs: 30_000, downloadTimeoutMs: 600_000 },
  drivers: {
    onFailure: "warn",
    items: [
      {
        name: "MS SQL Server",
        owner: "microsoft",
        repo: "mssql-jdbc",
        // .jre11 builds run on Java 11 and newer
        patterns: [".jre11.jar"],
      },
      {
        name: "PostgreSQL",
        owner: "pgjdbc",
        repo: "pgjdbc",
        patterns: ["postgresql-[0-9.]+\\.jar$"],
      },
    ],
  },
  logLevel: "silent",
};

export const DEFAULT_CONFIG_PATH = path.join(
  os.homedir(),
  ".tcsetup",
  "config.yaml",
);

export interface LoadSettingsOptions {
  env?: NodeJS.ProcessEnv;
  /** Explicit YAML path; falls back to $TCSETUP_CONFIG, then ~/.tcsetup/config.yaml */
  configPath?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge plain objects; arrays and scalars from `override` replace.
 */
function mergeDeep(
  base: Record<string, unknown>,
  override: Record<string, unknown>,
): Record<string, unknown> {
  const out: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const current = out[key];
    out[key] =
      isRecord(current) && isRecord(value) ? mergeDeep(current, value) : value;
  }
  return out;
}

function readConfigFile(filePath: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = parseYaml(fs.readFileSync(filePath, "utf-8"));
  } catch (err: unknown) {
    throw new ProvisionError(
      "VALIDATION_ERROR",
      `Could not read configuration file ${filePath}: ${errorMessage(err)}`,
    );
  }
  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new ProvisionError(
      "VALIDATION_ERROR",
      `Configuration file ${filePath} must contain a mapping`,
    );
  }
  return parsed;
}

function envOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  if (env.TCSETUP_INDEX_URL) out.indexUrl = env.TCSETUP_INDEX_URL;
  if (env.TCSETUP_JAVA_VERSION) out.javaVersion = env.TCSETUP_JAVA_VERSION;
  if (env.TCSETUP_INSTALL_ROOT) out.installRoot = env.TCSETUP_INSTALL_ROOT;
  if (env.TCSETUP_LOG_LEVEL) out.logLevel = env.TCSETUP_LOG_LEVEL;
  if (env.TCSETUP_HTTP_TIMEOUT_MS) {
    out.http = { timeoutMs: Number(env.TCSETUP_HTTP_TIMEOUT_MS) };
  }
  return out;
}

/**
 * Load and validate settings.
 *
 * @throws ProvisionError (VALIDATION_ERROR) on an unreadable file or invalid values
 */
export function loadSettings(options: LoadSettingsOptions = {}): Settings {
  const env = options.env ?? process.env;
  const explicitPath = options.configPath ?? env.TCSETUP_CONFIG;
  const filePath = explicitPath ?? DEFAULT_CONFIG_PATH;

  let merged: Record<string, unknown> = { ...DEFAULT_SETTINGS };

  if (fs.existsSync(filePath)) {
    merged = mergeDeep(merged, readConfigFile(filePath));
  } else if (explicitPath) {
    throw new ProvisionError(
      "VALIDATION_ERROR",
      `Configuration file not found: ${explicitPath}`,
    );
  }

  merged = mergeDeep(merged, envOverrides(env));

  const result = SettingsSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new ProvisionError("VALIDATION_ERROR", `Invalid configuration: ${issues}`);
  }
  return result.data;
}

// ─── Derived paths ───────────────────────────────────────────────

export function installDirFor(settings: Settings, major: string): string {
  return path.posix.join(settings.installRoot, `tomcat${major}`);
}

export function serviceNameFor(major: string): string {
  return `tomcat${major}.service`;
}

export function unitFilePathFor(settings: Settings, major: string): string {
  return path.posix.join(settings.systemdDir, serviceNameFor(major));
}

/**
 * Package list with the "{java}" placeholder filled in.
 */
export function resolvePackages(settings: Settings): string[] {
  return settings.packages.map((p) => p.replace("{java}", settings.javaVersion));
}

export function archiveUrlFor(settings: Settings, major: string, minor: string): string {
  const base = settings.indexUrl.endsWith("/") ? settings.indexUrl : `${settings.indexUrl}/`;
  return `${base}tomcat-${major}/v${minor}/bin/apache-tomcat-${minor}.tar.gz`;
}
