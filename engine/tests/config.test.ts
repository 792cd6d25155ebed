/**
 * Settings loading tests
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import {
  DEFAULT_SETTINGS,
  archiveUrlFor,
  installDirFor,
  loadSettings,
  resolvePackages,
  serviceNameFor,
  unitFilePathFor,
} from "../src/config";
import { isProvisionError } from "../src/errors";

const TEST_DIR = path.join(os.tmpdir(), "tcsetup-config-test");
const MISSING = path.join(TEST_DIR, "missing.yaml");

describe("loadSettings", () => {
  beforeEach(() => {
    fs.mkdirSync(TEST_DIR, { recursive: true });
  });

  afterEach(() => {
    fs.rmSync(TEST_DIR, { recursive: true, force: true });
  });

  function writeConfig(content: string): string {
    const file = path.join(TEST_DIR, "config.yaml");
    fs.writeFileSync(file, content, "utf-8");
    return file;
  }

  it("returns the defaults when no file exists", () => {
    const settings = loadSettings({ env: {}, configPath: undefined });
    expect(settings.installRoot).toBe(DEFAULT_SETTINGS.installRoot);
  });

  it("merges the YAML file over the defaults", () => {
    const file = writeConfig(
      ["javaVersion: '17'", "heap:", "  max: 2048m", "drivers:", "  onFailure: fail"].join("\n"),
    );

    const settings = loadSettings({ env: {}, configPath: file });

    expect(settings.javaVersion).toBe("17");
    expect(settings.heap).toEqual({ min: "512m", max: "2048m" });
    expect(settings.drivers.onFailure).toBe("fail");
    expect(settings.drivers.items).toHaveLength(2);
  });

  it("lets environment variables override the file", () => {
    const file = writeConfig("installRoot: /srv\n");

    const settings = loadSettings({
      configPath: file,
      env: {
        TCSETUP_INSTALL_ROOT: "/data",
        TCSETUP_LOG_LEVEL: "debug",
        TCSETUP_HTTP_TIMEOUT_MS: "5000",
        TCSETUP_INDEX_URL: "https://mirror.example.com/tomcat/",
      },
    });

    expect(settings.installRoot).toBe("/data");
    expect(settings.logLevel).toBe("debug");
    expect(settings.http).toEqual({ timeoutMs: 5000, downloadTimeoutMs: 600_000 });
    expect(settings.indexUrl).toBe("https://mirror.example.com/tomcat/");
  });

  it("reads the file named by TCSETUP_CONFIG", () => {
    const file = writeConfig("serviceUser: catalina\n");
    expect(loadSettings({ env: { TCSETUP_CONFIG: file } }).serviceUser).toBe("catalina");
  });

  it("rejects an explicit path that does not exist", () => {
    expect(() => loadSettings({ env: {}, configPath: MISSING })).toThrow(
      `Configuration file not found: ${MISSING}`,
    );
  });

  it("rejects invalid values with VALIDATION_ERROR", () => {
    const file = writeConfig("javaVersion: twenty-one\n");

    let caught: unknown;
    try {
      loadSettings({ env: {}, configPath: file });
    } catch (err: unknown) {
      caught = err;
    }
    expect(isProvisionError(caught) && caught.category).toBe("VALIDATION_ERROR");
    expect(isProvisionError(caught) && caught.message).toContain("javaVersion");
  });

  it("rejects a driver pattern that is not a regular expression", () => {
    const file = writeConfig(
      [
        "drivers:",
        "  items:",
        "    - name: Broken driver",
        "      owner: example",
        "      repo: jdbc",
        "      patterns: ['driver-([0-9.]+\\.jar']",
      ].join("\n"),
    );

    let caught: unknown;
    try {
      loadSettings({ env: {}, configPath: file });
    } catch (err: unknown) {
      caught = err;
    }
    expect(isProvisionError(caught) && caught.category).toBe("VALIDATION_ERROR");
    expect(isProvisionError(caught) && caught.message).toBe(
      "Invalid configuration: drivers.items.0.patterns.0: Invalid regular expression",
    );
  });

  it("rejects a file that is not a mapping", () => {
    const file = writeConfig("- a\n- b\n");
    expect(() => loadSettings({ env: {}, configPath: file })).toThrow("must contain a mapping");
  });
});

describe("derived paths", () => {
  it("names the install directory, service and unit file", () => {
    expect(installDirFor(DEFAULT_SETTINGS, "10")).toBe("/opt/tomcat10");
    expect(serviceNameFor("10")).toBe("tomcat10.service");
    expect(unitFilePathFor(DEFAULT_SETTINGS, "9")).toBe("/etc/systemd/system/tomcat9.service");
  });

  it("fills the Java version into the package list", () => {
    expect(resolvePackages(DEFAULT_SETTINGS)).toEqual([
      "openjdk-21-jdk",
      "acl",
      "curl",
      "wget",
      "lsb-release",
      "jq",
    ]);
  });

  it("builds the archive URL", () => {
    expect(archiveUrlFor(DEFAULT_SETTINGS, "10", "10.1.50")).toBe(
      "https://dlcdn.apache.org/tomcat/tomcat-10/v10.1.50/bin/apache-tomcat-10.1.50.tar.gz",
    );
  });
});
