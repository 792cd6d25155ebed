/**
 * tcsetup Engine - Version Resolver
 *
 * Reads the Apache distribution index (plain HTML directory listings)
 * to find the available release lines and the newest release of one.
 */

import { HttpClient } from "./downloader";
import { ProvisionError, errorMessage } from "./errors";
import { Logger } from "./utils/logger";
import { latestVersion } from "./utils/version";

const MAJOR_LINK = /href="tomcat-(\d+)\/"/g;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Major version identifiers linked from an index page, numerically ascending,
 * without duplicates.
 */
export function extractMajorVersions(html: string): string[] {
  const found = new Set<string>();
  for (const match of html.matchAll(MAJOR_LINK)) {
    found.add(match[1]);
  }
  return Array.from(found).sort((a, b) => Number(a) - Number(b));
}

/**
 * Every release of `major` mentioned on a release-line page, "v" stripped.
 * Matches "v10.1.50" as well as milestones such as "v11.0.0-M1".
 */
export function extractReleases(html: string, major: string): string[] {
  const pattern = new RegExp(
    `v${escapeRegExp(major)}(\\.\\d+)+(-[A-Za-z0-9]+)?`,
    "g",
  );
  const found = new Set<string>();
  for (const match of html.matchAll(pattern)) {
    found.add(match[0].slice(1));
  }
  return Array.from(found);
}

export class VersionResolver {
  private readonly indexUrl: string;

  constructor(
    indexUrl: string,
    private readonly http: HttpClient,
    private readonly logger: Logger,
  ) {
    this.indexUrl = indexUrl.endsWith("/") ? indexUrl : `${indexUrl}/`;
  }

  /**
   * Release lines on the index. Empty when the index cannot be read;
   * interactive callers must treat that as an error.
   */
  async getAvailableMajorVersions(): Promise<string[]> {
    let html: string;
    try {
      html = await this.http.getText(this.indexUrl);
    } catch (err: unknown) {
      this.logger.warn(
        { url: this.indexUrl, error: errorMessage(err) },
        "Could not read distribution index",
      );
      return [];
    }
    const majors = extractMajorVersions(html);
    this.logger.debug({ majors }, "Available major versions");
    return majors;
  }

  /**
   * Newest release of `major`.
   *
   * @throws ProvisionError (RESOLUTION_ERROR) when the page is unreachable
   *         or lists no release
   */
  async getLatestMinorVersion(major: string): Promise<string> {
    const url = `${this.indexUrl}tomcat-${major}/`;

    let html: string;
    try {
      html = await this.http.getText(url);
    } catch (err: unknown) {
      throw new ProvisionError(
        "RESOLUTION_ERROR",
        `Could not determine the latest minor version for Tomcat ${major}: ${errorMessage(err)}`,
        { url },
      );
    }

    const latest = latestVersion(extractReleases(html, major));
    if (!latest) {
      throw new ProvisionError(
        "RESOLUTION_ERROR",
        `Could not determine the latest minor version for Tomcat ${major}.`,
        { url },
      );
    }

    this.logger.info({ major, minor: latest }, "Resolved latest release");
    return latest;
  }
}
