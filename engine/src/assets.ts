/**
 * tcsetup Engine - Release Asset Fetcher
 *
 * Finds a file in the latest GitHub release of a repository by trying
 * filename patterns in order, downloads it to a scoped temp file and
 * installs it into a library directory owned by the service account.
 */

import * as path from "path";
import { z } from "zod";
import { HttpClient } from "./downloader";
import { ProvisionError, errorMessage } from "./errors";
import { TempFileRegistry } from "./temp-files";
import { DriverSource, ReleaseAsset } from "./types";
import { OwnerSpec, SystemAdapter } from "./linux/types";
import { Logger } from "./utils/logger";

const GITHUB_API = "https://api.github.com";

const ReleaseSchema = z.object({
  tag_name: z.string().optional(),
  assets: z.array(
    z.object({
      name: z.string().optional(),
      browser_download_url: z.string(),
    }),
  ),
});

export type ReleaseMetadata = z.infer<typeof ReleaseSchema>;

export function latestReleaseUrl(owner: string, repo: string): string {
  return `${GITHUB_API}/repos/${owner}/${repo}/releases/latest`;
}

/**
 * Pick the asset for the first pattern that matches anything.
 * Within a pattern the first matching URL wins.
 */
export function selectAsset(
  urls: readonly string[],
  patterns: readonly string[],
): ReleaseAsset | undefined {
  for (const pattern of patterns) {
    const regex = new RegExp(pattern);
    const match = urls.find((url) => regex.test(url));
    if (match) {
      return {
        downloadUrl: match,
        filename: path.posix.basename(new URL(match).pathname),
      };
    }
  }
  return undefined;
}

export interface AssetFetcherOptions {
  http: HttpClient;
  system: SystemAdapter;
  tempFiles: TempFileRegistry;
  logger: Logger;
  /** Account that owns installed files */
  owner: OwnerSpec;
}

export interface InstalledAsset extends ReleaseAsset {
  installedPath: string;
}

export class AssetFetcher {
  constructor(private readonly options: AssetFetcherOptions) {}

  /**
   * Query the latest release once and select an asset from it.
   *
   * @throws ProvisionError (NETWORK_ERROR) when the metadata is unavailable
   * @throws ProvisionError (ASSET_NOT_FOUND) when no pattern matches
   */
  async findAsset(source: DriverSource): Promise<ReleaseAsset> {
    const { http, logger } = this.options;
    const url = latestReleaseUrl(source.owner, source.repo);

    let release: ReleaseMetadata;
    try {
      const body = await http.getText(url);
      release = ReleaseSchema.parse(JSON.parse(body));
    } catch (err: unknown) {
      throw new ProvisionError(
        "NETWORK_ERROR",
        `Failed to fetch release info for ${source.owner}/${source.repo}: ${errorMessage(err)}`,
        { url },
      );
    }

    const urls = release.assets.map((a) => a.browser_download_url);
    const asset = selectAsset(urls, source.patterns);
    if (!asset) {
      throw new ProvisionError(
        "ASSET_NOT_FOUND",
        `Could not find a suitable ${source.name} download with patterns: ${source.patterns.join(", ")}`,
        { release: release.tag_name, candidates: urls.length },
      );
    }

    logger.info(
      { driver: source.name, release: release.tag_name, url: asset.downloadUrl },
      "Matched release asset",
    );
    return asset;
  }

  /**
   * Find, download and install one asset into `libDir`.
   * The temp download is removed whether or not this succeeds.
   */
  async findAndDownloadAsset(
    source: DriverSource,
    libDir: string,
  ): Promise<InstalledAsset> {
    const { http, system, tempFiles, logger, owner } = this.options;
    const asset = await this.findAsset(source);
    const tempPath = tempFiles.create(asset.filename);

    try {
      try {
        await http.download(asset.downloadUrl, tempPath);
      } catch (err: unknown) {
        throw new ProvisionError(
          "NETWORK_ERROR",
          `Failed to download the ${source.name} driver: ${errorMessage(err)}`,
          { url: asset.downloadUrl },
        );
      }

      const installedPath = path.posix.join(libDir, asset.filename);
      await system.copyFile(tempPath, installedPath);
      await system.setOwner(installedPath, owner, false);
      await system.setMode(installedPath, "644", false);

      logger.info({ driver: source.name, path: installedPath }, "Driver installed");
      return { ...asset, installedPath };
    } finally {
      tempFiles.release(tempPath);
    }
  }
}
