/**
 * tcsetup Engine - HTTPS Client
 *
 * Text fetches (directory listings, release metadata) and file downloads
 * with progress reporting. HTTPS only, up to 5 redirects, bounded timeouts,
 * single attempt.
 */

import * as fs from "fs";
import * as https from "https";
import { IncomingMessage } from "http";
import { Logger } from "./utils/logger";
import { ProvisionError } from "./errors";

export interface DownloadProgress {
  bytes_downloaded: number;
  bytes_total: number;
  percent: number;
}

export interface DownloadResult {
  file_path: string;
  bytes_downloaded: number;
  duration_ms: number;
}

export type ProgressCallback = (progress: DownloadProgress) => void;

/**
 * Everything the engine needs from the network. Tests substitute an
 * in-memory implementation.
 */
export interface HttpClient {
  getText(url: string): Promise<string>;
  download(
    url: string,
    destPath: string,
    onProgress?: ProgressCallback,
  ): Promise<DownloadResult>;
}

export interface HttpsClientOptions {
  /** Timeout for text requests */
  timeoutMs: number;
  /** Timeout for file downloads */
  downloadTimeoutMs: number;
  logger: Logger;
}

const MAX_REDIRECTS = 5;
const USER_AGENT = "tcsetup";

export class HttpsClient implements HttpClient {
  constructor(private readonly options: HttpsClientOptions) {}

  async getText(url: string): Promise<string> {
    const response = await this.request(url, this.options.timeoutMs, 0);
    return new Promise<string>((resolve, reject) => {
      let body = "";
      response.setEncoding("utf-8");
      response.on("data", (chunk: string) => (body += chunk));
      response.on("end", () => resolve(body));
      response.on("error", (err) =>
        reject(new ProvisionError("NETWORK_ERROR", `Read failed for ${url}: ${err.message}`)),
      );
    });
  }

  async download(
    url: string,
    destPath: string,
    onProgress?: ProgressCallback,
  ): Promise<DownloadResult> {
    const { logger, downloadTimeoutMs } = this.options;
    const startTime = Date.now();

    logger.info({ url, dest: destPath }, "Starting download");
    const response = await this.request(url, downloadTimeoutMs, 0);

    const totalBytes = parseInt(response.headers["content-length"] || "0", 10);
    let downloadedBytes = 0;

    return new Promise<DownloadResult>((resolve, reject) => {
      const fileStream = fs.createWriteStream(destPath);

      response.on("data", (chunk: Buffer) => {
        downloadedBytes += chunk.length;
        if (onProgress && totalBytes > 0) {
          onProgress({
            bytes_downloaded: downloadedBytes,
            bytes_total: totalBytes,
            percent: Math.round((downloadedBytes / totalBytes) * 100),
          });
        }
      });

      response.on("error", (err) => {
        fileStream.destroy();
        reject(new ProvisionError("NETWORK_ERROR", `Download interrupted: ${err.message}`));
      });

      response.pipe(fileStream);

      fileStream.on("finish", () => {
        const duration = Date.now() - startTime;
        logger.info(
          { dest: destPath, bytes: downloadedBytes, duration_ms: duration },
          "Download complete",
        );
        resolve({
          file_path: destPath,
          bytes_downloaded: downloadedBytes,
          duration_ms: duration,
        });
      });

      fileStream.on("error", (err) => {
        reject(
          new ProvisionError(
            "NETWORK_ERROR",
            `Failed to write downloaded file: ${err.message}`,
          ),
        );
      });
    });
  }

  /**
   * Issue a GET and resolve with a 200 response, following redirects.
   */
  private request(
    url: string,
    timeoutMs: number,
    hops: number,
  ): Promise<IncomingMessage> {
    if (!url.startsWith("https://")) {
      return Promise.reject(
        new ProvisionError("NETWORK_ERROR", `URL must be HTTPS. Got: ${url}`),
      );
    }

    return new Promise<IncomingMessage>((resolve, reject) => {
      const request = https.get(
        url,
        {
          headers: {
            "User-Agent": USER_AGENT,
            Accept: "*/*",
          },
        },
        (response) => {
          const status = response.statusCode ?? 0;
          const location = response.headers.location;

          if (status >= 300 && status < 400 && location) {
            response.resume();
            if (hops >= MAX_REDIRECTS) {
              reject(new ProvisionError("NETWORK_ERROR", `Too many redirects for ${url}`));
              return;
            }
            const next = new URL(location, url).toString();
            this.options.logger.debug({ redirect: next }, "Following redirect");
            this.request(next, timeoutMs, hops + 1).then(resolve, reject);
            return;
          }

          if (status !== 200) {
            response.resume();
            reject(
              new ProvisionError("NETWORK_ERROR", `HTTP ${status} for ${url}`, {
                status,
              }),
            );
            return;
          }

          resolve(response);
        },
      );

      request.on("error", (err) => {
        reject(new ProvisionError("NETWORK_ERROR", `Request failed for ${url}: ${err.message}`));
      });

      request.setTimeout(timeoutMs, () => {
        request.destroy();
        reject(
          new ProvisionError(
            "NETWORK_ERROR",
            `Request timed out after ${Math.round(timeoutMs / 1000)} seconds: ${url}`,
          ),
        );
      });
    });
  }
}
