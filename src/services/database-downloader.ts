import { promises as fs } from "fs";
import { promisify } from "util";
import zlib from "zlib";
import { DownloadError, errorMessage } from "../errors";
import { logger } from "../utils/logger";

const gunzip = promisify(zlib.gunzip);

export interface DownloaderOptions {
  /** URL, optionally with {YYYY} and {MM} placeholders */
  url: string;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
  now?: () => Date;
}

export interface DownloadResult {
  url: string;
  sizeBytes: number;
}

/**
 * Fill the {YYYY}/{MM} placeholders with the UTC year and month of `date`.
 */
export function resolveDatabaseUrl(template: string, date: Date): string {
  const year = String(date.getUTCFullYear());
  const month = String(date.getUTCMonth() + 1).padStart(2, "0");
  return template.replace(/\{YYYY\}/g, year).replace(/\{MM\}/g, month);
}

function previousMonth(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth() - 1, 1));
}

function isGzip(buffer: Buffer): boolean {
  return buffer.length >= 2 && buffer[0] === 0x1f && buffer[1] === 0x8b;
}

/**
 * Fetches the vendor database to a local file.
 *
 * The vendor publishes one file per month; early in a month the current
 * file may not exist yet, so a 404 falls back to the previous month.
 */
export class DatabaseDownloader {
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => Date;
  private readonly log = logger.child({ component: "downloader" });

  constructor(private readonly options: DownloaderOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * True when the URL names a month. Each month then maps to one immutable
   * file; a fixed URL may change content at any time.
   */
  get isMonthly(): boolean {
    return /\{(YYYY|MM)\}/.test(this.options.url);
  }

  currentUrl(): string {
    return resolveDatabaseUrl(this.options.url, this.now());
  }

  candidateUrls(): string[] {
    const current = this.currentUrl();
    const previous = resolveDatabaseUrl(this.options.url, previousMonth(this.now()));
    return current === previous ? [current] : [current, previous];
  }

  /**
   * Download to `destPath`, decompressing gzip bodies. The file is synced
   * before this resolves and removed if anything fails.
   *
   * @throws DownloadError on network failure, timeout, abort or a
   *   non-success status
   */
  async download(destPath: string, signal?: AbortSignal): Promise<DownloadResult> {
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.options.timeoutMs);

    const onAbort = () => controller.abort();
    if (signal?.aborted) controller.abort();
    signal?.addEventListener("abort", onAbort);

    try {
      const { url, body } = await this.fetchBody(controller.signal);
      const data = await this.decompress(url, body);
      await this.writeFile(destPath, data);

      this.log.info("Database downloaded", { url, sizeBytes: data.length });
      return { url, sizeBytes: data.length };
    } catch (error) {
      await fs.rm(destPath, { force: true });

      if (controller.signal.aborted) {
        throw new DownloadError(
          timedOut
            ? `Download timed out after ${this.options.timeoutMs}ms`
            : "Download aborted",
          { cause: error }
        );
      }
      if (error instanceof DownloadError) throw error;
      throw new DownloadError(`Download failed: ${errorMessage(error)}`, { cause: error });
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    }
  }

  private async fetchBody(signal: AbortSignal): Promise<{ url: string; body: Buffer }> {
    const urls = this.candidateUrls();

    for (let i = 0; i < urls.length; i++) {
      const url = urls[i];
      signal.throwIfAborted();
      this.log.debug("Requesting database", { url });
      const response = await this.fetchImpl(url, { signal });

      if (response.status === 404 && i < urls.length - 1) {
        this.log.info("Database not published yet, trying previous month", { url });
        continue;
      }

      if (!response.ok) {
        throw new DownloadError(`Request to ${url} failed with status ${response.status}`, {
          status: response.status,
        });
      }

      return { url, body: Buffer.from(await response.arrayBuffer()) };
    }

    throw new DownloadError("No database URL to try");
  }

  private async decompress(url: string, body: Buffer): Promise<Buffer> {
    if (!isGzip(body)) return body;

    try {
      return await gunzip(body);
    } catch (error) {
      throw new DownloadError(`Cannot decompress ${url}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  private async writeFile(destPath: string, data: Buffer): Promise<void> {
    const file = await fs.open(destPath, "w");
    try {
      await file.writeFile(data);
      await file.sync();
    } finally {
      await file.close();
    }
  }
}
