import { StartupError, errorMessage } from "../errors";
import { ActiveDatabase } from "./active-database";
import { DatabaseHandle } from "./database-handle";
import { DatabaseDownloader } from "./database-downloader";
import { DatabaseValidator } from "./database-validator";
import { RetentionStore } from "./retention-store";
import { logger } from "../utils/logger";

export type SchedulerState = "idle" | "downloading" | "validating" | "activating" | "pruning";

export type UpdateOutcome =
  | { status: "activated"; generationTimestamp: number }
  | { status: "unchanged"; generationTimestamp: number }
  | { status: "skipped" }
  | { status: "failed"; error: Error };

export interface UpdateSchedulerOptions {
  updateIntervalMs: number;
  retryAttempts: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
}

export interface UpdateSchedulerDeps {
  slot: ActiveDatabase;
  store: RetentionStore;
  validator: DatabaseValidator;
  downloader: DatabaseDownloader;
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Keeps the active database current: download, validate, activate, prune.
 *
 * Only one cycle runs at a time. A failed cycle leaves the active
 * generation in place and is retried on the next tick.
 */
export class UpdateScheduler {
  private currentState: SchedulerState = "idle";
  private running: Promise<UpdateOutcome> | null = null;
  private abortController: AbortController | null = null;
  private timer: NodeJS.Timeout | null = null;
  private stopped = false;
  /** URL the active generation was last fetched from */
  private activeSource: { handle: DatabaseHandle; url: string } | null = null;
  private readonly log = logger.child({ component: "scheduler" });

  constructor(
    private readonly deps: UpdateSchedulerDeps,
    private readonly options: UpdateSchedulerOptions
  ) {}

  get state(): SchedulerState {
    return this.currentState;
  }

  /**
   * Make a database available, then start the update timer.
   *
   * @throws StartupError when nothing on disk is loadable and every
   *   download attempt failed
   */
  async start(): Promise<void> {
    this.stopped = false;
    await this.deps.store.load();

    const restored = await this.openNewestGeneration();
    if (restored) {
      this.deps.slot.swap(restored);
      this.log.info("Serving retained database", {
        generation: restored.metadata.buildEpoch,
        file: restored.filePath,
      });
    } else {
      await this.firstDownload();
    }

    this.timer = setInterval(() => this.tick(), this.options.updateIntervalMs);
    this.log.info("Update timer started", { intervalMs: this.options.updateIntervalMs });
  }

  /**
   * Run one update cycle unless one is already in flight.
   */
  runOnce(): Promise<UpdateOutcome> {
    if (this.running) {
      this.log.debug("Update already running, skipping");
      return Promise.resolve({ status: "skipped" });
    }

    const cycle = this.runCycle().finally(() => {
      this.running = null;
      this.abortController = null;
      this.currentState = "idle";
    });
    this.running = cycle;
    return cycle;
  }

  /**
   * Stop the timer and abort an in-flight download, then wait for the
   * cycle to finish.
   */
  async stop(): Promise<void> {
    this.stopped = true;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.abortController?.abort();
    if (this.running) await this.running;
  }

  private tick(): void {
    this.runOnce().then(
      (outcome) => this.log.debug("Scheduled update finished", { status: outcome.status }),
      (error: unknown) => this.log.error("Scheduled update crashed", { error })
    );
  }

  private async firstDownload(): Promise<void> {
    const { retryAttempts, retryBaseDelayMs, retryMaxDelayMs } = this.options;
    let lastError: Error | undefined;

    for (let attempt = 0; attempt < retryAttempts; attempt++) {
      if (this.stopped) break;

      const outcome = await this.runOnce();
      if (outcome.status === "activated") return;
      if (outcome.status === "failed") lastError = outcome.error;

      if (attempt < retryAttempts - 1) {
        const delay = Math.min(Math.pow(2, attempt) * retryBaseDelayMs, retryMaxDelayMs);
        this.log.warn("No database available yet, retrying", {
          attempt: attempt + 1,
          delayMs: delay,
        });
        await sleep(delay);
      }
    }

    throw new StartupError(
      `No database available after ${retryAttempts} attempts${
        lastError ? `: ${lastError.message}` : ""
      }`,
      { cause: lastError }
    );
  }

  private async runCycle(): Promise<UpdateOutcome> {
    const { slot, store, validator, downloader } = this.deps;
    const current = slot.handle;

    if (current && this.isAlreadyFetched(current)) {
      this.log.debug("This month's database is already active", { url: this.activeSource?.url });
      return { status: "unchanged", generationTimestamp: current.metadata.buildEpoch };
    }

    const tempPath = store.tempPath();
    const abortController = new AbortController();
    this.abortController = abortController;

    try {
      this.currentState = "downloading";
      const download = await downloader.download(tempPath, abortController.signal);

      this.currentState = "validating";
      const active = slot.handle;
      const validated = await validator.validate(tempPath, active?.sizeBytes);
      const generationTimestamp = validated.metadata.buildEpoch;

      if (active && generationTimestamp <= active.metadata.buildEpoch) {
        this.activeSource = { handle: active, url: download.url };
        await store.discard(tempPath);
        this.log.info("Downloaded database is not newer than the active one", {
          generation: generationTimestamp,
          active: active.metadata.buildEpoch,
        });
        return { status: "unchanged", generationTimestamp };
      }

      this.currentState = "activating";
      const entry = await store.install(tempPath, validated);
      const handle = DatabaseHandle.fromBuffer(validated.buffer, entry.filePath, validated.metadata);
      await store.promote(entry);
      const previous = slot.swap(handle);
      previous?.retire();
      this.activeSource = { handle, url: download.url };
      this.log.info("Activated database", {
        generation: generationTimestamp,
        url: download.url,
        previous: previous?.metadata.buildEpoch,
      });

      this.currentState = "pruning";
      try {
        await store.prune({ retiring: previous });
      } catch (error) {
        this.log.warn("Pruning old generations failed", { error: errorMessage(error) });
      }

      return { status: "activated", generationTimestamp };
    } catch (error) {
      await store.discard(tempPath);
      const failure = error instanceof Error ? error : new Error(String(error));
      this.log.error("Database update failed", { state: this.currentState, error: failure });
      return { status: "failed", error: failure };
    }
  }

  private isAlreadyFetched(active: DatabaseHandle): boolean {
    const { downloader } = this.deps;
    return (
      downloader.isMonthly &&
      this.activeSource?.handle === active &&
      this.activeSource.url === downloader.currentUrl()
    );
  }

  /**
   * Open the generation `latest.mmdb` points at, or failing that the newest
   * retained file that still validates.
   */
  private async openNewestGeneration(): Promise<DatabaseHandle | null> {
    const { store, validator } = this.deps;
    const entries = store.list().sort((a, b) => Number(b.isActive) - Number(a.isActive));

    for (const entry of entries) {
      try {
        const validated = await validator.validate(entry.filePath);
        if (!entry.isActive) await store.promote(entry);
        return DatabaseHandle.fromBuffer(validated.buffer, entry.filePath, validated.metadata);
      } catch (error) {
        this.log.warn("Retained generation is not loadable", {
          file: entry.filePath,
          error: errorMessage(error),
        });
      }
    }

    return null;
  }
}
