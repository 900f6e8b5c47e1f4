import { promises as fs } from "fs";
import path from "path";
import { RetentionEntry } from "../models/geo-data";
import { DatabaseHandle } from "./database-handle";
import { ValidatedDatabase } from "./database-validator";
import { logger } from "../utils/logger";

export interface RetentionStoreOptions {
  dataDir: string;
  maxGenerations: number;
}

export interface PruneOptions {
  /** Handle just swapped out of the active slot, if any */
  retiring?: DatabaseHandle | null;
}

export const LATEST_LINK = "latest.mmdb";
const GENERATION_FILE = /^geoip-(\d+)\.mmdb$/;
const TEMP_SUFFIX = ".tmp";

/**
 * Database generations kept in the data directory, newest first.
 *
 * Each generation lives in `geoip-<buildEpoch>.mmdb`; `latest.mmdb` is a
 * symlink to the active one so an operator (or the next start) can tell
 * which file was being served.
 */
export class RetentionStore {
  private entries: RetentionEntry[] = [];
  private tempCounter = 0;
  private readonly log = logger.child({ component: "retention" });

  constructor(private readonly options: RetentionStoreOptions) {}

  list(): RetentionEntry[] {
    return this.entries.map((entry) => ({ ...entry }));
  }

  get active(): RetentionEntry | undefined {
    const entry = this.entries.find((candidate) => candidate.isActive);
    return entry ? { ...entry } : undefined;
  }

  fileFor(generationTimestamp: number): string {
    return path.join(this.options.dataDir, `geoip-${generationTimestamp}.mmdb`);
  }

  /**
   * Rebuild the bookkeeping from the data directory. Temporary files left by
   * an interrupted download or promotion are removed.
   */
  async load(): Promise<RetentionEntry[]> {
    const { dataDir } = this.options;
    await fs.mkdir(dataDir, { recursive: true });

    const activeFile = await this.readLatestLink();
    const entries: RetentionEntry[] = [];

    for (const name of await fs.readdir(dataDir)) {
      const filePath = path.join(dataDir, name);

      if (name.endsWith(TEMP_SUFFIX)) {
        this.log.info("Removing leftover temporary file", { file: name });
        await fs.rm(filePath, { force: true });
        continue;
      }

      const match = GENERATION_FILE.exec(name);
      if (!match) continue;

      const stats = await fs.stat(filePath);
      if (!stats.isFile()) continue;

      entries.push({
        generationTimestamp: parseInt(match[1], 10),
        filePath,
        sizeBytes: stats.size,
        isActive: name === activeFile,
      });
    }

    this.entries = entries.sort((a, b) => b.generationTimestamp - a.generationTimestamp);
    this.log.info("Loaded retained generations", {
      count: this.entries.length,
      active: this.active?.generationTimestamp,
    });
    return this.list();
  }

  /**
   * A fresh path for a download in progress.
   */
  tempPath(): string {
    this.tempCounter++;
    return path.join(
      this.options.dataDir,
      `download-${Date.now()}-${this.tempCounter}${TEMP_SUFFIX}`
    );
  }

  /**
   * Move a validated download to its generation file and record it.
   */
  async install(tempPath: string, validated: ValidatedDatabase): Promise<RetentionEntry> {
    const generationTimestamp = validated.metadata.buildEpoch;
    if (this.active?.generationTimestamp === generationTimestamp) {
      throw new Error(`Generation ${generationTimestamp} is already active`);
    }

    const filePath = this.fileFor(generationTimestamp);
    await fs.rename(tempPath, filePath);

    return this.record({
      generationTimestamp,
      filePath,
      sizeBytes: validated.sizeBytes,
    });
  }

  /**
   * Add an inactive entry, replacing one with the same timestamp.
   */
  record(entry: Omit<RetentionEntry, "isActive">): RetentionEntry {
    const recorded: RetentionEntry = { ...entry, isActive: false };
    this.entries = this.entries
      .filter((existing) => existing.generationTimestamp !== entry.generationTimestamp)
      .concat(recorded)
      .sort((a, b) => b.generationTimestamp - a.generationTimestamp);
    return { ...recorded };
  }

  /**
   * Point `latest.mmdb` at the entry and mark it active. The link is
   * created under a temporary name and renamed over the old one.
   */
  async promote(entry: RetentionEntry): Promise<void> {
    const target = this.entries.find(
      (existing) => existing.generationTimestamp === entry.generationTimestamp
    );
    if (!target) {
      throw new Error(`Generation ${entry.generationTimestamp} is not retained`);
    }

    const linkPath = path.join(this.options.dataDir, LATEST_LINK);
    const tempLink = `${linkPath}${TEMP_SUFFIX}`;
    await fs.rm(tempLink, { force: true });
    await fs.symlink(path.basename(target.filePath), tempLink);
    await fs.rename(tempLink, linkPath);

    for (const existing of this.entries) {
      existing.isActive = existing === target;
    }
    this.log.info("Promoted generation", {
      generation: target.generationTimestamp,
      file: path.basename(target.filePath),
    });
  }

  /**
   * Delete generations beyond `maxGenerations`, oldest first. The active
   * generation is never removed. A file still owned by the retiring handle
   * is deleted only after that handle is disposed.
   */
  async prune(options: PruneOptions = {}): Promise<RetentionEntry[]> {
    const { maxGenerations } = this.options;
    const removed: RetentionEntry[] = [];

    while (this.entries.length > maxGenerations) {
      const victim = [...this.entries].reverse().find((entry) => !entry.isActive);
      if (!victim) break;

      const retiring = options.retiring;
      if (retiring && retiring.filePath === victim.filePath && !retiring.isDisposed) {
        this.log.debug("Waiting for retired generation to drain", {
          generation: victim.generationTimestamp,
          references: retiring.references,
        });
        await retiring.whenDisposed();
      }

      await fs.rm(victim.filePath, { force: true });
      this.entries = this.entries.filter((entry) => entry !== victim);
      removed.push({ ...victim });
      this.log.info("Pruned generation", { generation: victim.generationTimestamp });
    }

    return removed;
  }

  /**
   * Remove a rejected or partial download.
   */
  async discard(filePath: string): Promise<void> {
    await fs.rm(filePath, { force: true });
  }

  private async readLatestLink(): Promise<string | null> {
    try {
      const target = await fs.readlink(path.join(this.options.dataDir, LATEST_LINK));
      return path.basename(target);
    } catch (error) {
      if (isNotFound(error) || hasCode(error, "EINVAL")) return null;
      throw error;
    }
  }
}

function hasCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}

function isNotFound(error: unknown): boolean {
  return hasCode(error, "ENOENT");
}
