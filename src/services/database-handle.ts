import { promises as fs } from "fs";
import { DatabaseClosedError, DecodeError } from "../errors";
import { Decoder, MmdbMap } from "./mmdb/decoder";
import { DatabaseMetadata, isMap, readMetadata } from "./mmdb/metadata";
import { SearchTree } from "./mmdb/search-tree";
import { ParsedIp } from "./ip-util";

/**
 * A counted reference to a handle. Release exactly once when done;
 * further calls are ignored.
 */
export interface DatabaseLease {
  readonly handle: DatabaseHandle;
  release(): void;
}

interface OpenDatabase {
  buffer: Buffer;
  tree: SearchTree;
  decoder: Decoder;
}

/**
 * One opened database generation.
 *
 * The handle stays usable while it is active or while any lease is
 * outstanding. Once it has been retired and the last lease is released,
 * the buffer is dropped and `whenDisposed()` resolves.
 */
export class DatabaseHandle {
  private refCount = 0;
  private retired = false;
  private open: OpenDatabase | null;
  private resolveDisposed: () => void = () => {};
  private readonly disposed = new Promise<void>((resolve) => {
    this.resolveDisposed = resolve;
  });

  private constructor(
    buffer: Buffer,
    readonly metadata: DatabaseMetadata,
    readonly filePath: string
  ) {
    this.open = {
      buffer,
      tree: new SearchTree(buffer, metadata),
      decoder: new Decoder(buffer, metadata.dataSectionOffset),
    };
  }

  /**
   * Wrap an already validated buffer.
   */
  static fromBuffer(
    buffer: Buffer,
    filePath: string,
    metadata: DatabaseMetadata = readMetadata(buffer)
  ): DatabaseHandle {
    return new DatabaseHandle(buffer, metadata, filePath);
  }

  static async open(filePath: string): Promise<DatabaseHandle> {
    const buffer = await fs.readFile(filePath);
    return DatabaseHandle.fromBuffer(buffer, filePath);
  }

  get sizeBytes(): number {
    return this.open?.buffer.length ?? 0;
  }

  get references(): number {
    return this.refCount;
  }

  get isRetired(): boolean {
    return this.retired;
  }

  get isDisposed(): boolean {
    return this.open === null;
  }

  acquire(): DatabaseLease {
    if (this.retired || this.open === null) {
      throw new DatabaseClosedError(`Database ${this.filePath} has been retired`);
    }

    this.refCount++;
    let released = false;
    return {
      handle: this,
      release: () => {
        if (released) return;
        released = true;
        this.refCount--;
        this.disposeIfUnused();
      },
    };
  }

  /**
   * Mark the handle as no longer active. New leases are refused; the buffer
   * is dropped once the last outstanding lease is released.
   */
  retire(): void {
    this.retired = true;
    this.disposeIfUnused();
  }

  whenDisposed(): Promise<void> {
    return this.disposed;
  }

  /**
   * Find the record for an address. Null when the database has no data
   * for it.
   *
   * @throws DecodeError on malformed tree or data
   */
  lookup(address: ParsedIp): MmdbMap | null {
    const open = this.requireOpen();
    const offset = open.tree.findRecordOffset(address);
    if (offset === null) return null;

    return this.decodeRecord(offset);
  }

  /**
   * Decode the data record at an absolute offset; it must be a map.
   */
  decodeRecord(offset: number): MmdbMap {
    const { value } = this.requireOpen().decoder.decode(offset);
    if (!isMap(value)) {
      throw new DecodeError(`Record at offset ${offset} is not a map`);
    }
    return value;
  }

  private requireOpen(): OpenDatabase {
    if (this.open === null) {
      throw new DatabaseClosedError(`Database ${this.filePath} has been disposed`);
    }
    return this.open;
  }

  private disposeIfUnused(): void {
    if (this.retired && this.refCount === 0 && this.open !== null) {
      this.open = null;
      this.resolveDisposed();
    }
  }
}
