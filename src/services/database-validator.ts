import { promises as fs } from "fs";
import { DecodeError, ValidationError } from "../errors";
import { Decoder } from "./mmdb/decoder";
import {
  DATA_SECTION_SEPARATOR_SIZE,
  DatabaseMetadata,
  isMap,
  readMetadata,
} from "./mmdb/metadata";
import { SearchTree } from "./mmdb/search-tree";
import { logger } from "../utils/logger";

export interface ValidatorOptions {
  /** Smallest acceptable file, bytes */
  minSizeBytes: number;
  /** Smallest acceptable size as a fraction of the active generation */
  minSizeRatio: number;
  /** Nodes visited by the structural check */
  maxCheckedNodes?: number;
}

export interface ValidatedDatabase {
  buffer: Buffer;
  metadata: DatabaseMetadata;
  sizeBytes: number;
}

const DEFAULT_CHECKED_NODES = 1024;

/**
 * Decides whether a downloaded file may become the active database.
 * A rejected file is never opened for lookups.
 */
export class DatabaseValidator {
  private readonly log = logger.child({ component: "validator" });

  constructor(private readonly options: ValidatorOptions) {}

  /**
   * Check the file at `filePath`. `activeSizeBytes` is the size of the
   * currently active generation, if any.
   *
   * @throws ValidationError describing the first failed check
   */
  async validate(filePath: string, activeSizeBytes?: number): Promise<ValidatedDatabase> {
    let buffer: Buffer;
    try {
      buffer = await fs.readFile(filePath);
    } catch (error) {
      throw new ValidationError(`Cannot read candidate ${filePath}`, { cause: error });
    }

    const validated = this.validateBuffer(buffer, activeSizeBytes);
    this.log.info("Candidate database accepted", {
      file: filePath,
      sizeBytes: validated.sizeBytes,
      buildEpoch: validated.metadata.buildEpoch,
      nodeCount: validated.metadata.nodeCount,
    });
    return validated;
  }

  validateBuffer(buffer: Buffer, activeSizeBytes?: number): ValidatedDatabase {
    const sizeBytes = buffer.length;
    const { minSizeBytes, minSizeRatio } = this.options;

    if (sizeBytes === 0) {
      throw new ValidationError("Candidate database is empty");
    }

    if (sizeBytes < minSizeBytes) {
      throw new ValidationError(
        `Candidate database is ${sizeBytes} bytes, below the minimum of ${minSizeBytes}`
      );
    }

    if (activeSizeBytes !== undefined && sizeBytes < activeSizeBytes * minSizeRatio) {
      throw new ValidationError(
        `Candidate database is ${sizeBytes} bytes, less than ${minSizeRatio} of the active ${activeSizeBytes}`
      );
    }

    let metadata: DatabaseMetadata;
    try {
      metadata = readMetadata(buffer);
      this.checkStructure(buffer, metadata);
    } catch (error) {
      if (error instanceof DecodeError) {
        throw new ValidationError(`Candidate database is malformed: ${error.message}`, {
          cause: error,
        });
      }
      throw error;
    }

    return { buffer, metadata, sizeBytes };
  }

  /**
   * Verify the separator and decode every record reachable from the first
   * nodes of the tree, breadth first.
   */
  private checkStructure(buffer: Buffer, metadata: DatabaseMetadata): void {
    const separator = buffer.subarray(
      metadata.treeByteLength,
      metadata.treeByteLength + DATA_SECTION_SEPARATOR_SIZE
    );
    if (separator.some((byte) => byte !== 0)) {
      throw new DecodeError("Data section separator is not zeroed");
    }

    const tree = new SearchTree(buffer, metadata);
    const decoder = new Decoder(buffer, metadata.dataSectionOffset);
    const limit = Math.min(metadata.nodeCount, this.options.maxCheckedNodes ?? DEFAULT_CHECKED_NODES);

    const checked = new Set<number>();
    const queue = [0];
    const visited = new Set<number>(queue);

    while (queue.length > 0) {
      const node = queue.shift();
      if (node === undefined) break;

      for (const index of [0, 1]) {
        const record = tree.readNode(node, index);
        if (record < metadata.nodeCount) {
          if (!visited.has(record) && visited.size < limit) {
            visited.add(record);
            queue.push(record);
          }
          continue;
        }

        const offset = tree.resolve(record);
        if (offset === null || checked.has(offset)) continue;
        checked.add(offset);

        const { value } = decoder.decode(offset);
        if (!isMap(value)) {
          throw new DecodeError(`Record at offset ${offset} is not a map`);
        }
      }
    }
  }
}
