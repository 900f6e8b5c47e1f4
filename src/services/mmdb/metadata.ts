import { DecodeError } from "../../errors";
import { Decoder, MmdbMap, MmdbValue } from "./decoder";

export type RecordSize = 24 | 28 | 32;

export interface DatabaseMetadata {
  binaryFormatMajorVersion: number;
  binaryFormatMinorVersion: number;
  /** 4 = IPv4 only, 6 = dual stack */
  ipVersion: 4 | 6;
  recordSize: RecordSize;
  nodeCount: number;
  treeByteLength: number;
  dataSectionOffset: number;
  /** Offset of the metadata start marker */
  metadataOffset: number;
  /** Seconds since the epoch */
  buildEpoch: number;
  databaseType?: string;
  languages: string[];
  description: Record<string, string>;
}

export const METADATA_START_MARKER = Buffer.from("\xab\xcd\xefMaxMind.com", "latin1");

/** The metadata section is at most this large */
const METADATA_MAX_SIZE = 128 * 1024;

/** Zero bytes between the search tree and the data section */
export const DATA_SECTION_SEPARATOR_SIZE = 16;

/**
 * Locate and decode the metadata block at the end of a database file, then
 * check the fields the search tree depends on.
 *
 * @throws DecodeError when the marker is missing, the map is malformed or a
 *   required field is absent or inconsistent with the file size
 */
export function readMetadata(buffer: Buffer): DatabaseMetadata {
  const searchStart = Math.max(0, buffer.length - METADATA_MAX_SIZE - METADATA_START_MARKER.length);
  const markerIndex = buffer.lastIndexOf(METADATA_START_MARKER);

  if (markerIndex === -1 || markerIndex < searchStart) {
    throw new DecodeError("Metadata section not found");
  }

  const metadataStart = markerIndex + METADATA_START_MARKER.length;
  const { value } = new Decoder(buffer, metadataStart).decode(metadataStart);
  if (!isMap(value)) {
    throw new DecodeError("Metadata is not a map");
  }

  const majorVersion = optionalInteger(value, "binary_format_major_version");
  if (majorVersion !== undefined && majorVersion !== 2) {
    throw new DecodeError(`Unsupported binary format major version ${majorVersion}`);
  }

  const recordSize = requiredInteger(value, "record_size");
  if (recordSize !== 24 && recordSize !== 28 && recordSize !== 32) {
    throw new DecodeError(`Unsupported record size ${recordSize}`);
  }

  const nodeCount = requiredInteger(value, "node_count");
  if (nodeCount < 1) {
    throw new DecodeError(`Invalid node count ${nodeCount}`);
  }

  const ipVersion = requiredInteger(value, "ip_version");
  if (ipVersion !== 4 && ipVersion !== 6) {
    throw new DecodeError(`Invalid IP version ${ipVersion}`);
  }

  const buildEpoch = requiredInteger(value, "build_epoch");

  const treeByteLength = (nodeCount * recordSize * 2) / 8;
  const dataSectionOffset = treeByteLength + DATA_SECTION_SEPARATOR_SIZE;
  if (dataSectionOffset > markerIndex) {
    throw new DecodeError(
      `Search tree of ${nodeCount} nodes (${treeByteLength} bytes) does not fit before the metadata at ${markerIndex}`
    );
  }

  const databaseType = value.database_type;

  return {
    binaryFormatMajorVersion: majorVersion ?? 2,
    binaryFormatMinorVersion: optionalInteger(value, "binary_format_minor_version") ?? 0,
    ipVersion,
    recordSize,
    nodeCount,
    treeByteLength,
    dataSectionOffset,
    metadataOffset: markerIndex,
    buildEpoch,
    databaseType: typeof databaseType === "string" ? databaseType : undefined,
    languages: stringArray(value.languages),
    description: stringMap(value.description),
  };
}

export function isMap(value: MmdbValue | undefined): value is MmdbMap {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Uint8Array)
  );
}

function toInteger(key: string, value: MmdbValue): number {
  if (typeof value === "bigint") {
    if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw new DecodeError(`Metadata field ${key} is out of range`);
    }
    return Number(value);
  }
  if (typeof value === "number" && Number.isInteger(value)) {
    return value;
  }
  throw new DecodeError(`Metadata field ${key} is not an integer`);
}

function requiredInteger(map: MmdbMap, key: string): number {
  const value = map[key];
  if (value === undefined) {
    throw new DecodeError(`Metadata field ${key} is missing`);
  }
  return toInteger(key, value);
}

function optionalInteger(map: MmdbMap, key: string): number | undefined {
  const value = map[key];
  return value === undefined ? undefined : toInteger(key, value);
}

function stringArray(value: MmdbValue | undefined): string[] {
  return Array.isArray(value)
    ? value.filter((item): item is string => typeof item === "string")
    : [];
}

function stringMap(value: MmdbValue | undefined): Record<string, string> {
  const result: Record<string, string> = {};
  if (!isMap(value)) return result;
  for (const [key, item] of Object.entries(value)) {
    if (typeof item === "string") result[key] = item;
  }
  return result;
}
