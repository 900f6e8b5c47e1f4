/**
 * Builds MaxMind DB files in memory for tests: the inverse of the decoder
 * and the search tree walker.
 */
import { IpUtil } from "../../src/services/ip-util";
import { DataType } from "../../src/services/mmdb/decoder";
import {
  DATA_SECTION_SEPARATOR_SIZE,
  METADATA_START_MARKER,
  RecordSize,
} from "../../src/services/mmdb/metadata";

type ExplicitType = "uint16" | "uint32" | "int32" | "uint64" | "uint128" | "float" | "double";

/**
 * Forces the wire type of a number, e.g. `new Typed("uint16", 5)`.
 */
export class Typed {
  constructor(readonly type: ExplicitType, readonly value: number | bigint) {}
}

export type WriterValue =
  | string
  | number
  | bigint
  | boolean
  | Uint8Array
  | Typed
  | WriterValue[]
  | WriterMap;

export interface WriterMap {
  [key: string]: WriterValue;
}

function header(type: number, size: number): number[] {
  let sizeBits: number;
  let extra: number[] = [];

  if (size < 29) {
    sizeBits = size;
  } else if (size < 285) {
    sizeBits = 29;
    extra = [size - 29];
  } else if (size < 65821) {
    sizeBits = 30;
    const v = size - 285;
    extra = [(v >> 8) & 0xff, v & 0xff];
  } else {
    sizeBits = 31;
    const v = size - 65821;
    extra = [(v >> 16) & 0xff, (v >> 8) & 0xff, v & 0xff];
  }

  const control = type <= 7 ? [(type << 5) | sizeBits] : [sizeBits, type - 7];
  return [...control, ...extra];
}

function uintBytes(value: number | bigint): number[] {
  const bytes: number[] = [];
  let v = BigInt(value);
  while (v > 0n) {
    bytes.unshift(Number(v & 0xffn));
    v >>= 8n;
  }
  return bytes;
}

/**
 * Encode a pointer to `target`, an offset relative to the data section.
 */
export function encodePointer(target: number): number[] {
  if (target < 2048) {
    return [0x20 | ((target >> 8) & 0x07), target & 0xff];
  }
  if (target < 526336) {
    const v = target - 2048;
    return [0x28 | ((v >> 16) & 0x07), (v >> 8) & 0xff, v & 0xff];
  }
  if (target < 526336 + 0x8000000) {
    const v = target - 526336;
    return [0x30 | ((v >> 24) & 0x07), (v >> 16) & 0xff, (v >> 8) & 0xff, v & 0xff];
  }
  return [0x38, ...uintBytes(target).slice(-4)];
}

function encodeTyped(typed: Typed): number[] {
  const { type, value } = typed;

  switch (type) {
    case "uint16": {
      const bytes = uintBytes(value);
      return [...header(DataType.Uint16, bytes.length), ...bytes];
    }
    case "uint32": {
      const bytes = uintBytes(value);
      return [...header(DataType.Uint32, bytes.length), ...bytes];
    }
    case "int32": {
      const n = Number(value);
      const bytes = n < 0 ? uintBytes(n >>> 0) : uintBytes(n);
      return [...header(DataType.Int32, bytes.length), ...bytes];
    }
    case "uint64": {
      const bytes = uintBytes(value);
      return [...header(DataType.Uint64, bytes.length), ...bytes];
    }
    case "uint128": {
      const bytes = uintBytes(value);
      return [...header(DataType.Uint128, bytes.length), ...bytes];
    }
    case "float": {
      const buffer = Buffer.alloc(4);
      buffer.writeFloatBE(Number(value));
      return [...header(DataType.Float, 4), ...buffer];
    }
    case "double": {
      const buffer = Buffer.alloc(8);
      buffer.writeDoubleBE(Number(value));
      return [...header(DataType.Double, 8), ...buffer];
    }
  }
}

function typedFor(value: number | bigint): Typed {
  if (typeof value === "bigint") {
    return new Typed(value < 1n << 64n ? "uint64" : "uint128", value);
  }
  if (Number.isInteger(value) && value >= 0 && value <= 0xffffffff) {
    return new Typed("uint32", value);
  }
  if (Number.isInteger(value) && value >= -0x80000000 && value < 0) {
    return new Typed("int32", value);
  }
  return new Typed("double", value);
}

/**
 * Appends encoded values to a data section. Strings are written once and
 * referenced by pointer afterwards when `dedupe` is on.
 */
export class DataSectionWriter {
  private readonly bytes: number[] = [];
  private readonly strings = new Map<string, number>();
  private readonly records = new Map<object, number>();

  constructor(private readonly dedupe = true) {}

  get length(): number {
    return this.bytes.length;
  }

  /**
   * Write a top-level record, reusing the offset of an identical object.
   */
  storeRecord(record: WriterMap): number {
    const cached = this.records.get(record);
    if (cached !== undefined) return cached;

    const offset = this.bytes.length;
    this.write(record);
    this.records.set(record, offset);
    return offset;
  }

  /**
   * Append one value at the end; returns its offset.
   */
  write(value: WriterValue): number {
    const offset = this.bytes.length;

    if (typeof value === "string") {
      const cached = this.dedupe ? this.strings.get(value) : undefined;
      if (cached !== undefined) {
        this.push(encodePointer(cached));
        return offset;
      }
      const encoded = Buffer.from(value, "utf8");
      this.push([...header(DataType.Utf8String, encoded.length), ...encoded]);
      if (this.dedupe) this.strings.set(value, offset);
      return offset;
    }

    if (typeof value === "number" || typeof value === "bigint") {
      this.push(encodeTyped(typedFor(value)));
      return offset;
    }

    if (typeof value === "boolean") {
      this.push(header(DataType.Boolean, value ? 1 : 0));
      return offset;
    }

    if (value instanceof Typed) {
      this.push(encodeTyped(value));
      return offset;
    }

    if (value instanceof Uint8Array) {
      this.push([...header(DataType.Bytes, value.length), ...value]);
      return offset;
    }

    if (Array.isArray(value)) {
      this.push(header(DataType.Array, value.length));
      for (const item of value) this.write(item);
      return offset;
    }

    const entries = Object.entries(value);
    this.push(header(DataType.Map, entries.length));
    for (const [key, item] of entries) {
      this.write(key);
      this.write(item);
    }
    return offset;
  }

  pushRaw(bytes: number[]): void {
    this.push(bytes);
  }

  toBuffer(): Buffer {
    return Buffer.from(this.bytes);
  }

  private push(bytes: number[]): void {
    for (const byte of bytes) this.bytes.push(byte);
  }
}

/**
 * Encode a single value without pointers.
 */
export function encodeValue(value: WriterValue): Buffer {
  const writer = new DataSectionWriter(false);
  writer.write(value);
  return writer.toBuffer();
}

interface TrieNode {
  children: [TrieChild, TrieChild];
}

type TrieChild = TrieNode | { data: number } | null;

function isNode(child: TrieChild): child is TrieNode {
  return child !== null && "children" in child;
}

export interface MmdbWriterOptions {
  ipVersion?: 4 | 6;
  recordSize?: RecordSize;
  buildEpoch?: number;
  databaseType?: string;
  languages?: string[];
  description?: Record<string, string>;
  /** Unreferenced bytes appended to the data section to grow the file */
  paddingBytes?: number;
  /** Extra metadata entries, or overrides of the generated ones */
  metadata?: WriterMap;
}

/**
 * Collects networks and their records, then lays out a complete database
 * file: search tree, separator, data section, metadata.
 */
export class MmdbWriter {
  private readonly root: TrieNode = { children: [null, null] };
  private readonly data = new DataSectionWriter();
  private readonly ipVersion: 4 | 6;
  private readonly recordSize: RecordSize;

  constructor(private readonly options: MmdbWriterOptions = {}) {
    this.ipVersion = options.ipVersion ?? 6;
    this.recordSize = options.recordSize ?? 28;
  }

  /**
   * Map a network ("8.8.8.0/24", "2001:db8::/32") to a record. Insert
   * broader networks before narrower ones inside them.
   */
  insert(cidr: string, record: WriterMap): this {
    const parsed = IpUtil.parseCidr(cidr);
    if (!parsed) throw new Error(`Invalid network ${cidr}`);

    let bytes = parsed.address.bytes;
    let prefixLength = parsed.prefixLength;

    if (this.ipVersion === 4 && parsed.address.version === 6) {
      throw new Error(`Cannot insert ${cidr} into an IPv4 database`);
    }
    if (this.ipVersion === 6 && parsed.address.version === 4) {
      const widened = new Uint8Array(16);
      widened.set(bytes, 12);
      bytes = widened;
      prefixLength += 96;
    }
    if (prefixLength === 0) throw new Error("Cannot map the whole address space");

    const leaf = { data: this.data.storeRecord(record) };
    let node = this.root;

    for (let i = 0; i < prefixLength; i++) {
      const bit = (bytes[i >> 3] >> (7 - (i & 7))) & 1;

      if (i === prefixLength - 1) {
        node.children[bit] = leaf;
        break;
      }

      const child = node.children[bit];
      if (isNode(child)) {
        node = child;
      } else {
        // split an empty or broader leaf
        const next: TrieNode = { children: [child, child] };
        node.children[bit] = next;
        node = next;
      }
    }

    return this;
  }

  build(): Buffer {
    const nodes = this.numberNodes();
    const nodeCount = nodes.length;
    const index = new Map<TrieNode, number>(nodes.map((node, i) => [node, i]));

    const recordValue = (child: TrieChild): number => {
      if (child === null) return nodeCount;
      if (isNode(child)) {
        const value = index.get(child);
        if (value === undefined) throw new Error("Unnumbered node");
        return value;
      }
      return nodeCount + DATA_SECTION_SEPARATOR_SIZE + child.data;
    };

    const nodeBytes = this.recordSize / 4;
    const tree = Buffer.alloc(nodeCount * nodeBytes);
    nodes.forEach((node, i) => {
      writeNode(tree, i * nodeBytes, this.recordSize, recordValue(node.children[0]), recordValue(node.children[1]));
    });

    if (this.options.paddingBytes) {
      this.data.pushRaw(new Array<number>(this.options.paddingBytes).fill(0));
    }

    return Buffer.concat([
      tree,
      Buffer.alloc(DATA_SECTION_SEPARATOR_SIZE),
      this.data.toBuffer(),
      METADATA_START_MARKER,
      this.metadata(nodeCount),
    ]);
  }

  private metadata(nodeCount: number): Buffer {
    const { options } = this;
    const metadata: WriterMap = {
      binary_format_major_version: new Typed("uint16", 2),
      binary_format_minor_version: new Typed("uint16", 0),
      build_epoch: new Typed("uint64", BigInt(options.buildEpoch ?? 1700000000)),
      database_type: options.databaseType ?? "Test-City",
      description: options.description ?? { en: "Test database" },
      ip_version: new Typed("uint16", this.ipVersion),
      languages: options.languages ?? ["en"],
      node_count: new Typed("uint32", nodeCount),
      record_size: new Typed("uint16", this.recordSize),
      ...options.metadata,
    };
    return encodeValue(metadata);
  }

  private numberNodes(): TrieNode[] {
    const nodes: TrieNode[] = [];
    const queue: TrieNode[] = [this.root];

    while (queue.length > 0) {
      const node = queue.shift();
      if (!node) break;
      nodes.push(node);
      for (const child of node.children) {
        if (isNode(child)) queue.push(child);
      }
    }

    return nodes;
  }
}

function writeNode(
  tree: Buffer,
  base: number,
  recordSize: RecordSize,
  left: number,
  right: number
): void {
  switch (recordSize) {
    case 24:
      tree.writeUIntBE(left, base, 3);
      tree.writeUIntBE(right, base + 3, 3);
      break;
    case 28:
      tree.writeUIntBE(left & 0xffffff, base, 3);
      tree[base + 3] = (((left >>> 24) & 0x0f) << 4) | ((right >>> 24) & 0x0f);
      tree.writeUIntBE(right & 0xffffff, base + 4, 3);
      break;
    case 32:
      tree.writeUInt32BE(left, base);
      tree.writeUInt32BE(right, base + 4);
      break;
  }
}
