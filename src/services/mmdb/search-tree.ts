import { DecodeError } from "../../errors";
import { IpUtil, ParsedIp } from "../ip-util";
import { DATA_SECTION_SEPARATOR_SIZE, DatabaseMetadata } from "./metadata";

/**
 * Read access to the binary trie at the start of a database file.
 */
export class SearchTree {
  private readonly nodeByteSize: number;
  private ipv4StartNode: number | null = null;

  constructor(
    private readonly buffer: Buffer,
    private readonly metadata: DatabaseMetadata
  ) {
    this.nodeByteSize = metadata.recordSize / 4;
  }

  /**
   * Walk the tree for `address` and return the absolute file offset of its
   * data record, or null when the address has no record.
   */
  findRecordOffset(address: ParsedIp): number | null {
    const { nodeCount } = this.metadata;
    let bytes = address.bytes;

    if (this.metadata.ipVersion === 4 && address.version === 6) {
      // an IPv4-only tree can still answer for ::ffff:a.b.c.d
      if (!IpUtil.isIpv4Mapped(bytes)) return null;
      bytes = bytes.subarray(12);
    }

    const bitCount = bytes.length * 8;
    let node = bitCount === 32 ? this.ipv4Start() : 0;

    for (let i = 0; i < bitCount && node < nodeCount; i++) {
      const bit = (bytes[i >> 3] >> (7 - (i & 7))) & 1;
      node = this.readNode(node, bit);
    }

    return this.resolve(node);
  }

  /**
   * Map a record value to an absolute data offset (null for "no data").
   * Values still below `nodeCount` after the walk also mean no data.
   */
  resolve(record: number): number | null {
    const { nodeCount, dataSectionOffset } = this.metadata;
    if (record <= nodeCount) return null;

    const offset = dataSectionOffset + (record - nodeCount - DATA_SECTION_SEPARATOR_SIZE);
    if (offset < dataSectionOffset || offset >= this.metadata.metadataOffset) {
      throw new DecodeError(`Search tree record ${record} points outside the data section`);
    }
    return offset;
  }

  /**
   * Read the left (0) or right (1) record of a node.
   */
  readNode(node: number, index: number): number {
    const base = node * this.nodeByteSize;
    if (node < 0 || base + this.nodeByteSize > this.metadata.treeByteLength) {
      throw new DecodeError(`Search tree node ${node} is out of range`);
    }

    const buffer = this.buffer;
    switch (this.metadata.recordSize) {
      case 24:
        return buffer.readUIntBE(index === 0 ? base : base + 3, 3);
      case 28:
        // the middle byte holds the top nibble of both records
        if (index === 0) {
          return ((buffer[base + 3] & 0xf0) << 20) | buffer.readUIntBE(base, 3);
        }
        return ((buffer[base + 3] & 0x0f) << 24) | buffer.readUIntBE(base + 4, 3);
      case 32:
        return buffer.readUInt32BE(index === 0 ? base : base + 4);
    }
  }

  /**
   * IPv4 lookups in a dual-stack tree start below ::/96.
   */
  private ipv4Start(): number {
    if (this.ipv4StartNode !== null) return this.ipv4StartNode;

    let node = 0;
    if (this.metadata.ipVersion === 6) {
      for (let i = 0; i < 96 && node < this.metadata.nodeCount; i++) {
        node = this.readNode(node, 0);
      }
    }

    this.ipv4StartNode = node;
    return node;
  }
}
