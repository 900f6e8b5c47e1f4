import { DecodeError } from "../../errors";

/**
 * A value stored in the data or metadata section of a MaxMind DB file.
 */
export type MmdbValue =
  | string
  | number
  | bigint
  | boolean
  | Uint8Array
  | MmdbValue[]
  | MmdbMap;

export interface MmdbMap {
  [key: string]: MmdbValue;
}

export interface DecodeResult {
  value: MmdbValue;
  /** Offset just past the decoded value (or past the pointer that led to it) */
  offset: number;
}

export enum DataType {
  Extended = 0,
  Pointer = 1,
  Utf8String = 2,
  Double = 3,
  Bytes = 4,
  Uint16 = 5,
  Uint32 = 6,
  Map = 7,
  Int32 = 8,
  Uint64 = 9,
  Uint128 = 10,
  Array = 11,
  DataCacheContainer = 12,
  EndMarker = 13,
  Boolean = 14,
  Float = 15,
}

/**
 * Redirects followed along a single decode path. Pointer chains and cycles
 * (a map whose value points back at the map) both hit this bound.
 */
export const MAX_POINTER_DEPTH = 32;

/** Maps and arrays nested inside each other */
export const MAX_NESTING_DEPTH = 256;

/**
 * Decoder for the self-describing MaxMind DB data format.
 *
 * Every value starts with a control byte: the top three bits are the type
 * (0 means "extended", the real type is 7 + the next byte), the low five
 * bits are the payload size, with 29/30/31 meaning the size continues in
 * the next one/two/three bytes.
 *
 * See https://maxmind.github.io/MaxMind-DB/
 */
export class Decoder {
  /**
   * @param buffer - the whole database file
   * @param pointerBase - offset pointers are relative to: the data section
   *   start, or the metadata start when decoding metadata
   */
  constructor(
    private readonly buffer: Buffer,
    private readonly pointerBase: number
  ) {}

  decode(offset: number): DecodeResult {
    return this.decodeAt(offset, 0, 0);
  }

  private decodeAt(offset: number, depth: number, nesting: number): DecodeResult {
    const ctrl = this.readByte(offset);
    let position = offset + 1;
    let type: number = ctrl >>> 5;

    if (type === DataType.Pointer) {
      return this.followPointer(ctrl, position, depth, nesting);
    }

    if (type === DataType.Extended) {
      const next = this.readByte(position);
      position += 1;
      type = next + 7;
      if (type < DataType.Int32) {
        throw new DecodeError(
          `Invalid extended type ${type} at offset ${offset}`
        );
      }
    }

    let size = ctrl & 0x1f;
    if (size >= 29) {
      const extra = size - 28;
      const bytes = this.readUInt(position, extra);
      position += extra;
      if (size === 29) {
        size = 29 + bytes;
      } else if (size === 30) {
        size = 285 + bytes;
      } else {
        size = 65821 + bytes;
      }
    }

    if ((type === DataType.Map || type === DataType.Array) && nesting >= MAX_NESTING_DEPTH) {
      throw new DecodeError(`Nesting depth exceeded ${MAX_NESTING_DEPTH} at offset ${offset}`);
    }

    return this.decodeByType(type, size, position, depth, nesting + 1);
  }

  private decodeByType(
    type: number,
    size: number,
    position: number,
    depth: number,
    nesting: number
  ): DecodeResult {
    switch (type) {
      case DataType.Utf8String:
        this.ensureAvailable(position, size);
        return {
          value: this.buffer.toString("utf8", position, position + size),
          offset: position + size,
        };

      case DataType.Double:
        if (size !== 8) {
          throw new DecodeError(`Invalid size ${size} for double at offset ${position}`);
        }
        this.ensureAvailable(position, 8);
        return { value: this.buffer.readDoubleBE(position), offset: position + 8 };

      case DataType.Float:
        if (size !== 4) {
          throw new DecodeError(`Invalid size ${size} for float at offset ${position}`);
        }
        this.ensureAvailable(position, 4);
        return { value: this.buffer.readFloatBE(position), offset: position + 4 };

      case DataType.Bytes:
        this.ensureAvailable(position, size);
        return {
          value: new Uint8Array(this.buffer.subarray(position, position + size)),
          offset: position + size,
        };

      case DataType.Uint16:
        return this.decodeUInt(position, size, 2);

      case DataType.Uint32:
        return this.decodeUInt(position, size, 4);

      case DataType.Int32: {
        const { value, offset } = this.decodeUInt(position, size, 4);
        // only a full four-byte payload can carry the sign bit
        return { value: size === 4 ? Number(value) | 0 : value, offset };
      }

      case DataType.Uint64:
        return this.decodeBigUInt(position, size, 8);

      case DataType.Uint128:
        return this.decodeBigUInt(position, size, 16);

      case DataType.Map:
        return this.decodeMap(position, size, depth, nesting);

      case DataType.Array: {
        const items: MmdbValue[] = [];
        let next = position;
        for (let i = 0; i < size; i++) {
          const item = this.decodeAt(next, depth, nesting);
          items.push(item.value);
          next = item.offset;
        }
        return { value: items, offset: next };
      }

      case DataType.Boolean:
        if (size > 1) {
          throw new DecodeError(`Invalid size ${size} for boolean at offset ${position}`);
        }
        return { value: size === 1, offset: position };

      default:
        throw new DecodeError(`Unknown data type ${type} at offset ${position}`);
    }
  }

  private decodeMap(
    position: number,
    size: number,
    depth: number,
    nesting: number
  ): DecodeResult {
    const map: MmdbMap = {};
    let next = position;

    for (let i = 0; i < size; i++) {
      const key = this.decodeAt(next, depth, nesting);
      if (typeof key.value !== "string") {
        throw new DecodeError(`Map key at offset ${next} is not a string`);
      }
      const value = this.decodeAt(key.offset, depth, nesting);
      map[key.value] = value.value;
      next = value.offset;
    }

    return { value: map, offset: next };
  }

  private followPointer(
    ctrl: number,
    position: number,
    depth: number,
    nesting: number
  ): DecodeResult {
    if (depth >= MAX_POINTER_DEPTH) {
      throw new DecodeError(
        `Pointer depth exceeded ${MAX_POINTER_DEPTH} at offset ${position - 1}`
      );
    }

    const pointerSize = ((ctrl >>> 3) & 0x03) + 1;
    const high = ctrl & 0x07;
    const bytes = this.readUInt(position, pointerSize);

    let target: number;
    switch (pointerSize) {
      case 1:
        target = high * 0x100 + bytes;
        break;
      case 2:
        target = high * 0x10000 + bytes + 2048;
        break;
      case 3:
        target = high * 0x1000000 + bytes + 526336;
        break;
      default:
        target = bytes;
    }

    const absolute = this.pointerBase + target;
    if (absolute >= this.buffer.length) {
      throw new DecodeError(
        `Pointer at offset ${position - 1} points outside the database (${absolute})`
      );
    }

    const { value } = this.decodeAt(absolute, depth + 1, nesting);
    return { value, offset: position + pointerSize };
  }

  private decodeUInt(position: number, size: number, maxSize: number): DecodeResult {
    if (size > maxSize) {
      throw new DecodeError(
        `Invalid size ${size} for ${maxSize * 8}-bit integer at offset ${position}`
      );
    }
    return { value: this.readUInt(position, size), offset: position + size };
  }

  private decodeBigUInt(position: number, size: number, maxSize: number): DecodeResult {
    if (size > maxSize) {
      throw new DecodeError(
        `Invalid size ${size} for ${maxSize * 8}-bit integer at offset ${position}`
      );
    }
    this.ensureAvailable(position, size);

    let value = 0n;
    for (let i = 0; i < size; i++) {
      value = (value << 8n) | BigInt(this.buffer[position + i]);
    }
    return { value, offset: position + size };
  }

  private readByte(offset: number): number {
    this.ensureAvailable(offset, 1);
    return this.buffer[offset];
  }

  private readUInt(offset: number, length: number): number {
    if (length === 0) return 0;
    this.ensureAvailable(offset, length);
    return this.buffer.readUIntBE(offset, length);
  }

  private ensureAvailable(offset: number, length: number): void {
    if (offset < 0 || offset + length > this.buffer.length) {
      throw new DecodeError(
        `Unexpected end of database reading ${length} byte(s) at offset ${offset}`
      );
    }
  }
}
