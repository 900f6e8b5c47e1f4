export type IpVersion = 4 | 6;

/**
 * An IP literal converted to network-order bytes (4 for IPv4, 16 for IPv6).
 */
export interface ParsedIp {
  text: string;
  version: IpVersion;
  bytes: Uint8Array;
}

/**
 * Utility functions for working with IP addresses
 */
export class IpUtil {
  // No leading zeros: "010" is octal to some parsers
  private static readonly OCTET_REGEX = /^(0|[1-9]\d{0,2})$/;
  private static readonly GROUP_REGEX = /^[0-9a-fA-F]{1,4}$/;

  /**
   * Parse an IPv4 or IPv6 literal. Returns null for anything malformed,
   * including surrounding whitespace and zone identifiers (fe80::1%eth0).
   */
  static parse(ip: string): ParsedIp | null {
    const v4 = this.ipv4ToBytes(ip);
    if (v4) return { text: ip, version: 4, bytes: v4 };

    const v6 = this.ipv6ToBytes(ip);
    if (v6) return { text: ip, version: 6, bytes: v6 };

    return null;
  }

  /**
   * Dotted-quad to 4 bytes. Null unless there are exactly four decimal
   * octets in 0-255.
   */
  static ipv4ToBytes(ip: string): Uint8Array | null {
    const octets = ip.split(".");
    if (octets.length !== 4) return null;

    const bytes = new Uint8Array(4);
    for (let i = 0; i < 4; i++) {
      if (!this.OCTET_REGEX.test(octets[i])) return null;
      const value = parseInt(octets[i], 10);
      if (value > 255) return null;
      bytes[i] = value;
    }
    return bytes;
  }

  /**
   * Expand an IPv6 literal (including a trailing dotted IPv4 part) into
   * 16 bytes.
   */
  static ipv6ToBytes(ip: string): Uint8Array | null {
    let text = ip;
    let embedded: Uint8Array | null = null;

    const lastColon = text.lastIndexOf(":");
    if (lastColon === -1) return null;
    const tail = text.substring(lastColon + 1);
    if (tail.includes(".")) {
      embedded = this.ipv4ToBytes(tail);
      if (!embedded) return null;
      // Two placeholder groups stand in for the IPv4 part
      text = `${text.substring(0, lastColon + 1)}0:0`;
    }

    const halves = text.split("::");
    if (halves.length > 2) return null;

    const head = halves[0] ? halves[0].split(":") : [];
    let groups: string[];

    if (halves.length === 2) {
      const rest = halves[1] ? halves[1].split(":") : [];
      const missing = 8 - head.length - rest.length;
      if (missing < 1) return null;
      groups = [...head, ...Array<string>(missing).fill("0"), ...rest];
    } else {
      groups = head;
    }

    if (groups.length !== 8) return null;

    const bytes = new Uint8Array(16);
    for (let i = 0; i < 8; i++) {
      if (!this.GROUP_REGEX.test(groups[i])) return null;
      const value = parseInt(groups[i], 16);
      bytes[i * 2] = value >> 8;
      bytes[i * 2 + 1] = value & 0xff;
    }
    if (embedded) bytes.set(embedded, 12);

    return bytes;
  }

  /**
   * True for ::ffff:a.b.c.d
   */
  static isIpv4Mapped(bytes: Uint8Array): boolean {
    if (bytes.length !== 16) return false;
    for (let i = 0; i < 10; i++) {
      if (bytes[i] !== 0) return false;
    }
    return bytes[10] === 0xff && bytes[11] === 0xff;
  }

  /**
   * Parse CIDR notation (e.g. "192.168.1.0/24" or "2001:db8::/32")
   */
  static parseCidr(
    cidr: string
  ): { address: ParsedIp; prefixLength: number } | null {
    const parts = cidr.split("/");
    if (parts.length !== 2 || !/^\d{1,3}$/.test(parts[1])) return null;

    const address = this.parse(parts[0]);
    if (!address) return null;

    const prefixLength = parseInt(parts[1], 10);
    const maxBits = address.version === 4 ? 32 : 128;
    if (prefixLength > maxBits) return null;

    return { address, prefixLength };
  }
}
