import { LookupOutcome } from "../models/geo-data";
import { ActiveDatabase } from "./active-database";
import { IpUtil } from "./ip-util";
import { projectRecord } from "./record-projection";

export class GeoLookupService {
  constructor(private readonly slot: ActiveDatabase) {}

  /**
   * Look up geolocation data for an IP address
   *
   * Malformed input is reported as `invalid`, never `not_found`. A
   * DecodeError from a damaged record propagates to the caller.
   */
  public lookup(ip: string): LookupOutcome {
    const address = IpUtil.parse(ip);
    if (!address) {
      return { status: "invalid", ip };
    }

    const lease = this.slot.acquire();
    if (!lease) {
      return { status: "unavailable", ip: address.text };
    }

    try {
      const record = lease.handle.lookup(address);
      if (!record) {
        return { status: "not_found", ip: address.text };
      }
      return { status: "found", result: projectRecord(address.text, record) };
    } finally {
      lease.release();
    }
  }
}
