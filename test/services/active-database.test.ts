import { ActiveDatabase } from "../../src/services/active-database";
import { DatabaseHandle } from "../../src/services/database-handle";
import { IpUtil, ParsedIp } from "../../src/services/ip-util";
import { projectRecord } from "../../src/services/record-projection";
import { LONDON, MOUNTAIN_VIEW } from "../fixtures/geo-fixture";
import { MmdbWriter } from "../fixtures/mmdb-writer";

const ip: ParsedIp = IpUtil.parse("8.8.8.8") ?? {
  text: "",
  version: 4,
  bytes: new Uint8Array(4),
};

/** A generation that maps 8.8.8.0/24 to `record` */
function generation(buildEpoch: number, record: typeof MOUNTAIN_VIEW): DatabaseHandle {
  const buffer = new MmdbWriter({ buildEpoch }).insert("8.8.8.0/24", record).build();
  return DatabaseHandle.fromBuffer(buffer, `geoip-${buildEpoch}.mmdb`);
}

function cityOf(handle: DatabaseHandle): string | undefined {
  const record = handle.lookup(ip);
  return record ? projectRecord(ip.text, record).city : undefined;
}

const nextTurn = () => new Promise<void>((resolve) => setImmediate(resolve));

describe("ActiveDatabase", () => {
  test("should return no lease before the first activation", () => {
    const slot = new ActiveDatabase();

    expect(slot.acquire()).toBeNull();
    expect(slot.handle).toBeNull();
  });

  test("should swap generations and return the previous one", () => {
    const slot = new ActiveDatabase();
    const first = generation(1, MOUNTAIN_VIEW);
    const second = generation(2, LONDON);

    expect(slot.swap(first)).toBeNull();
    expect(slot.swap(second)).toBe(first);
    expect(slot.handle).toBe(second);
  });

  test("should keep serving the old generation to readers holding a lease", async () => {
    const slot = new ActiveDatabase();
    const old = generation(1, MOUNTAIN_VIEW);
    slot.swap(old);

    const lease = slot.acquire();
    if (!lease) throw new Error("expected a lease");

    const previous = slot.swap(generation(2, LONDON));
    previous?.retire();

    expect(cityOf(lease.handle)).toBe("Mountain View");

    const fresh = slot.acquire();
    expect(fresh && cityOf(fresh.handle)).toBe("London");
    fresh?.release();

    expect(old.isDisposed).toBe(false);
    lease.release();
    await old.whenDisposed();
    expect(old.isDisposed).toBe(true);
  });

  test("should give each concurrent reader a consistent generation", async () => {
    const slot = new ActiveDatabase();
    const old = generation(1, MOUNTAIN_VIEW);
    slot.swap(old);

    const reader = async () => {
      const lease = slot.acquire();
      if (!lease) throw new Error("expected a lease");
      try {
        const before = cityOf(lease.handle);
        await nextTurn();
        const after = cityOf(lease.handle);
        return { before, after };
      } finally {
        lease.release();
      }
    };

    const early = [reader(), reader(), reader()];
    slot.swap(generation(2, LONDON))?.retire();
    const late = [reader(), reader()];

    const earlyResults = await Promise.all(early);
    const lateResults = await Promise.all(late);

    expect(earlyResults).toEqual(
      Array(3).fill({ before: "Mountain View", after: "Mountain View" })
    );
    expect(lateResults).toEqual(Array(2).fill({ before: "London", after: "London" }));
    expect(old.isDisposed).toBe(true);
  });

  test("should retire the active generation when cleared", async () => {
    const slot = new ActiveDatabase();
    const handle = generation(1, MOUNTAIN_VIEW);
    slot.swap(handle);

    await slot.clear();

    expect(slot.acquire()).toBeNull();
    expect(handle.isDisposed).toBe(true);
  });
});
