import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { MmdbWriter, MmdbWriterOptions, Typed, WriterMap } from "./mmdb-writer";

const northAmerica: WriterMap = {
  code: "NA",
  geoname_id: 6255149,
  names: { en: "North America", de: "Nordamerika" },
};

const unitedStates: WriterMap = {
  geoname_id: 6252001,
  iso_code: "US",
  names: { en: "United States", de: "USA" },
};

export const MOUNTAIN_VIEW: WriterMap = {
  city: { geoname_id: 5375480, names: { en: "Mountain View" } },
  continent: northAmerica,
  country: unitedStates,
  location: {
    accuracy_radius: new Typed("uint16", 1000),
    latitude: 37.386,
    longitude: -122.0838,
    time_zone: "America/Los_Angeles",
  },
  subdivisions: [{ iso_code: "CA", names: { en: "California" } }],
};

export const LONDON: WriterMap = {
  city: { names: { en: "London" } },
  continent: { code: "EU", names: { en: "Europe" } },
  country: { iso_code: "GB", names: { en: "United Kingdom" } },
  location: {
    accuracy_radius: new Typed("uint16", 50),
    latitude: 51.5085,
    longitude: -0.1257,
    time_zone: "Europe/London",
  },
  subdivisions: [{ iso_code: "ENG", names: { en: "England" } }],
};

/** Country-level record without city or location */
export const GERMANY: WriterMap = {
  continent: { code: "EU", names: { en: "Europe" } },
  country: { iso_code: "DE", names: { en: "Germany", fr: "Allemagne" } },
};

/**
 * A small City-style database:
 * 8.8.8.0/24 Mountain View, 81.2.69.0/24 London, 2001:db8::/32 Germany.
 * Dual stack builds also map the IPv4 networks under ::ffff:0:0/96, as
 * vendor files do.
 */
export function buildCityDatabase(options: MmdbWriterOptions = {}): Buffer {
  const writer = new MmdbWriter(options)
    .insert("8.8.8.0/24", MOUNTAIN_VIEW)
    .insert("81.2.69.0/24", LONDON);

  if ((options.ipVersion ?? 6) === 6) {
    writer
      .insert("::ffff:8.8.8.0/120", MOUNTAIN_VIEW)
      .insert("::ffff:81.2.69.0/120", LONDON)
      .insert("2001:db8::/32", GERMANY);
  }

  return writer.build();
}

export async function createTempDir(prefix = "geoip-test-"): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}
