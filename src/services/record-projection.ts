import { LookupResult } from "../models/geo-data";
import { MmdbMap, MmdbValue } from "./mmdb/decoder";
import { isMap } from "./mmdb/metadata";

const LANGUAGE = "en";

function child(map: MmdbMap | undefined, key: string): MmdbMap | undefined {
  const value = map?.[key];
  return isMap(value) ? value : undefined;
}

function text(value: MmdbValue | undefined): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function numeric(value: MmdbValue | undefined): number | undefined {
  if (typeof value === "number") return value;
  if (typeof value === "bigint") return Number(value);
  return undefined;
}

function localizedName(map: MmdbMap | undefined): string | undefined {
  return text(child(map, "names")?.[LANGUAGE]);
}

/**
 * Project a City-style record (city, subdivisions, country, continent,
 * location) onto the flat lookup result.
 */
export function projectRecord(ip: string, record: MmdbMap): LookupResult {
  const subdivisions = record.subdivisions;
  const firstSubdivision =
    Array.isArray(subdivisions) && isMap(subdivisions[0]) ? subdivisions[0] : undefined;
  const country = child(record, "country");
  const continent = child(record, "continent");
  const location = child(record, "location");

  const fields: Omit<LookupResult, "ip"> = {
    city: localizedName(child(record, "city")),
    subdivision: localizedName(firstSubdivision),
    country: localizedName(country),
    country_code: text(country?.iso_code),
    continent: localizedName(continent),
    continent_code: text(continent?.code),
    latitude: numeric(location?.latitude),
    longitude: numeric(location?.longitude),
    timezone: text(location?.time_zone),
    accuracy_radius: numeric(location?.accuracy_radius),
  };

  const result: LookupResult = { ip };
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) {
      Object.assign(result, { [key]: value });
    }
  }
  return result;
}
