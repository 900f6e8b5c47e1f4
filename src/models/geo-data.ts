/**
 * Result of a geolocation lookup as returned by the API.
 * Fields the matched record does not carry are omitted, not empty.
 */
export interface LookupResult {
  ip: string;
  city?: string;
  subdivision?: string;
  country?: string;
  country_code?: string;
  continent?: string;
  continent_code?: string;
  latitude?: number;
  longitude?: number;
  timezone?: string;
  accuracy_radius?: number;
}

export type LookupOutcome =
  | { status: "found"; result: LookupResult }
  | { status: "not_found"; ip: string }
  | { status: "invalid"; ip: string }
  | { status: "unavailable"; ip: string };

/**
 * One database generation kept in the data directory.
 */
export interface RetentionEntry {
  /** Build epoch of the database, seconds */
  generationTimestamp: number;
  filePath: string;
  sizeBytes: number;
  isActive: boolean;
}
