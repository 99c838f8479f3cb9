/**
 * City Normalizer — canonical city labels and static city metadata.
 *
 * Pure: no I/O, never throws.
 */

export const UNKNOWN_CITY = "Unknown";
export const UNKNOWN_TIMEZONE = "Unknown";

export interface CityMeta {
  timezone: string;
  lat: number | null;
  lon: number | null;
}

/** Static lookup keyed by canonical city name. */
export const CITY_DIRECTORY: Readonly<Record<string, CityMeta>> = {
  "New York": { timezone: "America/New_York", lat: 40.7128, lon: -74.006 },
  Chicago: { timezone: "America/Chicago", lat: 41.8781, lon: -87.6298 },
  Houston: { timezone: "America/Chicago", lat: 29.7604, lon: -95.3698 },
  Phoenix: { timezone: "America/Phoenix", lat: 33.4484, lon: -112.074 },
  Seattle: { timezone: "America/Los_Angeles", lat: 47.6062, lon: -122.3321 },
};

/**
 * Trim and title-case a city token: the first letter of every alphabetic run
 * is upper-cased, the rest lower-cased ("new york " → "New York",
 * "WINSTON-salem" → "Winston-Salem"). Empty or absent input → "Unknown".
 */
export function normalizeCityName(token: string | null | undefined): string {
  if (typeof token !== "string") return UNKNOWN_CITY;
  const trimmed = token.trim();
  if (trimmed === "") return UNKNOWN_CITY;

  let out = "";
  let prevIsLetter = false;
  for (const ch of trimmed) {
    const isLetter = ch.toLowerCase() !== ch.toUpperCase();
    out += isLetter ? (prevIsLetter ? ch.toLowerCase() : ch.toUpperCase()) : ch;
    prevIsLetter = isLetter;
  }
  return out;
}

/** Metadata for a canonical city name; unknown cities get null coordinates. */
export function lookupCity(city: string): CityMeta {
  const hit = Object.prototype.hasOwnProperty.call(CITY_DIRECTORY, city)
    ? CITY_DIRECTORY[city]
    : undefined;
  if (!hit) return { timezone: UNKNOWN_TIMEZONE, lat: null, lon: null };
  return { ...hit };
}
