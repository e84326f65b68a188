/**
 * Geolocation record types
 */

export type GeoValue = string | number | boolean | null | GeoValue[] | { [key: string]: GeoValue };

/**
 * Flat mapping returned verbatim by the lookup service, in response order.
 * Typical fields are ip, hostname, city, region, country, loc, org, postal
 * and timezone, but whatever the service sends is kept as-is.
 */
export type GeoRecord = Readonly<Record<string, GeoValue>>;

/**
 * Narrow a parsed JSON document to a record. Arrays and primitives are rejected.
 */
export function isGeoRecord(value: unknown): value is GeoRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isEmptyRecord(record: GeoRecord | null | undefined): boolean {
  return !record || Object.keys(record).length === 0;
}
