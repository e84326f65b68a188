import type { GeoValue } from '../types/geo.types';

/**
 * Upper-case the first character and lower-case the rest ("ip" -> "Ip", "IP" -> "Ip")
 */
export function capitalizeLabel(key: string): string {
  if (key.length === 0) {
    return key;
  }
  return key.charAt(0).toUpperCase() + key.slice(1).toLowerCase();
}

export function formatDisplayValue(value: GeoValue | undefined): string {
  if (value !== null && typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

/**
 * Describe the top-level type of a parsed JSON document
 */
export function describeJsonType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}
