import type { GeoValue } from '../types/geo.types';

/**
 * Render a cell value. Nested objects and arrays are not flattened; they are
 * written as compact JSON.
 */
export function stringifyCellValue(value: GeoValue | undefined): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

/**
 * Escape CSV value per RFC 4180
 */
export function escapeCSVValue(value: GeoValue | undefined): string {
  const stringValue = stringifyCellValue(value);
  if (/[",\n\r]/.test(stringValue)) {
    return `"${stringValue.replace(/"/g, '""')}"`;
  }
  return stringValue;
}

export function toCSVRow(values: Array<GeoValue | undefined>): string {
  return values.map(escapeCSVValue).join(',');
}
