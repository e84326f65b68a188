import { BaseOutputPlugin } from './BaseOutputPlugin';
import { toCSVRow } from '../../utils/csv';
import type { PluginMetadata } from '../../types/plugin.types';
import type { GeoRecord } from '../../types/geo.types';

// RFC 4180 record separator
const CSV_EOL = '\r\n';

/**
 * Writes a header row of field names and a single row of values.
 * Assumes a flat record: nested values end up as JSON inside one cell.
 */
export class CsvOutputPlugin extends BaseOutputPlugin {
  readonly metadata: PluginMetadata = {
    name: 'CSV',
    version: '1.0.0',
    description: 'Two-line CSV (header + values)',
  };

  readonly defaultFilename = 'ipinfo_data.csv';

  serialize(record: GeoRecord): string {
    const header = toCSVRow(Object.keys(record));
    const values = toCSVRow(Object.values(record));
    return `${header}${CSV_EOL}${values}${CSV_EOL}`;
  }
}
