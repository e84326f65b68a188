import { BaseOutputPlugin } from './BaseOutputPlugin';
import type { PluginMetadata } from '../../types/plugin.types';
import type { GeoRecord } from '../../types/geo.types';

export const JSON_INDENT = 4;

/**
 * Writes the record as pretty-printed JSON
 */
export class JsonOutputPlugin extends BaseOutputPlugin {
  readonly metadata: PluginMetadata = {
    name: 'JSON',
    version: '1.0.0',
    description: 'Pretty-printed JSON document',
  };

  readonly defaultFilename = 'ipinfo_data.json';

  serialize(record: GeoRecord): string {
    return JSON.stringify(record, null, JSON_INDENT);
  }
}
