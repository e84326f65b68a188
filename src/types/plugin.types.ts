/**
 * Output plugin types
 */
import type { GeoRecord } from './geo.types';
import type { Result } from './result.types';
import type { FileWriteError } from '../core/errors';

export interface PluginMetadata {
  name: string;
  version: string;
  description: string;
}

export interface OutputPlugin {
  readonly metadata: PluginMetadata;
  readonly defaultFilename: string;
  serialize(record: GeoRecord): string;
  /**
   * Resolves with the absolute path written, never rejects.
   */
  write(record: GeoRecord, filePath?: string): Promise<Result<string, FileWriteError>>;
}
