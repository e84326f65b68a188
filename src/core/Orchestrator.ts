import { createLogger } from './Logger';
import type { NetworkError, ParseError, FileWriteError } from './errors';
import type { GeoLookupClient } from '../client/GeoLookupClient';
import type { DisplayConfig, OutputsConfig } from '../config/schemas/config.schema';
import { isEmptyRecord, GeoRecord } from '../types/geo.types';

const logger = createLogger('Orchestrator');

/**
 * The part of the client the run depends on, so tests can pass a fake
 */
export type LookupClient = Pick<GeoLookupClient, 'fetch' | 'display' | 'saveJSON' | 'saveCSV'>;

export interface RunOptions {
  display: DisplayConfig;
  outputs: OutputsConfig;
}

export const DEFAULT_RUN_OPTIONS: RunOptions = {
  display: { enabled: true },
  outputs: {
    json: { enabled: true, path: 'ipinfo_data.json' },
    csv: { enabled: true, path: 'ipinfo_data.csv' },
  },
};

export type RunSummary =
  | { fetched: false; error: NetworkError | ParseError; written: string[]; failed: FileWriteError[] }
  | { fetched: true; record: GeoRecord; written: string[]; failed: FileWriteError[] };

/**
 * Runs one lookup: fetch, display, then save JSON and CSV.
 * Failures are logged and reported in the summary, never thrown.
 */
export class Orchestrator {
  private client: LookupClient;
  private options: RunOptions;

  constructor(client: LookupClient, options: RunOptions = DEFAULT_RUN_OPTIONS) {
    this.client = client;
    this.options = options;
  }

  async run(): Promise<RunSummary> {
    const result = await this.client.fetch();

    if (!result.ok) {
      logger.error('Failed to retrieve IP data.');
      return { fetched: false, error: result.error, written: [], failed: [] };
    }

    const record = result.value;
    if (this.options.display.enabled) {
      this.client.display(record);
    }

    if (isEmptyRecord(record)) {
      logger.warn('Lookup returned no fields, nothing to save');
      return { fetched: true, record, written: [], failed: [] };
    }

    const written: string[] = [];
    const failed: FileWriteError[] = [];
    const { json, csv } = this.options.outputs;

    // A failed JSON write does not stop the CSV write
    if (json.enabled) {
      const saved = await this.client.saveJSON(record, json.path);
      if (saved.ok) written.push(saved.value);
      else failed.push(saved.error);
    }

    if (csv.enabled) {
      const saved = await this.client.saveCSV(record, csv.path);
      if (saved.ok) written.push(saved.value);
      else failed.push(saved.error);
    }

    logger.info(`Lookup finished: ${written.length} file(s) written, ${failed.length} failed`);
    return { fetched: true, record, written, failed };
  }
}
