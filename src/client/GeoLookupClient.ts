import type { AxiosInstance } from 'axios';
import { createLogger } from '../core/Logger';
import { NetworkError, ParseError, FileWriteError, errorMessage } from '../core/errors';
import { JsonOutputPlugin, CsvOutputPlugin } from '../plugins/outputs';
import { createHttpClient, formatHttpError, getHttpStatus, isHttpStatus } from '../utils/http';
import { capitalizeLabel, describeJsonType, formatDisplayValue } from '../utils/format';
import { hashForLogging } from '../utils/hash';
import { isGeoRecord, isEmptyRecord, GeoRecord } from '../types/geo.types';
import type { OutputPlugin } from '../types/plugin.types';
import { ok, err, Result } from '../types/result.types';

const logger = createLogger('GeoLookupClient');

export const DEFAULT_BASE_URL = 'https://ipinfo.io/json';
export const NO_DATA_MESSAGE = 'No data to display.';

export interface GeoLookupClientOptions {
  token?: string;
  baseUrl?: string;
  /** Request timeout in milliseconds, ignored when httpClient is given */
  timeout?: number;
  httpClient?: AxiosInstance;
  outputs?: {
    json?: OutputPlugin;
    csv?: OutputPlugin;
  };
  /** Sink for display lines, stdout by default */
  writeLine?: (line: string) => void;
}

export type FetchResult = Result<GeoRecord, NetworkError | ParseError>;
export type SaveResult = Result<string, FileWriteError>;

/**
 * Fetches the caller's IP geolocation record and persists it.
 * Each call is independent: nothing is cached and failed requests are not retried.
 */
export class GeoLookupClient {
  private readonly baseUrl: string;
  private token?: string;
  private readonly httpClient: AxiosInstance;
  private readonly jsonOutput: OutputPlugin;
  private readonly csvOutput: OutputPlugin;
  private readonly writeLine: (line: string) => void;

  constructor(options: GeoLookupClientOptions = {}) {
    this.baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
    this.httpClient = options.httpClient ?? createHttpClient({ timeout: options.timeout });
    this.jsonOutput = options.outputs?.json ?? new JsonOutputPlugin();
    this.csvOutput = options.outputs?.csv ?? new CsvOutputPlugin();
    this.writeLine = options.writeLine ?? ((line) => process.stdout.write(`${line}\n`));
    this.configure(options.token);
  }

  /**
   * Set or clear the API token. An empty string counts as no token.
   */
  configure(token?: string): void {
    this.token = token || undefined;
    logger.debug(`Token fingerprint: ${hashForLogging(this.token)}`);
  }

  /**
   * Endpoint URL with the token appended as a query parameter when set
   */
  getRequestUrl(): string {
    const url = new URL(this.baseUrl);
    if (this.token) {
      url.searchParams.set('token', this.token);
    }
    return url.toString();
  }

  async fetch(): Promise<FetchResult> {
    let url = this.baseUrl;
    let data: unknown;

    try {
      url = this.getRequestUrl();
      const response = await this.httpClient.get<unknown>(url, { responseType: 'text' });
      data = response.data;
    } catch (error) {
      const message = `Error fetching data: ${formatHttpError(error)}`;
      logger.error(message);
      if (isHttpStatus(error, 401) || isHttpStatus(error, 403)) {
        logger.warn(
          this.token
            ? 'The lookup service rejected the configured token'
            : 'The lookup service requires a token'
        );
      }
      return err(new NetworkError(message, url, getHttpStatus(error), { cause: error }));
    }

    if (typeof data === 'string') {
      return this.parseBody(data);
    }
    return this.toRecord(data, JSON.stringify(data) ?? '');
  }

  /**
   * Print one "Label: value" line per field, in response order
   */
  display(record?: GeoRecord | null): void {
    if (!record || isEmptyRecord(record)) {
      this.writeLine(NO_DATA_MESSAGE);
      return;
    }

    logger.info('IP Information:');
    for (const [key, value] of Object.entries(record)) {
      this.writeLine(`${capitalizeLabel(key)}: ${formatDisplayValue(value)}`);
    }
  }

  saveJSON(record: GeoRecord, filePath?: string): Promise<SaveResult> {
    return this.jsonOutput.write(record, filePath);
  }

  saveCSV(record: GeoRecord, filePath?: string): Promise<SaveResult> {
    return this.csvOutput.write(record, filePath);
  }

  private parseBody(body: string): Result<GeoRecord, ParseError> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(body);
    } catch (error) {
      return this.parseFailure(`Invalid JSON in response body: ${errorMessage(error)}`, body, error);
    }
    return this.toRecord(parsed, body);
  }

  private toRecord(parsed: unknown, body: string): Result<GeoRecord, ParseError> {
    if (!isGeoRecord(parsed)) {
      return this.parseFailure(`Expected a JSON object, got ${describeJsonType(parsed)}`, body);
    }
    return ok(Object.freeze(parsed));
  }

  private parseFailure(message: string, body: string, cause?: unknown): Result<GeoRecord, ParseError> {
    logger.error(`Error parsing response: ${message}`);
    return err(new ParseError(message, body, { cause }));
  }
}
