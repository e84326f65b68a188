import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'yaml';
import { createLogger } from '../core/Logger';
import { hashForLogging } from '../utils/hash';
import { GeoLookupConfigSchema, GeoLookupConfig } from './schemas/config.schema';

const logger = createLogger('ConfigLoader');

export const CONFIG_FILENAME = 'geolookup.yaml';
const ENV_PREFIX = 'GEOLOOKUP_';

type ConfigObject = Record<string, unknown>;

function isConfigObject(value: unknown): value is ConfigObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * ConfigLoader handles loading, validation, and environment variable overrides
 * for the geolookup YAML configuration. A missing file means defaults.
 */
export class ConfigLoader {
  private configFolder: string;

  constructor(configFolder: string) {
    this.configFolder = configFolder;
  }

  /**
   * Load configuration from YAML file with environment variable overrides
   * @returns Validated configuration object
   * @throws Error if the file cannot be parsed or fails validation
   */
  load(): GeoLookupConfig {
    const yamlPath = path.join(this.configFolder, CONFIG_FILENAME);
    let rawConfig: ConfigObject = {};

    if (fs.existsSync(yamlPath)) {
      logger.info(`Loading configuration from: ${yamlPath}`);
      rawConfig = this.parseFile(yamlPath);
    } else {
      logger.info(`No configuration file at ${yamlPath}, using defaults`);
    }

    rawConfig = this.applyEnvOverrides(rawConfig);

    const result = GeoLookupConfigSchema.safeParse(rawConfig);

    if (!result.success) {
      const errors = result.error.errors
        .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
        .join('\n');
      throw new Error(`Configuration validation failed:\n${errors}`);
    }

    logger.debug('Configuration loaded and validated successfully');
    this.logConfigSummary(result.data);

    return result.data;
  }

  private parseFile(yamlPath: string): ConfigObject {
    const fileContent = fs.readFileSync(yamlPath, 'utf-8');
    let parsed: unknown;

    try {
      parsed = yaml.parse(fileContent);
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      throw new Error(`Failed to parse YAML configuration: ${message}`);
    }

    // An empty file parses to null
    if (parsed === null || parsed === undefined) {
      return {};
    }
    if (!isConfigObject(parsed)) {
      throw new Error('Failed to parse YAML configuration: top level must be a mapping');
    }
    return parsed;
  }

  // Mapping of lowercase env var keys to camelCase config keys
  private static readonly KEY_MAPPINGS: Record<string, string> = {
    baseurl: 'baseUrl',
  };

  // Keys whose values must stay strings even when they look like numbers
  private static readonly STRING_KEYS = new Set(['baseUrl', 'token', 'path']);

  /**
   * Apply GEOLOOKUP_* environment variable overrides to configuration
   * Format: GEOLOOKUP_SECTION_KEY (e.g., GEOLOOKUP_LOOKUP_TOKEN)
   */
  private applyEnvOverrides(config: ConfigObject): ConfigObject {
    const envVars = Object.entries(process.env).filter(([key]) => key.startsWith(ENV_PREFIX));

    for (const [key, value] of envVars) {
      if (value === undefined) continue;

      const pathParts = key
        .substring(ENV_PREFIX.length)
        .toLowerCase()
        .split('_')
        .filter((part) => part.length > 0)
        .map((part) => ConfigLoader.KEY_MAPPINGS[part] || part);

      if (pathParts.length === 0) continue;

      const finalKey = pathParts[pathParts.length - 1];
      const isStringKey = ConfigLoader.STRING_KEYS.has(finalKey);
      // An empty string only means something for string keys (an empty token clears it)
      if (value === '' && !isStringKey) continue;

      const parsedValue = isStringKey ? value : this.parseEnvValue(value);

      this.setNestedValue(config, pathParts, parsedValue);
      logger.debug(`Applied env override: ${key}`);
    }

    return config;
  }

  /**
   * Set a nested value in an object using path parts
   */
  private setNestedValue(obj: ConfigObject, pathParts: string[], value: unknown): void {
    let current = obj;

    for (const part of pathParts.slice(0, -1)) {
      const next = current[part];
      if (isConfigObject(next)) {
        current = next;
      } else {
        const created: ConfigObject = {};
        current[part] = created;
        current = created;
      }
    }

    current[pathParts[pathParts.length - 1]] = value;
  }

  /**
   * Parse environment variable value to appropriate type
   */
  private parseEnvValue(value: string): unknown {
    if (value.toLowerCase() === 'true') return true;
    if (value.toLowerCase() === 'false') return false;

    const num = Number(value);
    if (!isNaN(num) && value.trim() !== '') return num;

    return value;
  }

  /**
   * Log configuration summary (without sensitive data)
   */
  private logConfigSummary(config: GeoLookupConfig): void {
    logger.info('Configuration summary:');
    logger.info(`  Endpoint: ${config.lookup.baseUrl} (timeout ${config.lookup.timeout}ms)`);
    logger.info(`  Token fingerprint: ${hashForLogging(config.lookup.token)}`);
    logger.info(`  Display: ${config.display.enabled ? 'enabled' : 'disabled'}`);

    const outputs = Object.entries(config.outputs)
      .filter(([, output]) => output.enabled)
      .map(([name, output]) => `${name}(${output.path})`);
    logger.info(`  Outputs: ${outputs.join(', ') || 'none'}`);
  }
}
