import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { JsonOutputPlugin } from '../../../src/plugins/outputs/JsonOutputPlugin';
import type { GeoRecord } from '../../../src/types/geo.types';

// Mock the logger
vi.mock('../../../src/core/Logger', () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

describe('JsonOutputPlugin', () => {
  const testFolder = path.join(__dirname, '../../.test-json-output');
  const record: GeoRecord = {
    ip: '1.2.3.4',
    city: 'Paris',
    region: 'Île-de-France',
    country: 'FR',
    loc: '48.8534,2.3488',
  };
  let plugin: JsonOutputPlugin;

  beforeEach(() => {
    plugin = new JsonOutputPlugin();
  });

  afterEach(() => {
    if (fs.existsSync(testFolder)) {
      fs.rmSync(testFolder, { recursive: true });
    }
  });

  it('should have correct metadata', () => {
    expect(plugin.metadata.name).toBe('JSON');
    expect(plugin.defaultFilename).toBe('ipinfo_data.json');
  });

  it('should pretty-print with a four space indent', () => {
    expect(plugin.serialize({ ip: '1.2.3.4', city: 'Paris' })).toBe(
      '{\n    "ip": "1.2.3.4",\n    "city": "Paris"\n}'
    );
  });

  it('should read back deep-equal to the record', async () => {
    const target = path.join(testFolder, 'data', 'ipinfo_data.json');
    const result = await plugin.write(record, target);

    expect(result.ok).toBe(true);
    expect(JSON.parse(fs.readFileSync(target, 'utf-8'))).toEqual(record);
  });

  it('should keep nested values', async () => {
    const nested: GeoRecord = { ip: '1.2.3.4', asn: { asn: 'AS64500', route: '1.2.3.0/24' } };
    const target = path.join(testFolder, 'nested.json');
    await plugin.write(nested, target);

    expect(JSON.parse(fs.readFileSync(target, 'utf-8'))).toEqual(nested);
  });
});
