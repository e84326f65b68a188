import { describe, it, expect } from 'vitest';
import { escapeCSVValue, stringifyCellValue, toCSVRow } from '../../src/utils/csv';

describe('CSV Utilities', () => {
  describe('stringifyCellValue', () => {
    it('should keep strings as-is', () => {
      expect(stringifyCellValue('Paris')).toBe('Paris');
    });

    it('should stringify numbers and booleans', () => {
      expect(stringifyCellValue(42)).toBe('42');
      expect(stringifyCellValue(false)).toBe('false');
    });

    it('should render null and undefined as empty cells', () => {
      expect(stringifyCellValue(null)).toBe('');
      expect(stringifyCellValue(undefined)).toBe('');
    });

    it('should write nested values as compact JSON', () => {
      expect(stringifyCellValue({ asn: 'AS64500', type: 'isp' })).toBe(
        '{"asn":"AS64500","type":"isp"}'
      );
      expect(stringifyCellValue(['a', 'b'])).toBe('["a","b"]');
    });
  });

  describe('escapeCSVValue', () => {
    it('should leave plain values unquoted', () => {
      expect(escapeCSVValue('1.2.3.4')).toBe('1.2.3.4');
    });

    it('should quote values containing commas', () => {
      expect(escapeCSVValue('48.8534,2.3488')).toBe('"48.8534,2.3488"');
    });

    it('should double embedded quotes', () => {
      expect(escapeCSVValue('say "hi"')).toBe('"say ""hi"""');
    });

    it('should quote values containing line breaks', () => {
      expect(escapeCSVValue('a\nb')).toBe('"a\nb"');
      expect(escapeCSVValue('a\rb')).toBe('"a\rb"');
    });

    it('should quote nested values since their JSON contains quotes', () => {
      expect(escapeCSVValue({ asn: 'AS64500' })).toBe('"{""asn"":""AS64500""}"');
    });
  });

  describe('toCSVRow', () => {
    it('should join escaped cells with commas', () => {
      expect(toCSVRow(['ip', 'loc', null])).toBe('ip,loc,');
      expect(toCSVRow(['1.2.3.4', '48.8534,2.3488'])).toBe('1.2.3.4,"48.8534,2.3488"');
    });
  });
});
