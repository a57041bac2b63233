import { describe, it, expect } from 'vitest';
import {
  DEFAULT_OPTIONS,
  OPTION_NAMES,
  isOptionName,
  mergeOptions,
  parseOptionValue,
  parseStoredConfig,
} from '../config/options.js';
import { ConfigError } from '../errors.js';

describe('config/options', () => {
  describe('isOptionName', () => {
    it('recognises every declared option', () => {
      for (const name of OPTION_NAMES) expect(isOptionName(name)).toBe(true);
    });

    it('rejects unknown and inherited names', () => {
      expect(isOptionName('depth')).toBe(false);
      expect(isOptionName('constructor')).toBe(false);
    });
  });

  describe('parseOptionValue', () => {
    it('parses integers', () => {
      expect(parseOptionValue('max_depth', '3')).toEqual({ max_depth: 3 });
      expect(parseOptionValue('max_depth', ' 0 ')).toEqual({ max_depth: 0 });
    });

    it('parses a single branch count or a comma-separated schedule', () => {
      expect(parseOptionValue('number', '4')).toEqual({ number: 4 });
      expect(parseOptionValue('number', '5,3,1')).toEqual({ number: [5, 3, 1] });
    });

    it('rejects non-integers with a type message', () => {
      expect(() => parseOptionValue('max_depth', 'deep')).toThrow(
        "Given value 'deep' is not a valid type for max_depth. Please provide an integer."
      );
      expect(() => parseOptionValue('number', '2.5')).toThrow(ConfigError);
    });

    it('rejects negative integers', () => {
      expect(() => parseOptionValue('max_depth', '-2')).toThrow(
        'Given integer -2 is negative! Please provide a non-negative value for max_depth.'
      );
    });

    it('enforces the schema bounds', () => {
      expect(() => parseOptionValue('number', '0')).toThrow("Invalid value '0' for number:");
      expect(() => parseOptionValue('number', '3,51')).toThrow(
        "Invalid value '3,51' for number:"
      );
      expect(() => parseOptionValue('max_depth', '101')).toThrow(ConfigError);
    });

    it('accepts only the listed choices', () => {
      expect(parseOptionValue('safe_search', 'strict')).toEqual({ safe_search: 'strict' });
      expect(parseOptionValue('encoding', 'smart')).toEqual({ encoding: 'smart' });
      expect(() => parseOptionValue('safe_search', 'loud')).toThrow(
        "Invalid value 'loud' for safe_search:"
      );
      expect(() => parseOptionValue('output_format', 'json')).toThrow(ConfigError);
    });

    it('keeps strings as given, trimmed', () => {
      expect(parseOptionValue('api_key', ' test-key ')).toEqual({ api_key: 'test-key' });
      expect(parseOptionValue('output_dir', '/tmp/out')).toEqual({ output_dir: '/tmp/out' });
    });
  });

  describe('parseStoredConfig', () => {
    it('accepts a partial mapping and drops unknown keys', () => {
      expect(
        parseStoredConfig({ max_depth: 2, number: [4, 2], colour: 'blue' }, 'config.json')
      ).toEqual({ max_depth: 2, number: [4, 2] });
    });

    it('names the source of an invalid mapping', () => {
      expect(() => parseStoredConfig({ max_depth: 'two' }, '/etc/tt.json')).toThrow(
        'Invalid configuration in /etc/tt.json:'
      );
      expect(() => parseStoredConfig([1, 2], 'config.json')).toThrow(ConfigError);
    });
  });

  describe('mergeOptions', () => {
    it('starts from the defaults', () => {
      expect(mergeOptions({})).toEqual(DEFAULT_OPTIONS);
    });

    it('lets stored values override defaults and provided values override both', () => {
      const merged = mergeOptions(
        { api_key: 'stored-key', max_depth: 3, encoding: 'ascii' },
        { max_depth: 0, number: [2, 1] }
      );

      expect(merged).toEqual({
        ...DEFAULT_OPTIONS,
        api_key: 'stored-key',
        max_depth: 0,
        number: [2, 1],
        encoding: 'ascii',
      });
    });

    it('ignores overrides that were not given', () => {
      const merged = mergeOptions({ max_depth: 3 }, { max_depth: undefined, api_key: undefined });
      expect(merged.max_depth).toBe(3);
      expect(merged.api_key).toBe('');
    });
  });
});
