import { ConfigurationError } from './errors';
import {
  isPlainObject,
  isValidUrl,
  parseBoolean,
  parseNumber,
  parseString,
  splitList,
} from './validation';

describe('isValidUrl', () => {
  it('should accept http and https URLs', () => {
    expect(isValidUrl('http://localhost:8080/health')).toBe(true);
    expect(isValidUrl('https://api.example.com/status?verbose=1')).toBe(true);
  });

  it('should reject other schemes and malformed input', () => {
    expect(isValidUrl('ftp://files.example.com')).toBe(false);
    expect(isValidUrl('file:///etc/passwd')).toBe(false);
    expect(isValidUrl('api.example.com/health')).toBe(false);
    expect(isValidUrl('')).toBe(false);
  });
});

describe('parseNumber', () => {
  it('should return undefined for missing or blank values', () => {
    expect(parseNumber(undefined, 'interval_seconds')).toBeUndefined();
    expect(parseNumber(null, 'interval_seconds')).toBeUndefined();
    expect(parseNumber('   ', 'interval_seconds')).toBeUndefined();
  });

  it('should pass numbers through and parse numeric strings', () => {
    expect(parseNumber(15, 'interval_seconds')).toBe(15);
    expect(parseNumber(' 2.5 ', 'timeout_seconds')).toBe(2.5);
    expect(parseNumber('0', 'cooldown_seconds')).toBe(0);
  });

  it('should reject non-numeric strings with the field name', () => {
    expect(() => parseNumber('ten', 'interval_seconds')).toThrow(
      new ConfigurationError('interval_seconds must be a number, got "ten"')
    );
  });

  it('should reject non-finite numbers and other types', () => {
    expect(() => parseNumber(Infinity, 'timeout_seconds')).toThrow('timeout_seconds must be a finite number');
    expect(() => parseNumber(true, 'timeout_seconds')).toThrow('timeout_seconds must be a number');
  });

  it('should carry the field on the error', () => {
    let caught: unknown;
    try {
      parseNumber('x', 'latency_threshold_ms');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    expect(caught).toHaveProperty('field', 'latency_threshold_ms');
  });
});

describe('parseBoolean', () => {
  it.each([
    ['true', true],
    ['YES', true],
    ['1', true],
    ['false', false],
    ['no', false],
    ['0', false],
  ])('should parse "%s"', (input, expected) => {
    expect(parseBoolean(input, 'metrics.enabled')).toBe(expected);
  });

  it('should pass booleans through and ignore blanks', () => {
    expect(parseBoolean(false, 'metrics.enabled')).toBe(false);
    expect(parseBoolean('', 'metrics.enabled')).toBeUndefined();
    expect(parseBoolean(undefined, 'metrics.enabled')).toBeUndefined();
  });

  it('should reject anything else', () => {
    expect(() => parseBoolean('maybe', 'metrics.enabled')).toThrow('metrics.enabled must be a boolean');
    expect(() => parseBoolean(1, 'metrics.enabled')).toThrow('metrics.enabled must be a boolean');
  });
});

describe('parseString', () => {
  it('should trim strings', () => {
    expect(parseString('  /var/log/monitor.log ', 'log.file')).toBe('/var/log/monitor.log');
  });

  it('should return undefined for missing values and reject other types', () => {
    expect(parseString(null, 'log.file')).toBeUndefined();
    expect(() => parseString(42, 'log.file')).toThrow('log.file must be a string');
  });
});

describe('splitList', () => {
  it('should split on commas, trim, and drop empty entries', () => {
    expect(splitList(' https://a.example.com , ,https://b.example.com,')).toEqual([
      'https://a.example.com',
      'https://b.example.com',
    ]);
  });

  it('should return an empty list for blank input', () => {
    expect(splitList('')).toEqual([]);
  });
});

describe('isPlainObject', () => {
  it('should accept mappings only', () => {
    expect(isPlainObject({ urls: [] })).toBe(true);
    expect(isPlainObject([])).toBe(false);
    expect(isPlainObject(null)).toBe(false);
    expect(isPlainObject('monitor')).toBe(false);
  });
});
