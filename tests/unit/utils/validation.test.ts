/**
 * Validation utility tests
 */

import {
  isValidEmail,
  isValidDomain,
  isValidIpAddress,
  sanitizeForLogging,
  normalizeWhitespace,
  truncateText,
  stripControlCharacters,
} from '../../../src/utils/validation';

describe('isValidEmail', () => {
  it('should return true for valid emails', () => {
    expect(isValidEmail('user@example.com')).toBe(true);
    expect(isValidEmail('test.user@subdomain.example.com')).toBe(true);
    expect(isValidEmail('user+tag@example.org')).toBe(true);
  });

  it('should return false for invalid emails', () => {
    expect(isValidEmail('')).toBe(false);
    expect(isValidEmail('invalid')).toBe(false);
    expect(isValidEmail('user@')).toBe(false);
    expect(isValidEmail('@example.com')).toBe(false);
    expect(isValidEmail('user@example.123')).toBe(false);
  });
});

describe('isValidDomain', () => {
  it('should accept hostnames with an alphabetic TLD', () => {
    expect(isValidDomain('example.com')).toBe(true);
    expect(isValidDomain('mail.example.co.uk')).toBe(true);
    expect(isValidDomain('my-site.io')).toBe(true);
    expect(isValidDomain('example.com.')).toBe(true);
  });

  it('should reject single labels and malformed labels', () => {
    expect(isValidDomain('localhost')).toBe(false);
    expect(isValidDomain('-bad.example.com')).toBe(false);
    expect(isValidDomain('bad-.example.com')).toBe(false);
    expect(isValidDomain('exa mple.com')).toBe(false);
    expect(isValidDomain('example..com')).toBe(false);
  });

  it('should reject numeric TLDs', () => {
    expect(isValidDomain('10.0.0.1')).toBe(false);
  });
});

describe('isValidIpAddress', () => {
  it('should accept IPv4 and IPv6 literals', () => {
    expect(isValidIpAddress('192.168.1.10')).toBe(true);
    expect(isValidIpAddress('::1')).toBe(true);
    expect(isValidIpAddress('2001:db8::ff00:42:8329')).toBe(true);
  });

  it('should reject anything else', () => {
    expect(isValidIpAddress('256.1.1.1')).toBe(false);
    expect(isValidIpAddress('example.com')).toBe(false);
    expect(isValidIpAddress('')).toBe(false);
  });
});

describe('sanitizeForLogging', () => {
  it('should redact secrets and email addresses', () => {
    expect(sanitizeForLogging('password=hunter2 for admin@example.com')).toBe(
      'password=[REDACTED] for [EMAIL]'
    );
    expect(sanitizeForLogging('Authorization: Bearer test-secret')).toBe('Authorization: bearer [REDACTED]');
  });

  it('should truncate long values before redacting', () => {
    expect(sanitizeForLogging('abcdefghij', 4)).toBe('abcd...');
  });

  it('should return empty string for empty input', () => {
    expect(sanitizeForLogging('')).toBe('');
  });
});

describe('normalizeWhitespace', () => {
  it('should collapse runs of whitespace and trim', () => {
    expect(normalizeWhitespace('  a\n\tb   c  ')).toBe('a b c');
  });
});

describe('truncateText', () => {
  it('should leave short text untouched', () => {
    expect(truncateText('short', 10)).toBe('short');
    expect(truncateText('exactly10!', 10)).toBe('exactly10!');
  });

  it('should cut to the limit including the ellipsis', () => {
    const result = truncateText('abcdefghijkl', 10);
    expect(result).toBe('abcdefg...');
    expect(result).toHaveLength(10);
  });
});

describe('stripControlCharacters', () => {
  it('should drop NUL and control bytes but keep tabs and newlines', () => {
    expect(stripControlCharacters('a\u0000b\u0007c\td\ne\r\n')).toBe('abc\td\ne\r\n');
  });
});
