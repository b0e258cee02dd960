/**
 * Validation utilities for Leak Triage
 */

import { isIP } from 'net';

/**
 * Validate email address format
 */
export function isValidEmail(email: string): boolean {
  if (!email || typeof email !== 'string') return false;

  // Basic email regex - covers most common cases
  const emailRegex = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
  if (!emailRegex.test(email.trim())) return false;

  const domain = email.trim().split('@')[1];
  return isValidDomain(domain);
}

/**
 * Validate a DNS hostname with at least one dot and an alphabetic TLD
 */
export function isValidDomain(domain: string): boolean {
  if (!domain || typeof domain !== 'string') return false;

  const normalized = domain.trim().replace(/\.$/, '');
  if (normalized.length > 253) return false;

  const labels = normalized.split('.');
  if (labels.length < 2) return false;

  const labelRegex = /^[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?$/i;
  if (!labels.every(label => labelRegex.test(label))) return false;

  return /^[a-z]{2,63}$/i.test(labels[labels.length - 1]);
}

/**
 * Validate an IPv4 or IPv6 literal
 */
export function isValidIpAddress(value: string): boolean {
  if (!value || typeof value !== 'string') return false;
  return isIP(value.trim()) !== 0;
}

/**
 * Sanitize string for safe logging (remove potential secrets)
 */
export function sanitizeForLogging(value: string, maxLength = 100): string {
  if (!value) return '';

  // Truncate long strings
  const truncated = value.length > maxLength
    ? value.substring(0, maxLength) + '...'
    : value;

  // Remove potential sensitive patterns
  return truncated
    .replace(/password[=:]\s*\S+/gi, 'password=[REDACTED]')
    .replace(/api[_-]?key[=:]\s*\S+/gi, 'api_key=[REDACTED]')
    .replace(/bearer\s+\S+/gi, 'bearer [REDACTED]')
    .replace(/\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Z]{2,}\b/gi, '[EMAIL]');
}

/**
 * Normalize whitespace in text
 */
export function normalizeWhitespace(text: string): string {
  if (!text) return '';
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Cut text to `maxLength` characters, marking the cut with an ellipsis
 */
export function truncateText(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  return text.substring(0, Math.max(0, maxLength - 3)) + '...';
}

/**
 * Drop NUL and other control characters that binary dumps leave in text,
 * keeping tabs and line breaks
 */
export function stripControlCharacters(text: string): string {
  if (!text) return '';
  // eslint-disable-next-line no-control-regex
  return text.replace(/[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F]/g, '');
}
