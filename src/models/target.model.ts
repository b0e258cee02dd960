/**
 * Target Model
 * Infers the kind of a raw target string and freezes it
 */

import { Target, TargetKind } from '../types';
import { TargetError } from '../utils/errors';
import { isValidDomain, isValidEmail, isValidIpAddress } from '../utils/validation';

/**
 * Decide the target kind from its shape, or null when unrecognized
 */
export function inferTargetKind(value: string): TargetKind | null {
  if (value.includes('@')) {
    return isValidEmail(value) ? 'Email' : null;
  }

  if (isValidIpAddress(value)) {
    return 'IPAddress';
  }

  if (isValidDomain(value)) {
    return 'Domain';
  }

  return null;
}

/**
 * Build a Target from user input; throws TargetError for anything
 * that is not an email, a domain or an IP address
 */
export function parseTarget(raw: string): Target {
  const trimmed = typeof raw === 'string' ? raw.trim() : '';

  if (!trimmed) {
    throw new TargetError('Target is empty', String(raw));
  }

  // IPv6 literals may come bracketed, as in URLs
  const unbracketed = /^\[.*\]$/.test(trimmed) ? trimmed.slice(1, -1) : trimmed;
  const value = unbracketed.toLowerCase().replace(/\.$/, '');
  const kind = inferTargetKind(value);

  if (!kind) {
    throw new TargetError(
      `Unrecognized target "${trimmed}": expected an email address, a domain or an IP address`,
      raw
    );
  }

  return Object.freeze({ raw, value, kind });
}
