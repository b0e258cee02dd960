/**
 * HTTP error normalization shared by the axios-based providers
 */

import axios from 'axios';
import { ProviderHttpError } from './errors';

/**
 * Convert whatever an axios call threw into a ProviderHttpError carrying the
 * response status. Cancellations become an AbortError so retry stops.
 * `statusMessages` replaces the message for specific statuses.
 */
export function toProviderHttpError(
  provider: string,
  error: unknown,
  statusMessages: Partial<Record<number, string>> = {}
): Error {
  if (error instanceof ProviderHttpError) {
    return error;
  }

  if (axios.isCancel(error)) {
    const aborted = new Error(`${provider} request aborted`);
    aborted.name = 'AbortError';
    return aborted;
  }

  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    const message = (status !== undefined ? statusMessages[status] : undefined) ?? error.message;
    return new ProviderHttpError(provider, message, status);
  }

  return error instanceof Error ? error : new Error(String(error));
}
