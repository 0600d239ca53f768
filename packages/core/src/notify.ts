import { LNURLErrorResponse, LNURLUnsupportedError, errorMessage } from './errors';
import type { Notification } from './types/notification';

/**
 * Map a failure onto the single notification the user sees for it.
 * Server-supplied rejections keep their host and reason; everything else
 * becomes a generic error carrying the message, optionally prefixed.
 */
export function notificationForError(error: unknown, prefix?: string): Notification {
  if (error instanceof LNURLErrorResponse) {
    return { kind: 'lnurl-error', host: error.host, reason: error.reason };
  }
  if (error instanceof LNURLUnsupportedError) {
    return { kind: 'lnurl-unsupported' };
  }

  const message = errorMessage(error);
  return { kind: 'error', err: prefix ? `${prefix}: ${message}` : message };
}
