import { randomBytes } from 'node:crypto';

/**
 * Short reference shown to the client and written to the log for
 * unexpected errors.
 */
export function generateErrorCode(): string {
  return `ERR-${Date.now().toString(36).toUpperCase()}-${randomBytes(3).toString('hex').toUpperCase()}`;
}
