import { STATUS_CODES } from 'node:http';

/**
 * Human-readable status line used as a retry reason, e.g.
 * `"503 Service Unavailable"`. Codes without a registered phrase read
 * `"<code> Unknown Status"`.
 */
export const responseStatusMessage = (status: number): string =>
  `${status} ${STATUS_CODES[status] ?? 'Unknown Status'}`;

export const isSuccessStatus = (status: number): boolean =>
  status >= 200 && status < 300;
