// ============================================================================
// REQUEST ID
// ============================================================================

import { randomUUID } from 'node:crypto';

export const REQUEST_ID_HEADER = 'X-Request-Id';

// Ids forwarded by a proxy or scheduler are kept when they are header-safe.
const FORWARDED_ID = /^[A-Za-z0-9._:-]{8,128}$/;

/**
 * Generate a unique request ID for tracing
 * Format: req_<uuid>
 */
export function generateRequestId(): string {
  return `req_${randomUUID()}`;
}

export function getOrGenerateRequestId(request: Request): string {
  const forwarded = request.headers.get(REQUEST_ID_HEADER)?.trim();
  return forwarded && FORWARDED_ID.test(forwarded) ? forwarded : generateRequestId();
}
