// RESPONSE HELPERS
// Standardized JSON responses with CORS headers

import { MediaNotFoundError, ProviderError } from './errors';

export const CORS_HEADERS: Record<string, string> = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Methods': 'GET, POST, OPTIONS',
  'Access-Control-Allow-Headers': 'Content-Type',
  'Access-Control-Max-Age': '86400',
};

export function errorResponse(
  status: number,
  error: string,
  message: string,
  extra?: Record<string, unknown>
): Response {
  return new Response(
    JSON.stringify({ error, message, ...extra }),
    {
      status,
      headers: { ...CORS_HEADERS, 'content-type': 'application/json' },
    }
  );
}

// Common error responses
export function invalidContentTypeResponse(expected: string, received: string): Response {
  return errorResponse(400, 'Invalid Content-Type', `Content-Type must be ${expected}`, { received });
}

export function invalidJsonResponse(): Response {
  return errorResponse(400, 'Invalid JSON', 'Request body must be valid JSON');
}

export function missingFieldResponse(field: string): Response {
  return errorResponse(400, 'Missing field', `Request body must include "${field}" field`);
}

export function fileTooLargeResponse(actualBytes: number, maxBytes: number): Response {
  const actualMB = actualBytes / (1024 * 1024);
  const maxMB = maxBytes / (1024 * 1024);

  return errorResponse(413, 'File too large',
    `Audio file must be ${maxMB.toFixed(0)} MB or smaller. Your file is ${actualMB.toFixed(2)} MB.`,
    {
      max_size_mb: Math.round(maxMB),
      actual_size_mb: parseFloat(actualMB.toFixed(2)),
    }
  );
}

/**
 * Map a failure thrown by a service onto an HTTP error response
 */
export function serviceErrorResponse(error: unknown): Response {
  if (error instanceof MediaNotFoundError) {
    return errorResponse(404, 'Media not found', error.message);
  }
  if (error instanceof ProviderError) {
    return errorResponse(502, 'Provider error', error.message, {
      provider: error.provider,
      provider_status: error.status,
    });
  }
  return errorResponse(500, 'Internal server error', error instanceof Error ? error.message : String(error));
}
