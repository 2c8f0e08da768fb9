/**
 * CORS utilities for handling cross-origin requests
 */

/**
 * Build CORS headers for the read-only search API
 *
 * Any origin may query; the request origin is reflected back
 * and omitted for same-origin requests.
 */
export function buildCorsHeaders(request: Request): Record<string, string> {
  const origin = request.headers.get('Origin');

  const headers: Record<string, string> = {
    'Access-Control-Allow-Methods': 'GET, OPTIONS',
    'Access-Control-Allow-Headers': 'Content-Type',
  };

  if (origin) {
    headers['Access-Control-Allow-Origin'] = origin;
    headers['Vary'] = 'Origin';
  }

  return headers;
}
