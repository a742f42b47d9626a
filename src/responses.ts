/**
 * JSON response builders shared by the router, its handlers, the error
 * handler and the HTTP adapter. Every error body is an ApiErrorResponse.
 */

import type { ApiErrorResponse } from './types/api.js';

const JSON_HEADERS: Readonly<Record<string, string>> = {
  'Content-Type': 'application/json',
};

export function jsonResponse(
  body: unknown,
  status = 200,
  headers?: Record<string, string>
): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { ...JSON_HEADERS, ...headers },
  });
}

export function errorResponse(
  status: number,
  error: ApiErrorResponse['error'],
  headers?: Record<string, string>
): Response {
  const body: ApiErrorResponse = { error };
  return jsonResponse(body, status, headers);
}
