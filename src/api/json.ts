/**
 * Request body parsing shared by the endpoint handlers.
 */

import { InvalidRequestError } from '../errors.js';

/** Parse the request body as JSON; a missing or malformed body is a 400. */
export async function readJsonBody(req: Request): Promise<unknown> {
  const raw = await req.text();

  if (raw.trim().length === 0) {
    throw new InvalidRequestError('Request body is required');
  }

  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch {
    throw new InvalidRequestError('Request body must be valid JSON');
  }
}
