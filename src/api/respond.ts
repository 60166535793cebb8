import type { ResultStatus, SuccessEnvelope } from '../types/api.js';

const JSON_HEADERS = { 'Content-Type': 'application/json' };

/** Wrap data in the success envelope. */
export function success<T>(
  data: T,
  result: Exclude<ResultStatus, 'Failed'> = 'OK',
  status = 200
): Response {
  const body: SuccessEnvelope<T> = { result, data };
  return new Response(JSON.stringify(body), { status, headers: JSON_HEADERS });
}
