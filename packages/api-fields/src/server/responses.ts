/**
 * Response envelopes of the JSON API
 */

export interface ApiEnvelope<T> {
  /** `'OK'` on success, otherwise the failure message */
  status: string;
  payload: T | null;
}

export interface ApiResponse<T = unknown> {
  statusCode: number;
  body: ApiEnvelope<T>;
}

export function success<T>(payload: T): ApiResponse<T> {
  return { statusCode: 200, body: { status: 'OK', payload } };
}

export function failure(message: string, code = 400): ApiResponse<never> {
  return { statusCode: code, body: { status: message, payload: null } };
}
