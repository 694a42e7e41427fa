import { z } from 'zod';
import { AdminResponse, MatrixErrorSchema } from '../types/admin-types';
import { AdminError } from './errors';

export function isSuccess(response: AdminResponse): boolean {
  return response.status >= 200 && response.status < 300;
}

/**
 * Decode a response body. An empty 2xx body decodes to `{}`.
 * @throws AdminError when the body is not JSON
 */
export function decodeBody(response: AdminResponse): unknown {
  if (response.body.trim() === '') {
    return {};
  }
  try {
    return JSON.parse(response.body);
  } catch {
    throw new AdminError(
      response.status,
      null,
      `Response is not valid JSON: ${response.body.slice(0, 200)}`,
      response.method,
      response.path
    );
  }
}

/**
 * Build the AdminError for a non-2xx response. `errcode` and `error` from a
 * JSON body are kept exactly as sent; otherwise the status line is used.
 */
export function toAdminError(response: AdminResponse): AdminError {
  const statusLine = `${response.status} ${response.statusMessage}`.trim();

  let parsed: unknown;
  try {
    parsed = JSON.parse(response.body);
  } catch {
    parsed = undefined;
  }

  const matrixError = MatrixErrorSchema.safeParse(parsed);
  if (matrixError.success && (matrixError.data.errcode !== undefined || matrixError.data.error !== undefined)) {
    return new AdminError(
      response.status,
      matrixError.data.errcode ?? null,
      matrixError.data.error ?? statusLine,
      response.method,
      response.path
    );
  }

  return new AdminError(response.status, null, statusLine, response.method, response.path);
}

/**
 * Turn a response into a typed result, or the matching AdminError
 */
export function parseResponse<S extends z.ZodTypeAny>(response: AdminResponse, schema: S): z.infer<S> {
  if (!isSuccess(response)) {
    throw toAdminError(response);
  }

  const result = schema.safeParse(decodeBody(response));
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.length > 0 ? ` at "${issue.path.join('.')}"` : '';
    throw new AdminError(
      response.status,
      null,
      `Unexpected response body${where}: ${issue.message}`,
      response.method,
      response.path
    );
  }
  return result.data;
}
