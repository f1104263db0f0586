import type { StandardSchemaV1 } from '@standard-schema/spec';
import { ValidationError } from '../error/validationError.js';
import type { SearchParams } from '../types/request.js';
import type { SafeWrap } from './wrap.js';

/**
 * Constructs a relative URL from an endpoint path and its query parameters.
 *
 * - Strips leading slashes so the result can be appended to the base URL.
 * - Rejects an empty path, a path carrying its own query or fragment, and
 *   blank or non-string parameter values, before anything is sent.
 * - Parameters keep their insertion order and are URI-encoded.
 */
export function constructUrl(path: string, searchParams: SearchParams = {}): SafeWrap<ValidationError, string> {
  const issues: StandardSchemaV1.Issue[] = [];
  const result = typeof path === 'string' ? path.trim().replace(/^\/+/, '') : '';

  if (!result) {
    issues.push({ message: 'path must be a non-empty string', path: ['path'] });
  } else if (/[?#]/.test(result)) {
    issues.push({ message: 'path must not contain a query or fragment', path: ['path'] });
  }

  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(searchParams)) {
    if (typeof value !== 'string' || value.trim() === '') {
      issues.push({ message: 'value must be a non-empty string', path: ['searchParams', key] });
      continue;
    }

    search.set(key, value);
  }

  if (issues.length > 0) {
    return [new ValidationError('error constructing URL', issues), null];
  }

  const query = search.toString();
  return [null, query ? `${result}?${query}` : result];
}
