import type { ResolvedRequest } from '../models/results.js';
import { encodeBody, formFields } from './executor.js';

export interface CurlOptions {
  timeoutMs?: number;
  insecure?: boolean;
}

const SHELL_SAFE = /^[\w@%+=:,./-]+$/;

/** Quote one argument for a POSIX shell. */
function shellQuote(value: string): string {
  if (value === '') return "''";
  if (SHELL_SAFE.test(value)) return value;
  return `'${value.replace(/'/g, `'"'"'`)}'`;
}

/**
 * Render a resolved request as an equivalent curl command line. Bodies are
 * encoded the way the executor sends them, including the default
 * Content-Type; multipart fields become `-F` parts.
 */
export function toCurl(request: ResolvedRequest, options: CurlOptions = {}): string {
  const parts = ['curl'];
  const method = request.method.toUpperCase();
  if (method !== 'GET') parts.push('-X', shellQuote(method));

  const headers = { ...request.headers };
  const data: string[] = [];

  if (request.bodyType === 'multipart' && request.body !== undefined) {
    for (const [key, value] of formFields(request.body)) data.push('-F', shellQuote(`${key}=${value}`));
  } else {
    const body = encodeBody(request, headers);
    if (typeof body === 'string') data.push('--data-raw', shellQuote(body));
  }

  for (const [name, value] of Object.entries(headers)) {
    parts.push('-H', shellQuote(`${name}: ${value}`));
  }
  parts.push(...data, shellQuote(request.url));

  if (options.timeoutMs !== undefined) parts.push('--max-time', String(options.timeoutMs / 1000));
  if (options.insecure) parts.push('-k');

  return parts.join(' ');
}
