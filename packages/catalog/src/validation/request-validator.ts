import type { LoadedRequest, RequestDocument } from '../models/types.js';
import { parseAssertExpression, parseSourceExpression } from '../syntax/expressions.js';
import { referencedNames, scanPlaceholders } from '../syntax/placeholders.js';

export interface ValidationResult {
  warnings: string[];
}

/**
 * Lint a single request document:
 * - Capture and assert expression syntax
 * - Balanced `${...}` placeholders in every templated field
 *
 * Findings are warnings only. At run time a bad expression fails its own
 * assertion (or captures null) and a bad placeholder fails its own request,
 * so nothing here stops the document from loading.
 */
export function validateRequest(document: RequestDocument, label = 'request'): ValidationResult {
  const warnings: string[] = [];

  // ── Captures ──────────────────────────────────────────────────────

  for (const [name, expression] of Object.entries(document.Captures ?? {})) {
    try {
      parseSourceExpression(expression);
    } catch (err) {
      warnings.push(`${label}: capture "${name}": ${errorMessage(err)}`);
    }
  }

  // ── Asserts ───────────────────────────────────────────────────────

  for (const [name, expression] of Object.entries(document.Asserts ?? {})) {
    try {
      parseAssertExpression(expression);
    } catch (err) {
      warnings.push(`${label}: assert "${name}": ${errorMessage(err)}`);
    }
  }

  if (document.Status !== undefined && document.Asserts?.Status !== undefined) {
    warnings.push(`${label}: assert "Status" is recorded as "Asserts.Status" next to the Status check`);
  }

  // ── Placeholder syntax ────────────────────────────────────────────

  for (const [path, text] of templatedStrings(document)) {
    try {
      scanPlaceholders(text);
    } catch (err) {
      warnings.push(`${label}: ${path}: ${errorMessage(err)}`);
    }
  }

  return { warnings };
}

/**
 * Validate the requests of a suite in execution order. On top of the
 * per-request checks, warns about placeholders that nothing provides:
 * not a known variable, not defined by the request itself and not captured
 * by an earlier request.
 */
export function validateSuiteRequests(
  requests: LoadedRequest[],
  knownNames: Iterable<string> = [],
): ValidationResult {
  const warnings: string[] = [];

  const available = new Set(knownNames);
  // Scripts can set arbitrary names, so a script anywhere upstream silences the check
  let scripted = false;

  for (const { file, document } of requests) {
    warnings.push(...validateRequest(document, file).warnings);

    if (document.PreExec) scripted = true;
    const defined = new Set(Object.keys(document.Define ?? {}));

    if (!scripted) {
      for (const [path, text] of templatedStrings(document)) {
        for (const name of namesIn(text)) {
          if (!available.has(name) && !defined.has(name)) {
            warnings.push(`${file}: ${path} uses "\${${name}}" but no source provides "${name}"`);
          }
        }
      }
    }

    for (const name of Object.keys(document.Captures ?? {})) {
      available.add(name);
    }
    for (const name of defined) {
      available.add(name);
    }
    if (document.PostExec) scripted = true;
  }

  return { warnings };
}

/** Every string a request resolves, paired with its field path. */
function templatedStrings(document: RequestDocument): Array<[string, string]> {
  const out: Array<[string, string]> = [];
  const { Captures: _captures, Asserts, PreExec: _pre, PostExec: _post, ...templated } = document;

  collectStrings(templated, '', out);

  // only the expected side of an assertion is templated
  for (const [name, expression] of Object.entries(Asserts ?? {})) {
    let expected: string | null = null;
    try {
      expected = parseAssertExpression(expression).expected;
    } catch {
      // reported by the assert syntax check
    }
    if (expected !== null) out.push([`Asserts.${name}`, expected]);
  }
  return out;
}

function collectStrings(value: unknown, path: string, out: Array<[string, string]>): void {
  if (typeof value === 'string') {
    out.push([path || '(root)', value]);
  } else if (Array.isArray(value)) {
    value.forEach((item: unknown, index) => collectStrings(item, `${path}[${index}]`, out));
  } else if (value !== null && typeof value === 'object') {
    for (const [key, item] of Object.entries(value)) {
      collectStrings(item, path ? `${path}.${key}` : key, out);
    }
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
