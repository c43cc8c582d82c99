import { JSONPath } from 'jsonpath-plus';
import { DOMParser } from '@xmldom/xmldom';
import xpath from 'xpath';
import {
  parseAssertExpression,
  parseSourceExpression,
  type AssertExpression,
  type SourceExpression,
  type VariableValue,
} from '@courier/catalog';
import type { TemplateResolver } from '../templates/template-resolver.js';
import type { AssertionRecord, HttpExchange } from '../models/results.js';
import { compare, parseJsonBody, toVariableValue, valuesEqual } from './values.js';

export type Extraction = { found: true; value: VariableValue } | { found: false };

const MISS: Extraction = { found: false };

/** Label of the assertion generated from a request's `Status` field. */
export const STATUS_ASSERTION = 'Status';

/** Where a user assertion labelled `Status` goes when the generated one is present. */
export const USER_STATUS_ASSERTION = 'Asserts.Status';

/**
 * Evaluates capture and assert expressions against one completed HTTP
 * exchange. Nothing here throws for a missing value or a failed check:
 * misses become null captures and failures become records.
 */
export class ExtractAssertEngine {
  constructor(private readonly resolver: TemplateResolver) {}

  extract(source: SourceExpression, exchange: HttpExchange): Extraction {
    switch (source.kind) {
      case 'status':
        return { found: true, value: exchange.status };

      case 'time':
        return { found: true, value: exchange.elapsedMs };

      case 'body':
        return { found: true, value: exchange.body };

      case 'header': {
        const wanted = source.name.toLowerCase();
        const entry = Object.entries(exchange.headers).find(([name]) => name.toLowerCase() === wanted);
        return entry ? { found: true, value: entry[1] } : MISS;
      }

      case 'jsonpath':
        return this.extractJsonPath(source.path, exchange.body);

      case 'xpath':
        return this.extractXPath(source.path, exchange.body);

      case 'regex': {
        const match = new RegExp(source.pattern).exec(exchange.body);
        if (!match) return MISS;
        return { found: true, value: match[1] ?? match[0] };
      }
    }
  }

  private extractJsonPath(path: string, body: string): Extraction {
    const json = parseJsonBody(body);
    if (json === undefined) return MISS;

    let matches: unknown;
    try {
      matches = JSONPath({ path, json, wrap: true });
    } catch {
      return MISS;
    }

    if (!Array.isArray(matches) || matches.length === 0) return MISS;
    return { found: true, value: toVariableValue(matches[0]) };
  }

  /** First node's text, or the scalar an XPath function returns. */
  private extractXPath(path: string, body: string): Extraction {
    if (body.trim() === '') return MISS;

    let result: unknown;
    try {
      const parser = new DOMParser({ errorHandler: { warning: () => {}, error: rejectXml, fatalError: rejectXml } });
      result = xpath.select(path, parser.parseFromString(body, 'text/xml'));
    } catch {
      return MISS;
    }

    if (typeof result === 'string' || typeof result === 'number' || typeof result === 'boolean') {
      return { found: true, value: toVariableValue(result) };
    }
    if (!Array.isArray(result) || result.length === 0) return MISS;

    const first: unknown = result[0];
    if (first !== null && typeof first === 'object' && 'textContent' in first) {
      const text = first.textContent;
      if (typeof text === 'string') return { found: true, value: text };
    }
    return MISS;
  }

  /** Evaluate capture rules; a miss or a bad expression yields null. */
  capture(rules: Record<string, string>, exchange: HttpExchange): Record<string, VariableValue> {
    const captures: Record<string, VariableValue> = {};

    for (const [name, expression] of Object.entries(rules)) {
      try {
        const extraction = this.extract(parseSourceExpression(expression), exchange);
        captures[name] = extraction.found ? extraction.value : null;
      } catch (err) {
        console.warn(`ExtractAssertEngine: capture "${name}" failed:`, err instanceof Error ? err.message : err);
        captures[name] = null;
      }
    }

    return captures;
  }

  /**
   * Evaluate assertions. When `expectedStatus` is given, a `Status` equality
   * check is recorded first, and a user assertion with that same label is
   * recorded as `Asserts.Status` instead.
   */
  assert(
    rules: Record<string, string>,
    exchange: HttpExchange,
    expectedStatus?: number | string,
  ): Record<string, AssertionRecord> {
    const results: Record<string, AssertionRecord> = {};

    if (expectedStatus !== undefined) {
      results[STATUS_ASSERTION] = this.assertStatus(expectedStatus, exchange);
    }

    for (const [label, expression] of Object.entries(rules)) {
      const key = label === STATUS_ASSERTION && expectedStatus !== undefined ? USER_STATUS_ASSERTION : label;
      results[key] = this.evaluate(expression, exchange);
    }

    return results;
  }

  private assertStatus(expectedStatus: number | string, exchange: HttpExchange): AssertionRecord {
    let expected: VariableValue;
    try {
      expected =
        typeof expectedStatus === 'string'
          ? this.resolver.resolve(expectedStatus, STATUS_ASSERTION)
          : expectedStatus;
    } catch (err) {
      return failed(exchange.status, expectedStatus, '==', err);
    }

    return {
      passed: valuesEqual(exchange.status, expected),
      actual: exchange.status,
      expected,
      operator: '==',
    };
  }

  /** Evaluate one assert expression; never throws. */
  evaluate(expression: string, exchange: HttpExchange): AssertionRecord {
    let parsed: AssertExpression;
    try {
      parsed = parseAssertExpression(expression);
    } catch (err) {
      return failed(null, null, null, err);
    }

    const extraction = this.extract(parsed.source, exchange);
    const actual = extraction.found ? extraction.value : null;

    if (parsed.operator === null || parsed.expected === null) {
      return { passed: actual !== null, actual, expected: null, operator: null };
    }

    let expected: VariableValue;
    try {
      expected = this.resolver.resolve(parsed.expected, label(expression));
    } catch (err) {
      return failed(actual, parsed.expected, parsed.operator, err);
    }

    const outcome = compare(actual, parsed.operator, expected);
    return {
      passed: outcome.passed,
      actual,
      expected,
      operator: parsed.operator,
      ...(outcome.reason ? { reason: outcome.reason } : {}),
    };
  }
}

function rejectXml(message: string): never {
  throw new Error(message);
}

function label(expression: string): string {
  return `Asserts[${expression.trim()}]`;
}

function failed(
  actual: VariableValue,
  expected: VariableValue,
  operator: AssertionRecord['operator'],
  err: unknown,
): AssertionRecord {
  return {
    passed: false,
    actual,
    expected,
    operator,
    reason: err instanceof Error ? err.message : String(err),
  };
}
