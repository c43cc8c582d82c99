import { describe, it, expect, vi } from 'vitest';
import { parseSourceExpression } from '@courier/catalog';
import { ExtractAssertEngine } from '../extract-assert.js';
import { TemplateResolver } from '../../templates/template-resolver.js';
import { FakerGenerator } from '../../templates/fake-data.js';
import { VariableStore } from '../../variables/variable-store.js';
import { PersistentVariables } from '../../variables/persistent-variables.js';
import { InMemoryVariableRepository } from '../../variables/repositories.js';
import type { HttpExchange } from '../../models/results.js';

function exchange(partial: Partial<HttpExchange> = {}): HttpExchange {
  return {
    status: 200,
    headers: { 'content-type': 'application/json', 'x-request-id': 'req-1' },
    body: '{"id": 7, "email": "a@b.com", "tags": ["x", "y"], "count": "3"}',
    elapsedMs: 120,
    ...partial,
  };
}

function createEngine() {
  const store = new VariableStore({
    suite: { expectedId: 7, domain: 'b.com' },
    persistent: new PersistentVariables(new InMemoryVariableRepository()),
  });
  return new ExtractAssertEngine(new TemplateResolver(store, new FakerGenerator()));
}

describe('ExtractAssertEngine', () => {
  describe('extract', () => {
    const engine = createEngine();

    it('reads status, time and raw body', () => {
      expect(engine.extract({ kind: 'status' }, exchange())).toEqual({ found: true, value: 200 });
      expect(engine.extract({ kind: 'time' }, exchange())).toEqual({ found: true, value: 120 });
      expect(engine.extract({ kind: 'body' }, exchange({ body: 'ok' }))).toEqual({ found: true, value: 'ok' });
    });

    it('matches header names case-insensitively', () => {
      expect(engine.extract(parseSourceExpression("@headers['Content-Type']"), exchange())).toEqual({
        found: true,
        value: 'application/json',
      });
      expect(engine.extract(parseSourceExpression('@headers X-Missing'), exchange())).toEqual({ found: false });
    });

    it('returns the first jsonpath match with its JSON type', () => {
      expect(engine.extract({ kind: 'jsonpath', path: '$.id' }, exchange())).toEqual({ found: true, value: 7 });
      expect(engine.extract({ kind: 'jsonpath', path: '$.tags[*]' }, exchange())).toEqual({ found: true, value: 'x' });
      expect(engine.extract({ kind: 'jsonpath', path: '$.tags' }, exchange())).toEqual({
        found: true,
        value: ['x', 'y'],
      });
    });

    it('misses when the body is not JSON or nothing matches', () => {
      expect(engine.extract({ kind: 'jsonpath', path: '$.id' }, exchange({ body: '<html>' }))).toEqual({ found: false });
      expect(engine.extract({ kind: 'jsonpath', path: '$.missing' }, exchange())).toEqual({ found: false });
    });

    it('reads XML bodies with xpath', () => {
      const xml = exchange({
        headers: { 'content-type': 'application/xml' },
        body: '<order><id>42</id><item sku="a1">Pen</item><item sku="b2">Ink</item></order>',
      });

      expect(engine.extract(parseSourceExpression('@body xpath //order/id'), xml)).toEqual({ found: true, value: '42' });
      expect(engine.extract({ kind: 'xpath', path: '//item[2]' }, xml)).toEqual({ found: true, value: 'Ink' });
      expect(engine.extract({ kind: 'xpath', path: 'count(//item)' }, xml)).toEqual({ found: true, value: 2 });
      expect(engine.extract({ kind: 'xpath', path: '//missing' }, xml)).toEqual({ found: false });
    });

    it('misses when the body is empty or the xpath is invalid', () => {
      const xml = exchange({ body: '<order><id>42</id></order>' });

      expect(engine.extract({ kind: 'xpath', path: '//id' }, exchange({ body: '' }))).toEqual({ found: false });
      expect(engine.extract({ kind: 'xpath', path: '//[' }, xml)).toEqual({ found: false });
    });

    it('returns the first regex group, or the whole match without groups', () => {
      expect(engine.extract({ kind: 'regex', pattern: '"email":\\s*"([^"]+)"' }, exchange())).toEqual({
        found: true,
        value: 'a@b.com',
      });
      expect(engine.extract({ kind: 'regex', pattern: 'b\\.com' }, exchange())).toEqual({ found: true, value: 'b.com' });
      expect(engine.extract({ kind: 'regex', pattern: 'zzz' }, exchange())).toEqual({ found: false });
    });
  });

  describe('capture', () => {
    it('captures typed values and nulls for misses', () => {
      const captures = createEngine().capture(
        {
          userId: '@body jsonpath $.id',
          missing: '@body jsonpath $.missing',
          requestId: "@headers['X-Request-Id']",
          code: '@status',
        },
        exchange(),
      );

      expect(captures).toEqual({ userId: 7, missing: null, requestId: 'req-1', code: 200 });
    });

    it('records null for a malformed expression', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

      expect(createEngine().capture({ bad: '@nope' }, exchange())).toEqual({ bad: null });
      expect(warn).toHaveBeenCalledOnce();
    });
  });

  describe('assert', () => {
    it('passes an equality check on a jsonpath number', () => {
      const results = createEngine().assert({ 'id is 7': '@body jsonpath $.id |==| 7' }, exchange());

      expect(results['id is 7']).toEqual({ passed: true, actual: 7, expected: '7', operator: '==' });
    });

    it('fails a presence check on a missing path', () => {
      const results = createEngine().assert({ 'has missing': '@body jsonpath $.missing' }, exchange());

      expect(results['has missing']).toEqual({ passed: false, actual: null, expected: null, operator: null });
    });

    it('passes a presence check on a present path', () => {
      const results = createEngine().assert({ 'has email': '@body jsonpath $.email' }, exchange());
      expect(results['has email'].passed).toBe(true);
    });

    it('records a failing Status assertion before user assertions', () => {
      const results = createEngine().assert({ 'has id': '@body jsonpath $.id' }, exchange(), 201);

      expect(Object.keys(results)).toEqual(['Status', 'has id']);
      expect(results.Status).toEqual({ passed: false, actual: 200, expected: 201, operator: '==' });
      expect(results['has id'].passed).toBe(true);
    });

    it('keeps a user assertion labelled Status next to the generated one', () => {
      const results = createEngine().assert({ Status: '@status |==| 200' }, exchange(), 201);

      expect(Object.keys(results)).toEqual(['Status', 'Asserts.Status']);
      expect(results.Status).toEqual({ passed: false, actual: 200, expected: 201, operator: '==' });
      expect(results['Asserts.Status']).toEqual({ passed: true, actual: 200, expected: '200', operator: '==' });
    });

    it('uses the Status label as given when there is no expected status', () => {
      const results = createEngine().assert({ Status: '@status |==| 200' }, exchange());
      expect(Object.keys(results)).toEqual(['Status']);
    });

    it('resolves a templated Status', () => {
      const engine = createEngine();
      const results = engine.assert({}, exchange({ status: 7 }), '${expectedId}');
      expect(results.Status).toEqual({ passed: true, actual: 7, expected: 7, operator: '==' });
    });

    it('supports both operator styles', () => {
      const results = createEngine().assert(
        { pipe: '@status |!=| 500', bracket: '@status [!=] 500', fast: '@time [<] 500' },
        exchange(),
      );

      expect(results.pipe.passed).toBe(true);
      expect(results.bracket.passed).toBe(true);
      expect(results.fast.passed).toBe(true);
    });

    it('checks membership and substrings with contains', () => {
      const results = createEngine().assert(
        {
          tag: '@body jsonpath $.tags |contains| x',
          noTag: '@body jsonpath $.tags |!contains| z',
          text: '@body |contains| a@b.com',
        },
        exchange(),
      );

      expect(results.tag.passed).toBe(true);
      expect(results.noTag.passed).toBe(true);
      expect(results.text.passed).toBe(true);
    });

    it('fails contains on a number with a type mismatch reason', () => {
      const results = createEngine().assert({ c: '@body jsonpath $.id |contains| 7' }, exchange());

      expect(results.c).toEqual({
        passed: false,
        actual: 7,
        expected: '7',
        operator: 'contains',
        reason: 'type mismatch: contains needs a string or a list, got number',
      });
    });

    it('compares numerically and reports non-numeric operands', () => {
      const results = createEngine().assert(
        { numeric: '@body jsonpath $.count |>| 2', text: '@body jsonpath $.email |>| 3' },
        exchange(),
      );

      expect(results.numeric.passed).toBe(true);
      expect(results.text.passed).toBe(false);
      expect(results.text.reason).toBe('type mismatch: > needs numbers, got string and string');
    });

    it('resolves placeholders in the expected value', () => {
      const results = createEngine().assert(
        {
          id: '@body jsonpath $.id |==| ${expectedId}',
          domain: "@body jsonpath $.email |contains| '${domain}'",
        },
        exchange(),
      );

      expect(results.id).toEqual({ passed: true, actual: 7, expected: 7, operator: '==' });
      expect(results.domain.passed).toBe(true);
    });

    it('turns an unresolvable expected value into a failing record', () => {
      const results = createEngine().assert({ s: '@status |==| ${missing}' }, exchange());

      expect(results.s).toEqual({
        passed: false,
        actual: 200,
        expected: '${missing}',
        operator: '==',
        reason: 'Unresolved variable "${missing}" (at Asserts[@status |==| ${missing}])',
      });
    });

    it('turns a malformed expression into a failing record', () => {
      const results = createEngine().assert({ bad: '@nope |==| 1' }, exchange());

      expect(results.bad.passed).toBe(false);
      expect(results.bad.reason).toMatch(/^Unknown source in "@nope"/);
    });
  });
});
