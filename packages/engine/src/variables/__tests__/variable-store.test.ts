import { describe, it, expect } from 'vitest';
import { VariableStore, DEFAULT_PRECEDENCE } from '../variable-store.js';
import { PersistentVariables } from '../persistent-variables.js';
import { InMemoryVariableRepository } from '../repositories.js';

function persistent(initial: Record<string, string> = {}) {
  return new PersistentVariables(new InMemoryVariableRepository(initial));
}

describe('VariableStore', () => {
  describe('resolve', () => {
    it('returns the highest-precedence layer regardless of which was filled first', () => {
      const store = new VariableStore({
        define: { host: 'define.local' },
        persistent: persistent({ host: 'persisted.local' }),
        configs: [{ host: 'config.local' }],
        suite: { host: 'suite.local' },
        row: { host: 'row.local' },
        overrides: { host: 'override.local' },
      });

      expect(store.resolve('host')).toEqual({ found: true, value: 'override.local', layer: 'override' });
    });

    it('falls through each layer in default order', () => {
      const store = new VariableStore({
        define: { a: 'define', b: 'define', c: 'define', d: 'define', e: 'define', f: 'define' },
        persistent: persistent({ a: 'persistent', b: 'persistent', c: 'persistent', d: 'persistent', e: 'persistent' }),
        configs: [{ a: 'config', b: 'config', c: 'config', d: 'config' }],
        suite: { a: 'suite', b: 'suite', c: 'suite' },
        row: { a: 'row', b: 'row' },
        overrides: { a: 'override' },
      });

      expect(store.get('a')).toBe('override');
      expect(store.get('b')).toBe('row');
      expect(store.get('c')).toBe('suite');
      expect(store.get('d')).toBe('config');
      expect(store.get('e')).toBe('persistent');
      expect(store.get('f')).toBe('define');
    });

    it('lets later configs win over earlier ones', () => {
      const store = new VariableStore({
        configs: [{ env: 'dev', region: 'eu' }, { env: 'staging' }],
        persistent: persistent(),
      });

      expect(store.get('env')).toBe('staging');
      expect(store.get('region')).toBe('eu');
    });

    it('reports a miss without throwing', () => {
      const store = new VariableStore({ persistent: persistent() });
      expect(store.resolve('nope')).toEqual({ found: false });
      expect(store.has('nope')).toBe(false);
      expect(store.get('nope')).toBeUndefined();
    });

    it('keeps null as a real value', () => {
      const store = new VariableStore({ suite: { token: null }, persistent: persistent({ token: 'old' }) });
      expect(store.resolve('token')).toEqual({ found: true, value: null, layer: 'suite' });
    });

    it('honours a custom precedence order', () => {
      const store = new VariableStore({
        row: { id: 'row' },
        persistent: persistent({ id: 'persisted' }),
        precedence: ['override', 'persistent', 'row', 'suite', 'config', 'define'],
      });

      expect(store.get('id')).toBe('persisted');
    });

    it('rejects a precedence order that drops or repeats a layer', () => {
      expect(
        () => new VariableStore({ persistent: persistent(), precedence: ['override', 'row', 'row'] }),
      ).toThrow(/Invalid variable precedence/);
    });
  });

  describe('set', () => {
    it('writes to the persistent layer by default', () => {
      const vars = persistent();
      const store = new VariableStore({ persistent: vars });

      store.set('token', 'abc');

      expect(vars.get('token')).toBe('abc');
      expect(vars.flush()).toBe(true);
      expect(store.resolve('token')).toEqual({ found: true, value: 'abc', layer: 'persistent' });
    });

    it('writes only the named layer', () => {
      const vars = persistent();
      const store = new VariableStore({ persistent: vars });

      store.set('local', 1, 'define');

      expect(store.resolve('local')).toEqual({ found: true, value: 1, layer: 'define' });
      expect(vars.has('local')).toBe(false);
    });
  });

  describe('fork', () => {
    it('replaces the row layer and shares the persistent one', () => {
      const vars = persistent();
      const base = new VariableStore({ suite: { base: 'yes' }, persistent: vars });

      const first = base.fork({ row: { user: 'ann' } });
      const second = base.fork({ row: { user: 'bob' } });
      first.set('captured', 'from-first');

      expect(first.get('user')).toBe('ann');
      expect(second.get('user')).toBe('bob');
      expect(second.get('captured')).toBe('from-first');
      expect(second.get('base')).toBe('yes');
      expect(base.has('user')).toBe(false);
    });

    it('keeps define writes local to the fork', () => {
      const base = new VariableStore({ persistent: persistent() });
      const request = base.fork({ define: {} });

      request.set('tmp', 'x', 'define');

      expect(request.get('tmp')).toBe('x');
      expect(base.has('tmp')).toBe(false);
    });
  });

  describe('snapshot', () => {
    it('maps every visible name to its winning value', () => {
      const store = new VariableStore({
        suite: { a: 'suite' },
        configs: [{ a: 'config', b: 'config-1' }, { b: 'config-2' }],
        persistent: persistent({ c: 'persisted' }),
        define: { c: 'define', d: 'define' },
      });

      expect(store.snapshot()).toEqual({ a: 'suite', b: 'config-2', c: 'persisted', d: 'define' });
    });
  });

  it('exposes the default precedence highest first', () => {
    expect(DEFAULT_PRECEDENCE).toEqual(['override', 'row', 'suite', 'config', 'persistent', 'define']);
  });
});
