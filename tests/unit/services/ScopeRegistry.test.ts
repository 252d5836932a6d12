/**
 * Scope Registry Tests
 */

import { describe, it, expect } from 'vitest';
import { ScopeRegistry } from '../../../src/services/ScopeRegistry.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

describe('ScopeRegistry', () => {
  it('runs tasks of one scope one at a time, in order', async () => {
    const registry = new ScopeRegistry<{ log: string[] }>();
    const context: { log: string[] } = { log: [] };
    registry.register('guild-1', context);
    const gate = deferred();

    const first = registry.run('guild-1', async (ctx) => {
      ctx.log.push('first:start');
      await gate.promise;
      ctx.log.push('first:end');
    });
    const second = registry.run('guild-1', async (ctx) => {
      ctx.log.push('second');
    });

    await Promise.resolve();
    await Promise.resolve();
    expect(context.log).toEqual(['first:start']);

    gate.resolve();
    await Promise.all([first, second]);
    expect(context.log).toEqual(['first:start', 'first:end', 'second']);
  });

  it('does not serialize different scopes against each other', async () => {
    const registry = new ScopeRegistry<string>();
    registry.register('a', 'scope-a');
    registry.register('b', 'scope-b');
    const gate = deferred();

    const blocked = registry.run('a', async () => {
      await gate.promise;
      return 'a';
    });

    await expect(registry.run('b', async (ctx) => ctx)).resolves.toBe('scope-b');

    gate.resolve();
    await expect(blocked).resolves.toBe('a');
  });

  it('keeps going after a failed task', async () => {
    const registry = new ScopeRegistry<number>();
    registry.register('guild-1', 1);

    const failing = registry.run('guild-1', async () => {
      throw new Error('boom');
    });
    const next = registry.run('guild-1', async (ctx) => ctx + 1);

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe(2);
  });

  it('rejects tasks for an unknown scope', async () => {
    const registry = new ScopeRegistry<number>();
    await expect(registry.run('missing', async () => 1)).rejects.toThrow('Unknown scope: missing');
  });

  it('replaces the context of a registered scope', () => {
    const registry = new ScopeRegistry<string>();
    registry.register('guild-1', 'old');
    registry.register('guild-1', 'new');

    expect(registry.get('guild-1')).toBe('new');
    expect(registry.scopeIds()).toEqual(['guild-1']);
    expect(registry.has('guild-2')).toBe(false);
  });
});
