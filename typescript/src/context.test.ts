import { describe, it, expect } from 'vitest';
import { SerdeContext } from './context';
import { createLogger } from './logger';

describe('SerdeContext', () => {
  it('tracks the path of nested steps', () => {
    const ctx = new SerdeContext(createLogger('test', 'silent'));
    expect(ctx.path()).toBe('$');
    const inner = ctx.within('items', () => ctx.within(3, () => ctx.path()));
    expect(inner).toBe('$.items[3]');
    expect(ctx.path()).toBe('$');
  });

  it('unwinds the path when a step throws', () => {
    const ctx = new SerdeContext(createLogger('test', 'silent'));
    expect(() =>
      ctx.within('a', () =>
        ctx.within('b', () => {
          throw new Error('boom');
        })
      )
    ).toThrow('boom');
    expect(ctx.path()).toBe('$');
  });
});
