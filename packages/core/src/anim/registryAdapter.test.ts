import { describe, expect, it, vi } from 'vitest';
import { createRegistryAdapter } from './registryAdapter';

type Item = { x: number; y: number };

function isItem(el: unknown): el is Item {
  return typeof el === 'object' && el !== null && 'x' in el && 'y' in el;
}

function setup() {
  const items = new Map<string, Item>([['a', { x: 1, y: 2 }]]);
  const flush = vi.fn();
  const adapter = createRegistryAdapter({ flush });
  adapter
    .kind('item', (id) => items.get(id))
    .prop('x', {
      get: (el) => (isItem(el) ? el.x : undefined),
      set: (el, v) => {
        if (isItem(el)) el.x = v;
      },
    })
    .prop('y', {
      get: (el) => (isItem(el) ? el.y : undefined),
      set: (el, v) => {
        if (isItem(el)) el.y = v;
      },
    });
  return { items, adapter, flush };
}

describe('anim/registryAdapter', () => {
  it('reads and writes registered props through the kind resolver', () => {
    const { items, adapter } = setup();

    expect(adapter.get('item:a', 'x')).toBe(1);
    adapter.set('item:a', 'x', 40);
    expect(items.get('a')).toEqual({ x: 40, y: 2 });
  });

  it('treats unknown targets, kinds and props as absent', () => {
    const { adapter } = setup();

    expect(adapter.has('item:a')).toBe(true);
    expect(adapter.has('item:missing')).toBe(false);
    expect(adapter.has('shape:a')).toBe(false);
    expect(adapter.get('item:missing', 'x')).toBeUndefined();
    expect(adapter.get('item:a', 'z')).toBeUndefined();
    expect(() => adapter.set('item:missing', 'x', 1)).not.toThrow();
  });

  it('goes dead when the owner drops the target', () => {
    const { items, adapter } = setup();
    const removed = items.get('a');
    items.delete('a');

    adapter.set('item:a', 'x', 99);

    expect(adapter.has('item:a')).toBe(false);
    expect(removed).toEqual({ x: 1, y: 2 });
  });

  it('refuses to rebind a kind to another resolver', () => {
    const { adapter } = setup();

    expect(() => adapter.kind('item', () => undefined)).toThrow(
      'Animation adapter: kind "item" already registered with a different resolver'
    );
    expect(() => adapter.kind('shape')).toThrow(
      'Animation adapter: kind "shape" is not registered yet'
    );
    expect(() => adapter.kind('item')).not.toThrow();
  });

  it('records the first and last value of every changed prop', () => {
    const { items, adapter } = setup();

    const changes = adapter.record(() => {
      adapter.set('item:a', 'x', 5);
      adapter.set('item:a', 'x', 7);
      adapter.set('item:a', 'y', 2);
    });

    expect(changes).toEqual([{ target: 'item:a', prop: 'x', from: 1, to: 7 }]);
    expect(items.get('a')).toEqual({ x: 7, y: 2 });
  });

  it('stops recording once the effect throws', () => {
    const { adapter } = setup();

    expect(() =>
      adapter.record(() => {
        throw new Error('boom');
      })
    ).toThrow('boom');

    const changes = adapter.record(() => {
      adapter.set('item:a', 'y', 3);
    });
    expect(changes).toEqual([{ target: 'item:a', prop: 'y', from: 2, to: 3 }]);
  });

  it('exposes the flush callback', () => {
    const { adapter, flush } = setup();

    adapter.flush?.();

    expect(flush).toHaveBeenCalledTimes(1);
  });
});
