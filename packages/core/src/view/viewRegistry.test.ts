import { describe, expect, it } from 'vitest';
import { createViewRegistry, viewTarget } from './viewRegistry';

describe('view/viewRegistry', () => {
  it('creates views with defaults', () => {
    const registry = createViewRegistry();
    const card = registry.add('card');

    expect(card.target).toBe('view:card');
    expect(registry.get('card')).toEqual({
      transform: { a: 1, b: 0, c: 0, d: 1, tx: 0, ty: 0 },
      backgroundColor: { r: 0, g: 0, b: 0, a: 0 },
      cornerRadius: 0,
      opacity: 1,
    });
    expect(registry.ids()).toEqual(['card']);
  });

  it('refuses duplicate ids', () => {
    const registry = createViewRegistry();
    registry.add('card');

    expect(() => registry.add('card')).toThrow(
      'View registry: view "card" already exists'
    );
  });

  it('exposes every numeric prop through the adapter', () => {
    const registry = createViewRegistry();
    registry.add('card', { backgroundColor: '#336699', cornerRadius: 4 });

    expect(registry.adapter.get(viewTarget('card'), 'backgroundColor.g')).toBe(
      0x66
    );
    registry.adapter.set(viewTarget('card'), 'transform.tx', 12);
    registry.adapter.set(viewTarget('card'), 'opacity', 1.5);
    registry.adapter.set(viewTarget('card'), 'cornerRadius', -3);

    expect(registry.get('card')?.transform.tx).toBe(12);
    expect(registry.get('card')?.opacity).toBe(1);
    expect(registry.get('card')?.cornerRadius).toBe(0);
  });

  it('hands out handles that go dead with the view', () => {
    const registry = createViewRegistry();
    const card = registry.add('card');
    const again = registry.handle('card');

    card.write('opacity', 0.5);
    expect(again.read('opacity')).toBe(0.5);

    expect(registry.remove('card')).toBe(true);
    expect(card.isAlive()).toBe(false);
    expect(card.read('opacity')).toBeUndefined();
    expect(() => card.write('opacity', 1)).not.toThrow();
    expect(registry.remove('card')).toBe(false);
  });

  it('does not share the initial transform', () => {
    const registry = createViewRegistry();
    const transform = { a: 1, b: 0, c: 0, d: 1, tx: 3, ty: 4 };
    const card = registry.add('card', { transform });

    card.write('transform.tx', 50);

    expect(transform.tx).toBe(3);
  });
});
