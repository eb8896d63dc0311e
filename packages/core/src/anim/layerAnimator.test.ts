import { describe, expect, it, vi } from 'vitest';
import { createLayerAnimator } from './layerAnimator';
import { createViewRegistry } from '../view/viewRegistry';
import { createManualFrames } from '../test/fixtures';

function setup() {
  const registry = createViewRegistry();
  const card = registry.add('card', { cornerRadius: 0 });
  const frames = createManualFrames();
  const animator = createLayerAnimator({ adapter: registry.adapter, frames });
  return { registry, card, frames, animator };
}

describe('anim/layerAnimator', () => {
  it('tweens one property and reports completion', () => {
    const { card, frames, animator } = setup();
    const onComplete = vi.fn();

    animator.animate(
      card.target,
      'cornerRadius',
      { to: 20, duration: 100, easing: 'linear' },
      onComplete
    );

    frames.advance(16);
    expect(card.read('cornerRadius')).toBe(0);

    frames.advance(50);
    expect(card.read('cornerRadius')).toBe(10);

    frames.advance(50);
    expect(card.read('cornerRadius')).toBe(20);
    expect(onComplete).toHaveBeenCalledTimes(1);
    expect(onComplete).toHaveBeenCalledWith(true);
  });

  it('uses an explicit starting value', () => {
    const { card, frames, animator } = setup();

    animator.animate(card.target, 'cornerRadius', {
      from: 10,
      to: 30,
      duration: 100,
      easing: 'linear',
    });
    frames.advance(16);
    frames.advance(50);

    expect(card.read('cornerRadius')).toBe(20);
  });

  it('reports an unfinished tween when the target disappears', () => {
    const { registry, card, frames, animator } = setup();
    const onComplete = vi.fn();

    animator.animate(
      card.target,
      'cornerRadius',
      { to: 20, duration: 100 },
      onComplete
    );
    frames.advance(16);
    registry.remove('card');
    frames.advance(16);

    expect(onComplete).toHaveBeenCalledWith(false);
    expect(frames.pending()).toBe(0);
  });

  it('stays quiet after cancel', () => {
    const { card, frames, animator } = setup();
    const onComplete = vi.fn();

    const cancel = animator.animate(
      card.target,
      'cornerRadius',
      { to: 20, duration: 100 },
      onComplete
    );
    frames.advance(16);
    cancel();
    frames.advance(200);

    expect(onComplete).not.toHaveBeenCalled();
    expect(frames.pending()).toBe(0);
  });

  it('lands a zero-length tween on the first frame', () => {
    const { card, frames, animator } = setup();
    const onComplete = vi.fn();

    animator.animate(
      card.target,
      'cornerRadius',
      { to: 8, duration: 0 },
      onComplete
    );
    frames.advance(16);

    expect(card.read('cornerRadius')).toBe(8);
    expect(onComplete).toHaveBeenCalledWith(true);
  });
});
