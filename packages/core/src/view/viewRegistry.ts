import {
  createRegistryAdapter,
  type RegistryAdapter,
} from '../anim/registryAdapter';
import { parseColor, type ColorInput } from './color';
import { IDENTITY } from './transform';
import type {
  Affine,
  Rgba,
  ViewHandle,
  ViewProp,
  ViewState,
  ViewTarget,
} from './types';

export type ViewInit = Partial<{
  transform: Affine;
  backgroundColor: ColorInput;
  cornerRadius: number;
  opacity: number;
}>;

export interface ViewRegistry {
  /** Property adapter for hosts and animators (target kind `view`). */
  readonly adapter: RegistryAdapter;
  add(id: string, init?: ViewInit): ViewHandle;
  /** Drops the view; handles to it go dead. */
  remove(id: string): boolean;
  get(id: string): Readonly<ViewState> | undefined;
  ids(): string[];
  handle(id: string): ViewHandle;
}

const AFFINE_KEYS: ReadonlyArray<keyof Affine> = [
  'a',
  'b',
  'c',
  'd',
  'tx',
  'ty',
];
const RGBA_KEYS: ReadonlyArray<keyof Rgba> = ['r', 'g', 'b', 'a'];

export function viewTarget(id: string): ViewTarget {
  return `view:${id}`;
}

function isViewState(el: unknown): el is ViewState {
  return typeof el === 'object' && el !== null && 'transform' in el;
}

/**
 * Externally owned store of views. Steps only ever see `ViewHandle`s, so a
 * removed view turns their effects into no-ops instead of dangling writes.
 */
export function createViewRegistry(opts?: {
  onFlush?: () => void;
}): ViewRegistry {
  const views = new Map<string, ViewState>();

  const adapter = createRegistryAdapter({ flush: opts?.onFlush });
  const view = adapter.kind('view', (id) => views.get(id));

  for (const key of AFFINE_KEYS) {
    view.prop(`transform.${key}`, {
      get: (el) => (isViewState(el) ? el.transform[key] : undefined),
      set: (el, v) => {
        if (isViewState(el)) el.transform[key] = v;
      },
    });
  }

  for (const key of RGBA_KEYS) {
    view.prop(`backgroundColor.${key}`, {
      get: (el) => (isViewState(el) ? el.backgroundColor[key] : undefined),
      set: (el, v) => {
        if (isViewState(el)) el.backgroundColor[key] = v;
      },
    });
  }

  view
    .prop('cornerRadius', {
      get: (el) => (isViewState(el) ? el.cornerRadius : undefined),
      set: (el, v) => {
        if (isViewState(el)) el.cornerRadius = Math.max(0, v);
      },
    })
    .prop('opacity', {
      get: (el) => (isViewState(el) ? el.opacity : undefined),
      set: (el, v) => {
        if (isViewState(el)) el.opacity = Math.min(1, Math.max(0, v));
      },
    });

  function handle(id: string): ViewHandle {
    const target = viewTarget(id);
    return {
      id,
      target,
      isAlive: () => views.has(id),
      read: (prop: ViewProp) => adapter.get(target, prop),
      write: (prop: ViewProp, value: number) =>
        adapter.set(target, prop, value),
    };
  }

  return {
    adapter,

    add(id, init) {
      if (views.has(id)) {
        throw new Error(`View registry: view "${id}" already exists`);
      }
      views.set(id, {
        transform: { ...(init?.transform ?? IDENTITY) },
        backgroundColor: parseColor(init?.backgroundColor ?? '#00000000'),
        cornerRadius: init?.cornerRadius ?? 0,
        opacity: init?.opacity ?? 1,
      });
      return handle(id);
    },

    remove(id) {
      return views.delete(id);
    },

    get(id) {
      return views.get(id);
    },

    ids() {
      return [...views.keys()];
    },

    handle,
  };
}
