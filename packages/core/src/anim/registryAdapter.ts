import type {
  AnimationTarget,
  PropHandlers,
  PropReader,
  PropertyChange,
  PropWriter,
  RecordableAdapter,
} from './adapter';

type TargetResolver = (id: string) => unknown | undefined;

export type KindHandle = {
  prop(propName: string, handlers: PropHandlers): KindHandle;
};

export type RegistryAdapter = RecordableAdapter & {
  kind(kindName: string, resolver?: TargetResolver): KindHandle;
};

type Recording = Map<
  string,
  { target: AnimationTarget; prop: string; from: number; to: number }
>;

export function createRegistryAdapter(opts: {
  flush?: () => void;
}): RegistryAdapter {
  const { flush } = opts;

  const targetResolvers = new Map<string, TargetResolver>();
  const kindHandles = new Map<string, KindHandle>();
  const readersByKind = new Map<string, Map<string, PropReader>>();
  const writersByKind = new Map<string, Map<string, PropWriter>>();

  let recording: Recording | null = null;

  function register(kind: string, prop: string, handlers: PropHandlers) {
    if (handlers.get) {
      const readers = readersByKind.get(kind) ?? new Map<string, PropReader>();
      readers.set(prop, handlers.get);
      readersByKind.set(kind, readers);
    }
    if (handlers.set) {
      const writers = writersByKind.get(kind) ?? new Map<string, PropWriter>();
      writers.set(prop, handlers.set);
      writersByKind.set(kind, writers);
    }
  }

  function handleFor(kindName: string): KindHandle {
    const existing = kindHandles.get(kindName);
    if (existing) return existing;
    const handle: KindHandle = {
      prop(propName, handlers) {
        register(kindName, propName, handlers);
        return handle;
      },
    };
    kindHandles.set(kindName, handle);
    return handle;
  }

  function kind(kindName: string, resolver?: TargetResolver): KindHandle {
    const existingResolver = targetResolvers.get(kindName);
    if (existingResolver) {
      if (resolver && resolver !== existingResolver) {
        throw new Error(
          `Animation adapter: kind "${kindName}" already registered with a different resolver`
        );
      }
      return handleFor(kindName);
    }

    if (!resolver) {
      throw new Error(
        `Animation adapter: kind "${kindName}" is not registered yet`
      );
    }

    targetResolvers.set(kindName, resolver);
    return handleFor(kindName);
  }

  function resolve(
    target: AnimationTarget
  ): { kind: string; el: unknown } | undefined {
    const idx = target.indexOf(':');
    if (idx === -1) return undefined;
    const kind = target.slice(0, idx);
    const id = target.slice(idx + 1);
    const r = targetResolvers.get(kind);
    if (!r) return undefined;
    const el = r(id);
    if (el === undefined) return undefined;
    return { kind, el };
  }

  function has(target: AnimationTarget): boolean {
    return resolve(target) !== undefined;
  }

  function get(target: AnimationTarget, prop: string): number | undefined {
    const resolved = resolve(target);
    if (!resolved) return undefined;
    const reader = readersByKind.get(resolved.kind)?.get(prop);
    return reader ? reader(resolved.el) : undefined;
  }

  function set(target: AnimationTarget, prop: string, value: number): void {
    const resolved = resolve(target);
    if (!resolved) return;
    const writer = writersByKind.get(resolved.kind)?.get(prop);
    if (!writer) return;

    if (recording) {
      const key = `${target}|${prop}`;
      const entry = recording.get(key);
      if (entry) {
        entry.to = value;
      } else {
        const before = get(target, prop);
        recording.set(key, {
          target,
          prop,
          from: before ?? value,
          to: value,
        });
      }
    }

    writer(resolved.el, value);
  }

  function record(effect: () => void): PropertyChange[] {
    const outer = recording;
    const current: Recording = new Map();
    recording = current;
    try {
      effect();
    } finally {
      recording = outer;
    }

    const changes: PropertyChange[] = [];
    for (const [key, change] of current) {
      // A nested recording also counts towards the enclosing one.
      if (outer) {
        const prior = outer.get(key);
        if (prior) prior.to = change.to;
        else outer.set(key, { ...change });
      }
      if (change.from !== change.to) changes.push({ ...change });
    }
    return changes;
  }

  return {
    get,
    set,
    has,
    flush,
    kind,
    record,
  };
}
