/** 2D affine matrix; maps (x, y) to (a·x + c·y + tx, b·x + d·y + ty). */
export type Affine = {
  a: number;
  b: number;
  c: number;
  d: number;
  tx: number;
  ty: number;
};

/** Channels r, g, b in 0..255 and alpha in 0..1. */
export type Rgba = { r: number; g: number; b: number; a: number };

export interface ViewState {
  transform: Affine;
  backgroundColor: Rgba;
  cornerRadius: number;
  opacity: number;
}

export type ViewTarget = `view:${string}`;

export type ViewProp =
  | `transform.${keyof Affine}`
  | `backgroundColor.${keyof Rgba}`
  | 'cornerRadius'
  | 'opacity';

/**
 * Non-owning reference to a view held by a registry. Reads return
 * `undefined` and writes do nothing once the view has been removed.
 */
export interface ViewHandle {
  readonly id: string;
  readonly target: ViewTarget;
  isAlive(): boolean;
  read(prop: ViewProp): number | undefined;
  write(prop: ViewProp, value: number): void;
}
