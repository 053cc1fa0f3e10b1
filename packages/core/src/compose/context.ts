import type { AbsoluteBox, BoundingBox, UnitBox } from "../types/geometry.js";
import type { MeasureLike } from "../types/measure.js";
import { h, toMeasure, w } from "../types/measure.js";
import type {
  ContextNode,
  DeferredNode,
  EmptyNode,
  SceneNode,
} from "../types/scene.js";

export interface ContextOptions {
  units?: UnitBox;
  minWidth?: number;
  minHeight?: number;
}

export const EMPTY: EmptyNode = Object.freeze({ kind: "empty" });

/**
 * Create a context occupying a box of its parent. Defaults to the whole
 * parent box (0, 0, 1w, 1h).
 */
export function context(
  x0: MeasureLike = 0,
  y0: MeasureLike = 0,
  width: MeasureLike = w(1),
  height: MeasureLike = h(1),
  options: ContextOptions = {},
): ContextNode {
  return Object.freeze({
    kind: "context",
    box: boundingBox(x0, y0, width, height),
    unitBox: options.units,
    minWidth: options.minWidth,
    minHeight: options.minHeight,
    children: Object.freeze([]),
  });
}

export function boundingBox(
  x0: MeasureLike,
  y0: MeasureLike,
  width: MeasureLike,
  height: MeasureLike,
): BoundingBox {
  return Object.freeze({
    x0: toMeasure(x0),
    y0: toMeasure(y0),
    width: toMeasure(width),
    height: toMeasure(height),
  });
}

export function unitBox(
  x0: number,
  y0: number,
  width: number,
  height: number,
  fontSize?: number,
): UnitBox {
  return fontSize === undefined
    ? { x0, y0, width, height }
    : { x0, y0, width, height, fontSize };
}

export function deferred(
  build: (box: AbsoluteBox, units: UnitBox) => SceneNode,
): DeferredNode {
  return Object.freeze({ kind: "deferred", build });
}

/**
 * A child argument to `compose`: a node, or a list whose head is a context
 * and whose tail is composed into it first.
 */
export type Composable = SceneNode | readonly [ContextNode, ...Composable[]];

/**
 * Append children to a context. Returns a new context; the argument is left
 * untouched, so a context may be composed into several parents.
 */
export function compose(parent: ContextNode, ...children: Composable[]): ContextNode {
  const added: SceneNode[] = [];
  for (const child of children) {
    const node = toNode(child);
    if (node.kind !== "empty") added.push(node);
  }
  if (added.length === 0) return parent;

  return Object.freeze({
    ...parent,
    children: Object.freeze([...parent.children, ...added]),
  });
}

function toNode(child: Composable): SceneNode {
  if (isComposableList(child)) {
    const [head, ...rest] = child;
    return compose(head, ...rest);
  }
  return child;
}

function isComposableList(
  child: Composable,
): child is readonly [ContextNode, ...Composable[]] {
  return Array.isArray(child);
}

/** Copy of a context with a different box. */
export function withBox(ctx: ContextNode, box: BoundingBox): ContextNode {
  return Object.freeze({ ...ctx, box });
}
