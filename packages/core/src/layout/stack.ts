import { boundingBox, compose, context, withBox } from "../compose/context.js";
import { ConfigurationError } from "../errors.js";
import type { MeasureLike } from "../types/measure.js";
import { add, h, scale, sub, w } from "../types/measure.js";
import type { ContextNode } from "../types/scene.js";

export interface StackOptions {
  /** Relative share of each slot. Defaults to equal shares. */
  proportions?: readonly number[];
}

function shares(count: number, options: StackOptions): number[] {
  const proportions = options.proportions ?? new Array<number>(count).fill(1);
  if (proportions.length !== count) {
    throw new ConfigurationError(
      `Stack of ${count} context(s) given ${proportions.length} proportion(s)`,
    );
  }
  const total = proportions.reduce((sum, p) => sum + p, 0);
  if (total <= 0 || proportions.some((p) => p < 0)) {
    throw new ConfigurationError("Stack proportions must be non-negative with a positive sum");
  }
  return proportions.map((p) => p / total);
}

function sumOf(values: (number | undefined)[]): number | undefined {
  return values.some((v) => v !== undefined)
    ? values.reduce<number>((sum, v) => sum + (v ?? 0), 0)
    : undefined;
}

function maxOf(values: (number | undefined)[]): number | undefined {
  const defined = values.filter((v): v is number => v !== undefined);
  return defined.length > 0 ? Math.max(...defined) : undefined;
}

/**
 * Place contexts side by side, each in a slot spanning the full height.
 * Each context keeps its own box, relative to its slot.
 */
export function hstack(
  contexts: readonly ContextNode[],
  options: StackOptions = {},
): ContextNode {
  if (contexts.length === 0) return context();
  const fractions = shares(contexts.length, options);
  let offset = 0;
  const slots = contexts.map((child, i) => {
    const slot = compose(context(w(offset), 0, w(fractions[i]), h(1)), child);
    offset += fractions[i];
    return slot;
  });

  const root = context(0, 0, w(1), h(1), {
    minWidth: sumOf(contexts.map((c) => c.minWidth)),
    minHeight: maxOf(contexts.map((c) => c.minHeight)),
  });
  return compose(root, ...slots);
}

/**
 * Place contexts one above the other, each in a slot spanning the full width.
 */
export function vstack(
  contexts: readonly ContextNode[],
  options: StackOptions = {},
): ContextNode {
  if (contexts.length === 0) return context();
  const fractions = shares(contexts.length, options);
  let offset = 0;
  const slots = contexts.map((child, i) => {
    const slot = compose(context(0, h(offset), w(1), h(fractions[i])), child);
    offset += fractions[i];
    return slot;
  });

  const root = context(0, 0, w(1), h(1), {
    minWidth: maxOf(contexts.map((c) => c.minWidth)),
    minHeight: sumOf(contexts.map((c) => c.minHeight)),
  });
  return compose(root, ...slots);
}

/** Arrange a rectangular grid of contexts in equal cells. */
export function gridstack(rows: readonly (readonly ContextNode[])[]): ContextNode {
  if (rows.length === 0) return context();
  const columns = rows[0]?.length ?? 0;
  if (rows.some((row) => row.length !== columns)) {
    throw new ConfigurationError("gridstack needs every row to have the same number of contexts");
  }
  return vstack(rows.map((row) => hstack(row)));
}

/**
 * Grow a context's box by the padding on each side and keep the original
 * content at its original size inside.
 */
export function padOuter(
  ctx: ContextNode,
  xPadding: MeasureLike,
  yPadding: MeasureLike = xPadding,
): ContextNode {
  const root = context(
    ctx.box.x0,
    ctx.box.y0,
    add(ctx.box.width, scale(xPadding, 2)),
    add(ctx.box.height, scale(yPadding, 2)),
    { minWidth: ctx.minWidth, minHeight: ctx.minHeight },
  );
  return compose(root, withBox(ctx, insetBox(xPadding, yPadding)));
}

/**
 * Keep a context's box and shrink its content by the padding on each side.
 */
export function padInner(
  ctx: ContextNode,
  xPadding: MeasureLike,
  yPadding: MeasureLike = xPadding,
): ContextNode {
  const root = context(ctx.box.x0, ctx.box.y0, ctx.box.width, ctx.box.height, {
    minWidth: ctx.minWidth,
    minHeight: ctx.minHeight,
  });
  return compose(root, withBox(ctx, insetBox(xPadding, yPadding)));
}

export const pad = padOuter;

function insetBox(xPadding: MeasureLike, yPadding: MeasureLike) {
  return boundingBox(
    xPadding,
    yPadding,
    sub(w(1), scale(xPadding, 2)),
    sub(h(1), scale(yPadding, 2)),
  );
}
