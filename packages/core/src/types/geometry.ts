import type { Measure } from "./measure.js";

// ---- Points and boxes ----

export interface Point {
  readonly x: Measure;
  readonly y: Measure;
}

/** Box of a context, expressed relative to its parent. */
export interface BoundingBox {
  x0: Measure;
  y0: Measure;
  width: Measure;
  height: Measure;
}

/** Resolved box in millimetres. */
export interface AbsoluteBox {
  x0: number;
  y0: number;
  width: number;
  height: number;
}

/**
 * Coordinate frame for `cx`/`cy` measures. The box spans `x0..x0+width`
 * horizontally and `y0..y0+height` vertically. `fontSize` (mm) is the size
 * of one `em`.
 */
export interface UnitBox {
  x0: number;
  y0: number;
  width: number;
  height: number;
  fontSize?: number;
}

export interface AbsolutePoint {
  x: number;
  y: number;
}

export type Axis = "x" | "y";

// ---- Alignment and stroke enums ----

export type HAlign = "left" | "center" | "right";
export type VAlign = "top" | "center" | "bottom";
export type LineCap = "butt" | "square" | "round";
export type LineJoin = "miter" | "round" | "bevel";

/** CSS colour string, or null for "none". */
export type Color = string | null;
