import type {
  AbsoluteBox,
  BoundingBox,
  Color,
  HAlign,
  LineCap,
  LineJoin,
  Point,
  UnitBox,
  VAlign,
} from "./geometry.js";
import type { Measure } from "./measure.js";

// ---- Shapes ----

export interface RectangleShape {
  readonly kind: "rectangle";
  readonly corner: Point;
  readonly width: Measure;
  readonly height: Measure;
}

export interface CircleShape {
  readonly kind: "circle";
  readonly center: Point;
  readonly radius: Measure;
}

/** `xPoint` and `yPoint` are the ends of the two semi-axes. */
export interface EllipseShape {
  readonly kind: "ellipse";
  readonly center: Point;
  readonly xPoint: Point;
  readonly yPoint: Point;
}

export interface PolygonShape {
  readonly kind: "polygon";
  readonly points: readonly Point[];
}

export interface LinesShape {
  readonly kind: "lines";
  readonly points: readonly Point[];
}

export interface CurveShape {
  readonly kind: "curve";
  readonly anchor0: Point;
  readonly ctrl0: Point;
  readonly ctrl1: Point;
  readonly anchor1: Point;
}

export interface TextShape {
  readonly kind: "text";
  readonly position: Point;
  readonly value: string;
  readonly halign: HAlign;
  readonly valign: VAlign;
  /** Degrees, clockwise. */
  readonly rotation: number;
}

export interface BitmapShape {
  readonly kind: "bitmap";
  readonly corner: Point;
  readonly width: Measure;
  readonly height: Measure;
  readonly mime: string;
  readonly data: Uint8Array;
}

export type Shape =
  | RectangleShape
  | CircleShape
  | EllipseShape
  | PolygonShape
  | LinesShape
  | CurveShape
  | TextShape
  | BitmapShape;

export type ShapeKind = Shape["kind"];

// ---- Property values ----

export type PropertyValue =
  | { readonly kind: "stroke"; readonly color: Color }
  | { readonly kind: "fill"; readonly color: Color }
  | { readonly kind: "lineWidth"; readonly value: Measure }
  | { readonly kind: "strokeDash"; readonly pattern: readonly Measure[] }
  | { readonly kind: "lineCap"; readonly value: LineCap }
  | { readonly kind: "lineJoin"; readonly value: LineJoin }
  | { readonly kind: "fillOpacity"; readonly value: number }
  | { readonly kind: "strokeOpacity"; readonly value: number }
  | { readonly kind: "visible"; readonly value: boolean }
  | { readonly kind: "clip"; readonly points: readonly Point[] }
  | { readonly kind: "font"; readonly family: string }
  | { readonly kind: "fontSize"; readonly value: Measure }
  | { readonly kind: "svgId"; readonly value: string }
  | { readonly kind: "svgClass"; readonly value: string }
  | { readonly kind: "svgAttribute"; readonly name: string; readonly value: string }
  | { readonly kind: "jsCall"; readonly event: string; readonly code: string }
  | { readonly kind: "jsInclude"; readonly source: string; readonly code?: string };

export type PropertyKind = PropertyValue["kind"];

// ---- Scene nodes ----

export interface ContextNode {
  kind: "context";
  box: BoundingBox;
  /** Absent: inherit the parent's unit box unchanged. */
  unitBox?: UnitBox;
  minWidth?: number;
  minHeight?: number;
  children: readonly SceneNode[];
}

export interface FormNode {
  readonly kind: "form";
  readonly primitives: readonly Shape[];
}

/**
 * A homogeneous batch of style values on one channel. One value applies to
 * every primitive it reaches; N values are distributed index by index.
 */
export interface PropertyNode {
  readonly kind: "property";
  readonly channel: string;
  readonly primitives: readonly PropertyValue[];
}

export interface EmptyNode {
  kind: "empty";
}

/** Subtree built during traversal from the parent's resolved box. */
export interface DeferredNode {
  kind: "deferred";
  build: (box: AbsoluteBox, units: UnitBox) => SceneNode;
}

export type SceneNode =
  | ContextNode
  | FormNode
  | PropertyNode
  | EmptyNode
  | DeferredNode;
