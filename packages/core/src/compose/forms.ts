import type { HAlign, Point, VAlign } from "../types/geometry.js";
import type { MeasureLike } from "../types/measure.js";
import { add, h, toMeasure, w } from "../types/measure.js";
import type { FormNode, Shape } from "../types/scene.js";

export type PointLike = Point | readonly [MeasureLike, MeasureLike];

export function point(x: MeasureLike, y: MeasureLike): Point {
  return Object.freeze({ x: toMeasure(x), y: toMeasure(y) });
}

function toPoint(p: PointLike): Point {
  return isPointTuple(p) ? point(p[0], p[1]) : p;
}

function isPointTuple(p: PointLike): p is readonly [MeasureLike, MeasureLike] {
  return Array.isArray(p);
}

/**
 * A form holding a batch of shapes. The batch and every shape in it are
 * frozen, so one form can be composed into several parents.
 */
export function form(primitives: readonly Shape[]): FormNode {
  return Object.freeze({
    kind: "form",
    primitives: Object.freeze(primitives.map(freezeShape)),
  });
}

function freezeShape(shape: Shape): Shape {
  switch (shape.kind) {
    case "polygon":
    case "lines":
      return Object.freeze({ ...shape, points: Object.freeze(shape.points.map(freezePoint)) });
    case "ellipse":
      return Object.freeze({
        ...shape,
        center: freezePoint(shape.center),
        xPoint: freezePoint(shape.xPoint),
        yPoint: freezePoint(shape.yPoint),
      });
    case "curve":
      return Object.freeze({
        ...shape,
        anchor0: freezePoint(shape.anchor0),
        ctrl0: freezePoint(shape.ctrl0),
        ctrl1: freezePoint(shape.ctrl1),
        anchor1: freezePoint(shape.anchor1),
      });
    case "rectangle":
    case "bitmap":
      return Object.freeze({ ...shape, corner: freezePoint(shape.corner) });
    case "circle":
      return Object.freeze({ ...shape, center: freezePoint(shape.center) });
    case "text":
      return Object.freeze({ ...shape, position: freezePoint(shape.position) });
  }
}

export function freezePoint(p: Point): Point {
  return Object.isFrozen(p) ? p : Object.freeze({ x: p.x, y: p.y });
}

// ---- Rectangles ----

export interface RectangleItem {
  x: MeasureLike;
  y: MeasureLike;
  width: MeasureLike;
  height: MeasureLike;
}

function rectangleShape(item: RectangleItem): Shape {
  return {
    kind: "rectangle",
    corner: point(item.x, item.y),
    width: toMeasure(item.width),
    height: toMeasure(item.height),
  };
}

/** Defaults to the whole context box. */
export function rectangle(
  x: MeasureLike = 0,
  y: MeasureLike = 0,
  width: MeasureLike = w(1),
  height: MeasureLike = h(1),
): FormNode {
  return form([rectangleShape({ x, y, width, height })]);
}

export function rectangles(items: readonly RectangleItem[]): FormNode {
  return form(items.map(rectangleShape));
}

// ---- Circles and ellipses ----

export interface CircleItem {
  x: MeasureLike;
  y: MeasureLike;
  r: MeasureLike;
}

function circleShape(item: CircleItem): Shape {
  return { kind: "circle", center: point(item.x, item.y), radius: toMeasure(item.r) };
}

export function circle(
  x: MeasureLike = w(0.5),
  y: MeasureLike = h(0.5),
  r: MeasureLike = w(0.5),
): FormNode {
  return form([circleShape({ x, y, r })]);
}

export function circles(items: readonly CircleItem[]): FormNode {
  return form(items.map(circleShape));
}

export interface EllipseItem {
  x: MeasureLike;
  y: MeasureLike;
  rx: MeasureLike;
  ry: MeasureLike;
}

function ellipseShape(item: EllipseItem): Shape {
  const center = point(item.x, item.y);
  return {
    kind: "ellipse",
    center,
    xPoint: { x: add(center.x, item.rx), y: center.y },
    yPoint: { x: center.x, y: add(center.y, item.ry) },
  };
}

/** Axis-aligned ellipse. */
export function ellipse(
  x: MeasureLike = w(0.5),
  y: MeasureLike = h(0.5),
  rx: MeasureLike = w(0.5),
  ry: MeasureLike = h(0.5),
): FormNode {
  return form([ellipseShape({ x, y, rx, ry })]);
}

export function ellipses(items: readonly EllipseItem[]): FormNode {
  return form(items.map(ellipseShape));
}

// ---- Paths ----

/** One polygon per point list. */
export function polygon(...pointLists: readonly PointLike[][]): FormNode {
  return form(
    pointLists.map((points): Shape => ({ kind: "polygon", points: points.map(toPoint) })),
  );
}

/**
 * One open path per point list. A point with a non-finite coordinate lifts
 * the pen.
 */
export function lines(...pointLists: readonly PointLike[][]): FormNode {
  return form(
    pointLists.map((points): Shape => ({ kind: "lines", points: points.map(toPoint) })),
  );
}

export function curve(
  anchor0: PointLike,
  ctrl0: PointLike,
  ctrl1: PointLike,
  anchor1: PointLike,
): FormNode {
  return form([
    {
      kind: "curve",
      anchor0: toPoint(anchor0),
      ctrl0: toPoint(ctrl0),
      ctrl1: toPoint(ctrl1),
      anchor1: toPoint(anchor1),
    },
  ]);
}

// ---- Text and bitmaps ----

export interface TextItem {
  x: MeasureLike;
  y: MeasureLike;
  value: string;
  halign?: HAlign;
  valign?: VAlign;
  rotation?: number;
}

function textShape(item: TextItem): Shape {
  return {
    kind: "text",
    position: point(item.x, item.y),
    value: item.value,
    halign: item.halign ?? "left",
    valign: item.valign ?? "bottom",
    rotation: item.rotation ?? 0,
  };
}

export function text(
  x: MeasureLike,
  y: MeasureLike,
  value: string,
  halign: HAlign = "left",
  valign: VAlign = "bottom",
  rotation = 0,
): FormNode {
  return form([textShape({ x, y, value, halign, valign, rotation })]);
}

export function texts(items: readonly TextItem[]): FormNode {
  return form(items.map(textShape));
}

export function bitmap(
  mime: string,
  data: Uint8Array,
  x: MeasureLike,
  y: MeasureLike,
  width: MeasureLike,
  height: MeasureLike,
): FormNode {
  return form([
    {
      kind: "bitmap",
      corner: point(x, y),
      width: toMeasure(width),
      height: toMeasure(height),
      mime,
      data,
    },
  ]);
}
