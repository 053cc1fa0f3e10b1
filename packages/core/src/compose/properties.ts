import { PropertyBatchError } from "../errors.js";
import type { Color, LineCap, LineJoin } from "../types/geometry.js";
import type { MeasureLike } from "../types/measure.js";
import { toMeasure } from "../types/measure.js";
import type { PropertyNode, PropertyValue } from "../types/scene.js";
import type { PointLike } from "./forms.js";
import { freezePoint, point } from "./forms.js";

type OneOrMany<T> = T | readonly T[];

function many<T>(value: OneOrMany<T>): readonly T[] {
  return isList(value) ? value : [value];
}

function isList<T>(value: OneOrMany<T>): value is readonly T[] {
  return Array.isArray(value);
}

/**
 * Channel a property value writes to. Custom attributes each get their own
 * channel so that two different attributes never shadow each other.
 */
export function channelOf(value: { kind: string; name?: string }): string {
  return value.kind === "svgAttribute" ? `svgAttribute:${value.name ?? ""}` : value.kind;
}

/**
 * Create a property batch. Every value must write to the same channel.
 * One value applies to a whole form; N values are distributed over a form
 * of N primitives.
 */
export function property(values: readonly PropertyValue[]): PropertyNode {
  const [first] = values;
  if (first === undefined) {
    throw new PropertyBatchError("A property batch needs at least one value");
  }
  const channel = channelOf(first);
  for (const value of values) {
    const other = channelOf(value);
    if (other !== channel) {
      throw new PropertyBatchError(
        `A property batch holds one channel, found "${channel}" and "${other}"`,
      );
    }
  }
  return Object.freeze({
    kind: "property",
    channel,
    primitives: Object.freeze(values.map(freezeValue)),
  });
}

function freezeValue(value: PropertyValue): PropertyValue {
  switch (value.kind) {
    case "clip":
      return Object.freeze({ ...value, points: Object.freeze(value.points.map(freezePoint)) });
    case "strokeDash":
      return Object.freeze({ ...value, pattern: Object.freeze([...value.pattern]) });
    default:
      return Object.freeze({ ...value });
  }
}

export function isScalarProperty(node: { primitives: readonly unknown[] }): boolean {
  return node.primitives.length === 1;
}

// ---- Colour and stroke ----

export function stroke(colors: OneOrMany<Color>): PropertyNode {
  return property(many(colors).map((color): PropertyValue => ({ kind: "stroke", color })));
}

export function fill(colors: OneOrMany<Color>): PropertyNode {
  return property(many(colors).map((color): PropertyValue => ({ kind: "fill", color })));
}

export function lineWidth(widths: OneOrMany<MeasureLike>): PropertyNode {
  return property(
    many(widths).map((value): PropertyValue => ({ kind: "lineWidth", value: toMeasure(value) })),
  );
}

/** One dash pattern per argument; several arguments make a vector property. */
export function strokeDash(...patterns: readonly MeasureLike[][]): PropertyNode {
  return property(
    patterns.map(
      (pattern): PropertyValue => ({ kind: "strokeDash", pattern: pattern.map(toMeasure) }),
    ),
  );
}

export function lineCap(caps: OneOrMany<LineCap>): PropertyNode {
  return property(many(caps).map((value): PropertyValue => ({ kind: "lineCap", value })));
}

export function lineJoin(joins: OneOrMany<LineJoin>): PropertyNode {
  return property(many(joins).map((value): PropertyValue => ({ kind: "lineJoin", value })));
}

export function fillOpacity(values: OneOrMany<number>): PropertyNode {
  return property(many(values).map((value): PropertyValue => ({ kind: "fillOpacity", value })));
}

export function strokeOpacity(values: OneOrMany<number>): PropertyNode {
  return property(
    many(values).map((value): PropertyValue => ({ kind: "strokeOpacity", value })),
  );
}

export function visible(values: OneOrMany<boolean>): PropertyNode {
  return property(many(values).map((value): PropertyValue => ({ kind: "visible", value })));
}

/** One clip polygon per point list. */
export function clip(...pointLists: readonly PointLike[][]): PropertyNode {
  return property(
    pointLists.map(
      (points): PropertyValue => ({
        kind: "clip",
        points: points.map((p) => (isPointTuple(p) ? point(p[0], p[1]) : p)),
      }),
    ),
  );
}

function isPointTuple(p: PointLike): p is readonly [MeasureLike, MeasureLike] {
  return Array.isArray(p);
}

// ---- Text ----

export function font(families: OneOrMany<string>): PropertyNode {
  return property(many(families).map((family): PropertyValue => ({ kind: "font", family })));
}

export function fontSize(sizes: OneOrMany<MeasureLike>): PropertyNode {
  return property(
    many(sizes).map((value): PropertyValue => ({ kind: "fontSize", value: toMeasure(value) })),
  );
}

// ---- Markup attributes and scripts ----

export function svgId(ids: OneOrMany<string>): PropertyNode {
  return property(many(ids).map((value): PropertyValue => ({ kind: "svgId", value })));
}

export function svgClass(classes: OneOrMany<string>): PropertyNode {
  return property(many(classes).map((value): PropertyValue => ({ kind: "svgClass", value })));
}

/** XML attribute name, optionally prefixed (`data-x`, `xml:space`). */
export const ATTRIBUTE_NAME = /^[A-Za-z_][A-Za-z0-9_.-]*(?::[A-Za-z_][A-Za-z0-9_.-]*)?$/;

function attributeName(name: string, what: string): string {
  if (!ATTRIBUTE_NAME.test(name)) {
    throw new PropertyBatchError(`"${name}" is not a valid ${what}`);
  }
  return name;
}

export function svgAttribute(name: string, values: OneOrMany<string>): PropertyNode {
  attributeName(name, "attribute name");
  return property(
    many(values).map((value): PropertyValue => ({ kind: "svgAttribute", name, value })),
  );
}

/** Attach script code to an element event, e.g. `jsCall("onclick", "...")`. */
export function jsCall(event: string, codes: OneOrMany<string>): PropertyNode {
  attributeName(event, "event name");
  return property(many(codes).map((code): PropertyValue => ({ kind: "jsCall", event, code })));
}

/** Make a script library available to the document. */
export function jsInclude(source: string, code?: string): PropertyNode {
  return property([{ kind: "jsInclude", source, code }]);
}
