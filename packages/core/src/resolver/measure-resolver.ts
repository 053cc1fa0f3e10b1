import { UnitResolutionError } from "../errors.js";
import type {
  AbsoluteBox,
  AbsolutePoint,
  Axis,
  BoundingBox,
  Point,
  UnitBox,
} from "../types/geometry.js";
import { formatMeasure } from "../parser/measure-parser.js";
import type { Measure, MeasureLike } from "../types/measure.js";
import { toMeasure } from "../types/measure.js";

export const DEFAULT_UNIT_BOX: UnitBox = { x0: 0, y0: 0, width: 1, height: 1 };

/** Millimetres per unit-box unit along an axis. */
function unitScale(box: AbsoluteBox, units: UnitBox, axis: Axis, m: Measure): number {
  const boxSize = axis === "x" ? box.width : box.height;
  const unitSize = axis === "x" ? units.width : units.height;
  if (unitSize === 0 || !Number.isFinite(unitSize)) {
    throw new UnitResolutionError(
      `Cannot resolve ${formatMeasure(m)}: unit box has ${axis === "x" ? "width" : "height"} ${unitSize}`,
    );
  }
  return boxSize / unitSize;
}

/**
 * Resolve a measure to a length in millimetres.
 *
 * Linear in the measure: resolving `a + b` equals resolving `a` plus
 * resolving `b`, and scaling a measure scales its resolution.
 */
export function resolveLength(
  value: MeasureLike,
  box: AbsoluteBox,
  units: UnitBox,
): number {
  const m = toMeasure(value);
  let result = m.abs;

  if (m.w !== 0 || m.h !== 0) {
    if (!Number.isFinite(box.width) || !Number.isFinite(box.height)) {
      throw new UnitResolutionError(
        `Cannot resolve ${formatMeasure(m)} against a box of unknown size`,
      );
    }
    result += m.w * box.width + m.h * box.height;
  }
  if (m.cx !== 0) result += m.cx * unitScale(box, units, "x", m);
  if (m.cy !== 0) result += m.cy * unitScale(box, units, "y", m);
  if (m.em !== 0) {
    if (units.fontSize === undefined) {
      throw new UnitResolutionError(
        `Cannot resolve ${formatMeasure(m)}: no font size is known in this context`,
      );
    }
    result += m.em * units.fontSize;
  }

  return result;
}

/**
 * Resolve a measure as a coordinate along an axis. The box origin and the
 * unit box origin translate the whole frame.
 */
export function resolvePosition(
  value: MeasureLike,
  box: AbsoluteBox,
  units: UnitBox,
  axis: Axis,
): number {
  const m = toMeasure(value);
  const origin = axis === "x" ? box.x0 : box.y0;
  const unitOrigin = axis === "x" ? units.x0 : units.y0;
  const offset = unitOrigin === 0 ? 0 : unitOrigin * unitScale(box, units, axis, m);
  return origin + resolveLength(m, box, units) - offset;
}

export function resolvePoint(
  point: Point,
  box: AbsoluteBox,
  units: UnitBox,
): AbsolutePoint {
  return {
    x: resolvePosition(point.x, box, units, "x"),
    y: resolvePosition(point.y, box, units, "y"),
  };
}

/**
 * Resolve a child bounding box against its parent's resolved box.
 * Throws when the result has a negative width or height.
 */
export function resolveBox(
  child: BoundingBox,
  parent: AbsoluteBox,
  units: UnitBox,
): AbsoluteBox {
  const resolved: AbsoluteBox = {
    x0: resolvePosition(child.x0, parent, units, "x"),
    y0: resolvePosition(child.y0, parent, units, "y"),
    width: resolveLength(child.width, parent, units),
    height: resolveLength(child.height, parent, units),
  };

  if (resolved.width < 0 || resolved.height < 0) {
    throw new UnitResolutionError(
      `Bounding box resolves to a negative size (${resolved.width} x ${resolved.height} mm)`,
    );
  }

  return resolved;
}

/** Effective unit box of a context: its own override, else the parent's. */
export function inheritUnitBox(parent: UnitBox, own?: UnitBox): UnitBox {
  if (!own) return parent;
  return own.fontSize === undefined && parent.fontSize !== undefined
    ? { ...own, fontSize: parent.fontSize }
    : own;
}
