import type { AbsoluteBox, UnitBox } from "../types/geometry.js";
import type {
  ResolvedForm,
  ResolvedProperty,
  ResolvedPropertyValue,
  ResolvedShape,
} from "../types/resolved.js";
import type { FormNode, PropertyNode, PropertyValue, Shape } from "../types/scene.js";
import { resolveLength, resolvePoint } from "./measure-resolver.js";

/**
 * Resolve every primitive of a form to millimetres in the given box.
 */
export function resolveForm(
  form: FormNode,
  box: AbsoluteBox,
  units: UnitBox,
): ResolvedForm {
  return { primitives: form.primitives.map((shape) => resolveShape(shape, box, units)) };
}

export function resolveShape(
  shape: Shape,
  box: AbsoluteBox,
  units: UnitBox,
): ResolvedShape {
  switch (shape.kind) {
    case "rectangle": {
      const corner = resolvePoint(shape.corner, box, units);
      return {
        kind: "rectangle",
        x: corner.x,
        y: corner.y,
        width: resolveLength(shape.width, box, units),
        height: resolveLength(shape.height, box, units),
      };
    }
    case "circle": {
      const center = resolvePoint(shape.center, box, units);
      return {
        kind: "circle",
        cx: center.x,
        cy: center.y,
        r: resolveLength(shape.radius, box, units),
      };
    }
    case "ellipse":
      return {
        kind: "ellipse",
        center: resolvePoint(shape.center, box, units),
        xPoint: resolvePoint(shape.xPoint, box, units),
        yPoint: resolvePoint(shape.yPoint, box, units),
      };
    case "polygon":
    case "lines":
      return {
        kind: shape.kind,
        points: shape.points.map((p) => resolvePoint(p, box, units)),
      };
    case "curve":
      return {
        kind: "curve",
        anchor0: resolvePoint(shape.anchor0, box, units),
        ctrl0: resolvePoint(shape.ctrl0, box, units),
        ctrl1: resolvePoint(shape.ctrl1, box, units),
        anchor1: resolvePoint(shape.anchor1, box, units),
      };
    case "text": {
      const position = resolvePoint(shape.position, box, units);
      return {
        kind: "text",
        x: position.x,
        y: position.y,
        value: shape.value,
        halign: shape.halign,
        valign: shape.valign,
        rotation: shape.rotation,
      };
    }
    case "bitmap": {
      const corner = resolvePoint(shape.corner, box, units);
      return {
        kind: "bitmap",
        x: corner.x,
        y: corner.y,
        width: resolveLength(shape.width, box, units),
        height: resolveLength(shape.height, box, units),
        mime: shape.mime,
        data: shape.data,
      };
    }
  }
}

/**
 * Resolve a property batch in the box of the context that declares it.
 */
export function resolveProperty(
  node: PropertyNode,
  box: AbsoluteBox,
  units: UnitBox,
): ResolvedProperty {
  return {
    channel: node.channel,
    primitives: node.primitives.map((value) => resolvePropertyValue(value, box, units)),
  };
}

export function resolvePropertyValue(
  value: PropertyValue,
  box: AbsoluteBox,
  units: UnitBox,
): ResolvedPropertyValue {
  switch (value.kind) {
    case "lineWidth":
      return { kind: "lineWidth", value: resolveLength(value.value, box, units) };
    case "fontSize":
      return { kind: "fontSize", value: resolveLength(value.value, box, units) };
    case "strokeDash":
      return {
        kind: "strokeDash",
        pattern: value.pattern.map((m) => resolveLength(m, box, units)),
      };
    case "clip":
      return {
        kind: "clip",
        points: value.points.map((p) => resolvePoint(p, box, units)),
      };
    case "stroke":
    case "fill":
    case "lineCap":
    case "lineJoin":
    case "fillOpacity":
    case "strokeOpacity":
    case "visible":
    case "font":
    case "svgId":
    case "svgClass":
    case "svgAttribute":
    case "jsCall":
    case "jsInclude":
      return value;
  }
}
