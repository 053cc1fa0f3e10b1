import yaml from "js-yaml";
import { compose, context, EMPTY } from "../compose/context.js";
import type { PointLike } from "../compose/forms.js";
import {
  bitmap,
  circles,
  curve,
  ellipses,
  form,
  lines,
  polygon,
  rectangles,
  texts,
} from "../compose/forms.js";
import {
  clip,
  fill,
  fillOpacity,
  font,
  fontSize,
  jsCall,
  jsInclude,
  lineCap,
  lineJoin,
  lineWidth,
  stroke,
  strokeDash,
  strokeOpacity,
  svgAttribute,
  svgClass,
  svgId,
  visible,
} from "../compose/properties.js";
import { SceneParseError } from "../errors.js";
import type { UnitBox } from "../types/geometry.js";
import type { Measure } from "../types/measure.js";
import { h, isAbsolute, mm, w } from "../types/measure.js";
import type {
  ContextConfig,
  FormConfig,
  NodeConfig,
  PointConfig,
  PropertyConfig,
  UnitsConfig,
} from "../types/scene-config.js";
import { SceneConfigSchema } from "../types/scene-config.js";
import type { ContextNode, SceneNode } from "../types/scene.js";
import { parseMeasure } from "./measure-parser.js";

export interface SceneDocument {
  version: string;
  width?: Measure;
  height?: Measure;
  root: ContextNode;
}

/**
 * Parse a JSON or YAML scene document into a context tree.
 * Detects the format automatically (tries JSON first, then YAML).
 * Throws a SceneParseError describing every schema violation.
 */
export function parseScene(input: string): SceneDocument {
  let raw: unknown;

  try {
    raw = JSON.parse(input);
  } catch {
    try {
      raw = yaml.load(input);
    } catch (yamlErr) {
      throw new SceneParseError(
        `Failed to parse input as JSON or YAML: ${yamlErr instanceof Error ? yamlErr.message : String(yamlErr)}`,
      );
    }
  }

  const result = SceneConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new SceneParseError(`Invalid scene document:\n${issues}`);
  }

  const config = result.data;
  return {
    version: config.version,
    width: config.width === undefined ? undefined : parseMeasure(config.width),
    height: config.height === undefined ? undefined : parseMeasure(config.height),
    root: buildContext(config.scene),
  };
}

function buildContext(config: ContextConfig): ContextNode {
  const [x0, y0, width, height] = config.box?.map(parseMeasure) ?? [mm(0), mm(0), w(1), h(1)];
  const ctx = context(x0, y0, width, height, {
    units: config.units ? buildUnits(config.units) : undefined,
    minWidth: config.minwidth,
    minHeight: config.minheight,
  });
  return compose(ctx, ...(config.children ?? []).map(buildNode));
}

function buildUnits(config: UnitsConfig): UnitBox {
  const units: UnitBox = {
    x0: config.x0,
    y0: config.y0,
    width: config.width,
    height: config.height,
  };
  if (config.font_size !== undefined) {
    const size = parseMeasure(config.font_size);
    if (!isAbsolute(size)) {
      throw new SceneParseError(`Unit box font_size must be absolute, got "${config.font_size}"`);
    }
    units.fontSize = size.abs;
  }
  return units;
}

function buildNode(config: NodeConfig): SceneNode {
  if ("context" in config) return buildContext(config.context);
  if ("form" in config) return buildForm(config);
  if ("property" in config) return buildProperty(config);
  return EMPTY;
}

const PEN_UP: PointLike = [mm(NaN), mm(NaN)];

function toPoint(p: PointConfig): PointLike {
  return p === null ? PEN_UP : [parseMeasure(p[0]), parseMeasure(p[1])];
}

function toPoints(points: PointConfig[]): PointLike[] {
  return points.map(toPoint);
}

function buildForm(config: FormConfig): SceneNode {
  switch (config.form) {
    case "rectangle":
      return rectangles(
        config.items.map((item) => ({
          x: parseMeasure(item.x),
          y: parseMeasure(item.y),
          width: parseMeasure(item.width),
          height: parseMeasure(item.height),
        })),
      );
    case "circle":
      return circles(
        config.items.map((item) => ({
          x: parseMeasure(item.x),
          y: parseMeasure(item.y),
          r: parseMeasure(item.r),
        })),
      );
    case "ellipse":
      return ellipses(
        config.items.map((item) => ({
          x: parseMeasure(item.x),
          y: parseMeasure(item.y),
          rx: parseMeasure(item.rx),
          ry: parseMeasure(item.ry),
        })),
      );
    case "polygon":
      return polygon(...config.items.map((item) => toPoints(item.points)));
    case "lines":
      return lines(...config.items.map((item) => toPoints(item.points)));
    case "curve":
      return form(
        config.items.flatMap(
          (item) =>
            curve(toPoint(item.anchor0), toPoint(item.ctrl0), toPoint(item.ctrl1), toPoint(item.anchor1))
              .primitives,
        ),
      );
    case "text":
      return texts(
        config.items.map((item) => ({
          x: parseMeasure(item.x),
          y: parseMeasure(item.y),
          value: item.value,
          halign: item.halign,
          valign: item.valign,
          rotation: item.rotation,
        })),
      );
    case "bitmap":
      return form(
        config.items.flatMap(
          (item) =>
            bitmap(
              item.mime,
              Buffer.from(item.data, "base64"),
              parseMeasure(item.x),
              parseMeasure(item.y),
              parseMeasure(item.width),
              parseMeasure(item.height),
            ).primitives,
        ),
      );
  }
}

function buildProperty(config: PropertyConfig): SceneNode {
  switch (config.property) {
    case "stroke":
      return stroke(config.values);
    case "fill":
      return fill(config.values);
    case "line_width":
      return lineWidth(config.values.map(parseMeasure));
    case "stroke_dash":
      return strokeDash(...config.values.map((pattern) => pattern.map(parseMeasure)));
    case "line_cap":
      return lineCap(config.values);
    case "line_join":
      return lineJoin(config.values);
    case "fill_opacity":
      return fillOpacity(config.values);
    case "stroke_opacity":
      return strokeOpacity(config.values);
    case "visible":
      return visible(config.values);
    case "clip":
      return clip(...config.values.map(toPoints));
    case "font":
      return font(config.values);
    case "font_size":
      return fontSize(config.values.map(parseMeasure));
    case "svg_id":
      return svgId(config.values);
    case "svg_class":
      return svgClass(config.values);
    case "svg_attribute":
      return svgAttribute(config.name, config.values);
    case "js_call":
      return jsCall(config.event, config.values);
    case "js_include":
      return jsInclude(config.source, config.code);
  }
}
