import { z } from "zod";
import { ATTRIBUTE_NAME } from "../compose/properties.js";

// ---- Scene document schema (YAML / JSON) ----

/** Measure expression such as "1w - 2mm", or a bare number of millimetres. */
export type MeasureConfig = string | number;
/** A point, or null to lift the pen inside a path. */
export type PointConfig = [MeasureConfig, MeasureConfig] | null;

const MeasureSchema = z.union([z.string(), z.number()]);
const PointSchema = z.tuple([MeasureSchema, MeasureSchema]);
const PathPointSchema = PointSchema.nullable();
const ColorSchema = z.string().nullable();

const UnitsSchema = z.object({
  x0: z.number(),
  y0: z.number(),
  width: z.number(),
  height: z.number(),
  font_size: MeasureSchema.optional(),
});

export type UnitsConfig = z.infer<typeof UnitsSchema>;

// ---- Forms ----

const RectangleItem = z.object({
  x: MeasureSchema,
  y: MeasureSchema,
  width: MeasureSchema,
  height: MeasureSchema,
});

const CircleItem = z.object({ x: MeasureSchema, y: MeasureSchema, r: MeasureSchema });

const EllipseItem = z.object({
  x: MeasureSchema,
  y: MeasureSchema,
  rx: MeasureSchema,
  ry: MeasureSchema,
});

const PathItem = z.object({ points: z.array(PathPointSchema) });

const CurveItem = z.object({
  anchor0: PointSchema,
  ctrl0: PointSchema,
  ctrl1: PointSchema,
  anchor1: PointSchema,
});

const TextItem = z.object({
  x: MeasureSchema,
  y: MeasureSchema,
  value: z.string(),
  halign: z.enum(["left", "center", "right"]).optional(),
  valign: z.enum(["top", "center", "bottom"]).optional(),
  rotation: z.number().optional(),
});

const BitmapItem = z.object({
  x: MeasureSchema,
  y: MeasureSchema,
  width: MeasureSchema,
  height: MeasureSchema,
  mime: z.string(),
  /** Base64-encoded image bytes. */
  data: z.string(),
});

const FormSchema = z.discriminatedUnion("form", [
  z.object({ form: z.literal("rectangle"), items: z.array(RectangleItem).min(1) }),
  z.object({ form: z.literal("circle"), items: z.array(CircleItem).min(1) }),
  z.object({ form: z.literal("ellipse"), items: z.array(EllipseItem).min(1) }),
  z.object({ form: z.literal("polygon"), items: z.array(PathItem).min(1) }),
  z.object({ form: z.literal("lines"), items: z.array(PathItem).min(1) }),
  z.object({ form: z.literal("curve"), items: z.array(CurveItem).min(1) }),
  z.object({ form: z.literal("text"), items: z.array(TextItem).min(1) }),
  z.object({ form: z.literal("bitmap"), items: z.array(BitmapItem).min(1) }),
]);

export type FormConfig = z.infer<typeof FormSchema>;

// ---- Properties ----

function values<T extends z.ZodTypeAny>(item: T) {
  return z.array(item).min(1);
}

const PropertySchema = z.discriminatedUnion("property", [
  z.object({ property: z.literal("stroke"), values: values(ColorSchema) }),
  z.object({ property: z.literal("fill"), values: values(ColorSchema) }),
  z.object({ property: z.literal("line_width"), values: values(MeasureSchema) }),
  z.object({ property: z.literal("stroke_dash"), values: values(z.array(MeasureSchema)) }),
  z.object({
    property: z.literal("line_cap"),
    values: values(z.enum(["butt", "square", "round"])),
  }),
  z.object({
    property: z.literal("line_join"),
    values: values(z.enum(["miter", "round", "bevel"])),
  }),
  z.object({ property: z.literal("fill_opacity"), values: values(z.number().min(0).max(1)) }),
  z.object({ property: z.literal("stroke_opacity"), values: values(z.number().min(0).max(1)) }),
  z.object({ property: z.literal("visible"), values: values(z.boolean()) }),
  z.object({ property: z.literal("clip"), values: values(z.array(PointSchema).min(3)) }),
  z.object({ property: z.literal("font"), values: values(z.string()) }),
  z.object({ property: z.literal("font_size"), values: values(MeasureSchema) }),
  z.object({ property: z.literal("svg_id"), values: values(z.string()) }),
  z.object({ property: z.literal("svg_class"), values: values(z.string()) }),
  z.object({
    property: z.literal("svg_attribute"),
    name: z.string().regex(ATTRIBUTE_NAME, "Invalid attribute name"),
    values: values(z.string()),
  }),
  z.object({
    property: z.literal("js_call"),
    event: z.string().regex(ATTRIBUTE_NAME, "Invalid event name"),
    values: values(z.string()),
  }),
  z.object({
    property: z.literal("js_include"),
    source: z.string().min(1),
    code: z.string().optional(),
  }),
]);

export type PropertyConfig = z.infer<typeof PropertySchema>;

// ---- Nodes ----

export interface ContextConfig {
  box?: [MeasureConfig, MeasureConfig, MeasureConfig, MeasureConfig];
  units?: UnitsConfig;
  minwidth?: number;
  minheight?: number;
  children?: NodeConfig[];
}

export type NodeConfig =
  | { context: ContextConfig }
  | FormConfig
  | PropertyConfig
  | { empty: true };

const ContextSchema: z.ZodType<ContextConfig> = z.lazy(() =>
  z.object({
    box: z.tuple([MeasureSchema, MeasureSchema, MeasureSchema, MeasureSchema]).optional(),
    units: UnitsSchema.optional(),
    minwidth: z.number().nonnegative().optional(),
    minheight: z.number().nonnegative().optional(),
    children: z.array(NodeSchema).optional(),
  }),
);

const NodeSchema: z.ZodType<NodeConfig> = z.lazy(() =>
  z.union([
    z.object({ context: ContextSchema }),
    FormSchema,
    PropertySchema,
    z.object({ empty: z.literal(true) }),
  ]),
);

export interface SceneConfig {
  version: string;
  width?: MeasureConfig;
  height?: MeasureConfig;
  scene: ContextConfig;
}

export const SceneConfigSchema: z.ZodType<SceneConfig> = z.object({
  version: z.string(),
  width: MeasureSchema.optional(),
  height: MeasureSchema.optional(),
  scene: ContextSchema,
});
