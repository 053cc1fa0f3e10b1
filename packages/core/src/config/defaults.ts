import { z } from "zod";
import { ConfigurationError } from "../errors.js";
import { formatMeasure } from "../parser/measure-parser.js";
import type { Color } from "../types/geometry.js";
import type { Measure, MeasureLike } from "../types/measure.js";
import { cm, isAbsolute, mm, pt, toMeasure } from "../types/measure.js";

// ---- Enumerated settings ----

export const OutputFormatSchema = z.enum(["html", "png", "svg", "pdf", "ps", "pgf"]);
export type OutputFormat = z.infer<typeof OutputFormatSchema>;

/**
 * How script includes reach the document:
 * none     - no scripting at all
 * exclude  - event handlers and functions, includes left to the host page
 * embed    - includes inlined
 * linkabs  - includes linked by absolute path
 * linkrel  - includes linked by the path as given
 */
export const ScriptModeSchema = z.enum(["none", "exclude", "embed", "linkabs", "linkrel"]);
export type ScriptMode = z.infer<typeof ScriptModeSchema>;

const ColorSchema = z.string().min(1).nullable();

export interface RenderDefaults {
  graphicWidth: Measure;
  graphicHeight: Measure;
  format: OutputFormat;
  scriptMode: ScriptMode;
  fontFamily: string;
  fontSize: Measure;
  lineWidth: Measure;
  strokeColor: Color;
  fillColor: Color;
}

const INITIAL_DEFAULTS: Readonly<RenderDefaults> = Object.freeze({
  graphicWidth: cm(12),
  graphicHeight: cm(12),
  format: "html",
  scriptMode: "embed",
  fontFamily: "Helvetica Neue,Helvetica,Arial,sans",
  fontSize: pt(11),
  lineWidth: mm(0.3),
  strokeColor: null,
  fillColor: "black",
});

let current: Readonly<RenderDefaults> = INITIAL_DEFAULTS;

/** Snapshot of the process-wide defaults. Later setter calls do not affect it. */
export function getDefaults(): Readonly<RenderDefaults> {
  return current;
}

export function resetDefaults(): void {
  current = INITIAL_DEFAULTS;
}

function update(patch: Partial<RenderDefaults>): void {
  current = Object.freeze({ ...current, ...patch });
}

function absoluteSetting(name: string, value: MeasureLike): Measure {
  const m = toMeasure(value);
  if (!isAbsolute(m)) {
    throw new ConfigurationError(
      `${name} must be an absolute length, got "${formatMeasure(m)}"`,
    );
  }
  return m;
}

export function setDefaultGraphicSize(width: MeasureLike, height: MeasureLike): void {
  update({
    graphicWidth: absoluteSetting("Default graphic width", width),
    graphicHeight: absoluteSetting("Default graphic height", height),
  });
}

export function setDefaultGraphicFormat(format: string): void {
  const result = OutputFormatSchema.safeParse(format);
  if (!result.success) {
    throw new ConfigurationError(
      `"${format}" is not a supported output format. Expected one of: ${OutputFormatSchema.options.join(", ")}`,
    );
  }
  update({ format: result.data });
}

export function setDefaultScriptMode(mode: string): void {
  const result = ScriptModeSchema.safeParse(mode);
  if (!result.success) {
    throw new ConfigurationError(
      `"${mode}" is not a valid script mode. Expected one of: ${ScriptModeSchema.options.join(", ")}`,
    );
  }
  update({ scriptMode: result.data });
}

export function setDefaultFont(family: string, size?: MeasureLike): void {
  if (family.trim() === "") {
    throw new ConfigurationError(`"${family}" is not a valid font family`);
  }
  update({
    fontFamily: family,
    fontSize: size === undefined ? current.fontSize : absoluteSetting("Default font size", size),
  });
}

export function setDefaultStroke(color: Color): void {
  update({ strokeColor: parseColorSetting(color) });
}

export function setDefaultFill(color: Color): void {
  update({ fillColor: parseColorSetting(color) });
}

export function setDefaultLineWidth(width: MeasureLike): void {
  const m = absoluteSetting("Default line width", width);
  if (m.abs < 0) {
    throw new ConfigurationError(`"${formatMeasure(m)}" is not a valid line width`);
  }
  update({ lineWidth: m });
}

function parseColorSetting(color: Color): Color {
  const result = ColorSchema.safeParse(color);
  if (!result.success) {
    throw new ConfigurationError(`"${String(color)}" is not a valid colour`);
  }
  return result.data;
}

const MIME_TYPES: Record<OutputFormat, string> = {
  html: "text/html",
  png: "image/png",
  svg: "image/svg+xml",
  pdf: "application/pdf",
  ps: "application/postscript",
  pgf: "application/x-tex",
};

export function defaultMime(format: OutputFormat = current.format): string {
  return MIME_TYPES[format];
}
