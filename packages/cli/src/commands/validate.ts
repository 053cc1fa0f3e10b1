import { readFileSync } from "node:fs";
import {
  countScene,
  getDefaults,
  isAbsolute,
  parseMeasure,
  parseScene,
  DEFAULT_UNIT_BOX,
} from "@vellum/core";
import type { Measure } from "@vellum/core";
import { renderSvg } from "@vellum/render-svg";

interface ValidateOptions {
  width?: string;
  height?: string;
}

function absoluteSize(name: string, m: Measure): number {
  if (!isAbsolute(m)) {
    throw new Error(`Image ${name} must be an absolute length`);
  }
  return m.abs;
}

export function validateCommand(input: string, options: ValidateOptions): void {
  try {
    const content = readFileSync(input, "utf-8");
    const doc = parseScene(content);
    const defaults = getDefaults();

    const width = absoluteSize(
      "width",
      options.width ? parseMeasure(options.width) : (doc.width ?? defaults.graphicWidth),
    );
    const height = absoluteSize(
      "height",
      options.height ? parseMeasure(options.height) : (doc.height ?? defaults.graphicHeight),
    );

    // Drawing checks vector properties against the forms they apply to
    renderSvg(doc.root, { width, height, defaults });

    const stats = countScene(
      doc.root,
      { x0: 0, y0: 0, width, height },
      { ...DEFAULT_UNIT_BOX, fontSize: defaults.fontSize.abs },
    );

    console.log("✓ Scene is valid.");
    console.log(
      `\nSummary: ${stats.forms} form(s), ${stats.primitives} primitive(s), ${stats.frames} property frame(s), max frame depth ${stats.maxFrameDepth}`,
    );
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }
}
