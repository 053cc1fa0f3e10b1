import { readFileSync } from "node:fs";
import { z } from "zod";
import { UnitResolutionError } from "../errors.js";
import { formatMeasure } from "../parser/measure-parser.js";
import type { Measure, MeasureLike } from "../types/measure.js";
import { isAbsolute, mm, toMeasure } from "../types/measure.js";

/** Size of a run of text, in millimetres. */
export interface TextExtent {
  width: number;
  height: number;
}

/**
 * Text-shaping service. `size` is the font size in millimetres.
 */
export interface TextMeasurer {
  measure(family: string, size: number, text: string): TextExtent;
}

const GlyphTableSchema = z.object({
  family: z.string(),
  default: z.number().positive(),
  lineHeight: z.number().positive(),
  widths: z.record(z.number().nonnegative()),
});

type GlyphTable = z.infer<typeof GlyphTableSchema>;

let glyphTable: GlyphTable | undefined;

// Advance widths in em, loaded on first use
function loadGlyphTable(): GlyphTable {
  if (!glyphTable) {
    const raw: unknown = JSON.parse(
      readFileSync(new URL("../../data/glyph-widths.json", import.meta.url), "utf-8"),
    );
    glyphTable = GlyphTableSchema.parse(raw);
  }
  return glyphTable;
}

/**
 * Approximate metrics from a single sans-serif width table. Ignores the
 * family; kerning and ligatures are not modelled.
 */
export const fallbackTextMeasurer: TextMeasurer = {
  measure(_family: string, size: number, text: string): TextExtent {
    const table = loadGlyphTable();
    const lines = text.split("\n");
    let widest = 0;
    for (const line of lines) {
      let advance = 0;
      for (const ch of line) {
        advance += table.widths[ch] ?? table.default;
      }
      widest = Math.max(widest, advance);
    }
    return {
      width: widest * size,
      height: lines.length * size * table.lineHeight,
    };
  },
};

let activeMeasurer: TextMeasurer = fallbackTextMeasurer;

/** Install a text-shaping service; `null` restores the fallback table. */
export function setTextMeasurer(measurer: TextMeasurer | null): void {
  activeMeasurer = measurer ?? fallbackTextMeasurer;
}

function absoluteSize(size: MeasureLike): number {
  const m = toMeasure(size);
  if (!isAbsolute(m)) {
    throw new UnitResolutionError(
      `Text can only be measured at an absolute font size, got "${formatMeasure(m)}"`,
    );
  }
  return m.abs;
}

/** Width and height of each text, as absolute measures. */
export function textExtents(
  family: string,
  size: MeasureLike,
  ...texts: string[]
): [Measure, Measure][] {
  const sizeMm = absoluteSize(size);
  return texts.map((text) => {
    const extent = activeMeasurer.measure(family, sizeMm, text);
    return [mm(extent.width), mm(extent.height)];
  });
}

/** Largest width and largest height over all texts. */
export function maxTextExtents(
  family: string,
  size: MeasureLike,
  ...texts: string[]
): [Measure, Measure] {
  let width = 0;
  let height = 0;
  for (const [tw, th] of textExtents(family, size, ...texts)) {
    width = Math.max(width, tw.abs);
    height = Math.max(height, th.abs);
  }
  return [mm(width), mm(height)];
}
