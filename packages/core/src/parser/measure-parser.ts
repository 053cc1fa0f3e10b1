import { SceneParseError } from "../errors.js";
import type { Measure, MeasureComponent } from "../types/measure.js";
import {
  MM_PER_CM,
  MM_PER_INCH,
  MM_PER_PT,
  MM_PER_PX,
  add,
  measure,
  measureKinds,
} from "../types/measure.js";

// One signed term: number followed by an optional unit suffix
const TERM = /^([+-]?)(\d+(?:\.\d+)?|\.\d+)(mm|cm|in|pt|px|cx|cy|em|w|h)?/i;

const ABSOLUTE_UNITS: Record<string, number> = {
  mm: 1,
  cm: MM_PER_CM,
  in: MM_PER_INCH,
  pt: MM_PER_PT,
  px: MM_PER_PX,
};

/**
 * Parse a measure expression.
 *
 *   "12mm"        → 12 mm
 *   "1in"         → 25.4 mm
 *   "0.5w"        → half the ambient width
 *   "1w - 2mm"    → ambient width less 2 mm
 *   "2cx + 1.5em" → two unit-box units plus one and a half font sizes
 *
 * Bare numbers are millimetres.
 */
export function parseMeasure(value: string | number): Measure {
  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      throw new SceneParseError(`Measure must be finite, got ${value}`);
    }
    return measure({ abs: value });
  }

  let rest = value.replace(/\s+/g, "");
  if (rest === "") {
    throw new SceneParseError("Empty measure string");
  }

  const terms: Measure[] = [];
  while (rest.length > 0) {
    const match = rest.match(TERM);
    if (!match || (terms.length > 0 && match[1] === "")) {
      throw new SceneParseError(
        `Invalid measure "${value}". Expected terms like "12mm", "0.5w", "1w - 2mm", "3pt", "1.2em"`,
      );
    }
    const sign = match[1] === "-" ? -1 : 1;
    const amount = sign * parseFloat(match[2]);
    const unit = (match[3] ?? "mm").toLowerCase();
    terms.push(termMeasure(amount, unit));
    rest = rest.slice(match[0].length);
  }

  return add(...terms);
}

function termMeasure(amount: number, unit: string): Measure {
  const factor = ABSOLUTE_UNITS[unit];
  if (factor !== undefined) {
    return measure({ abs: amount * factor });
  }
  switch (unit) {
    case "w":
      return measure({ w: amount });
    case "h":
      return measure({ h: amount });
    case "cx":
      return measure({ cx: amount });
    case "cy":
      return measure({ cy: amount });
    default:
      return measure({ em: amount });
  }
}

const SUFFIX: Record<MeasureComponent, string> = {
  abs: "mm",
  w: "w",
  h: "h",
  cx: "cx",
  cy: "cy",
  em: "em",
};

/**
 * Format a measure as an expression `parseMeasure` accepts.
 *
 *   { abs: 12 }        → "12mm"
 *   { abs: -2, w: 1 }  → "-2mm + 1w"
 *   zero               → "0mm"
 */
export function formatMeasure(m: Measure): string {
  const kinds = measureKinds(m);
  if (kinds.length === 0) return "0mm";

  return kinds
    .map((key, i) => {
      const v = Number(m[key].toFixed(4));
      const text = `${Math.abs(v)}${SUFFIX[key]}`;
      if (i === 0) return v < 0 ? `-${text}` : text;
      return v < 0 ? ` - ${text}` : ` + ${text}`;
    })
    .join("");
}
