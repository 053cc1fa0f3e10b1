import { MeasureComparisonError } from "../errors.js";

// ---- Measure ----

/**
 * A length that may depend on the box it is resolved in.
 *
 * `abs` is in millimetres. `w` and `h` are fractions of the ambient box
 * width and height. `cx` and `cy` are unit-box coordinates. `em` is a
 * multiple of the ambient font size.
 */
export interface Measure {
  readonly abs: number;
  readonly w: number;
  readonly h: number;
  readonly cx: number;
  readonly cy: number;
  readonly em: number;
}

export type MeasureLike = Measure | number;

export type MeasureComponent = keyof Measure;

export const MEASURE_COMPONENTS: readonly MeasureComponent[] = [
  "abs",
  "w",
  "h",
  "cx",
  "cy",
  "em",
];

export const ZERO: Measure = Object.freeze({
  abs: 0,
  w: 0,
  h: 0,
  cx: 0,
  cy: 0,
  em: 0,
});

// Millimetres per absolute unit
export const MM_PER_CM = 10;
export const MM_PER_INCH = 25.4;
export const MM_PER_PT = MM_PER_INCH / 72;
export const MM_PER_PX = MM_PER_INCH / 96;

export function measure(parts: Partial<Measure>): Measure {
  return Object.freeze({ ...ZERO, ...parts });
}

export function mm(value: number): Measure {
  return measure({ abs: value });
}

export function cm(value: number): Measure {
  return measure({ abs: value * MM_PER_CM });
}

export function inch(value: number): Measure {
  return measure({ abs: value * MM_PER_INCH });
}

export function pt(value: number): Measure {
  return measure({ abs: value * MM_PER_PT });
}

export function px(value: number): Measure {
  return measure({ abs: value * MM_PER_PX });
}

export function w(value: number): Measure {
  return measure({ w: value });
}

export function h(value: number): Measure {
  return measure({ h: value });
}

export function cx(value: number): Measure {
  return measure({ cx: value });
}

export function cy(value: number): Measure {
  return measure({ cy: value });
}

export function em(value: number): Measure {
  return measure({ em: value });
}

/** Bare numbers are millimetres. */
export function toMeasure(value: MeasureLike): Measure {
  return typeof value === "number" ? mm(value) : value;
}

// ---- Arithmetic ----

export function add(...terms: MeasureLike[]): Measure {
  const sum: { -readonly [K in MeasureComponent]: number } = {
    abs: 0,
    w: 0,
    h: 0,
    cx: 0,
    cy: 0,
    em: 0,
  };
  for (const term of terms) {
    const m = toMeasure(term);
    for (const key of MEASURE_COMPONENTS) {
      sum[key] += m[key];
    }
  }
  return Object.freeze(sum);
}

export function sub(a: MeasureLike, b: MeasureLike): Measure {
  return add(a, scale(b, -1));
}

export function scale(value: MeasureLike, factor: number): Measure {
  const m = toMeasure(value);
  return measure({
    abs: m.abs * factor,
    w: m.w * factor,
    h: m.h * factor,
    cx: m.cx * factor,
    cy: m.cy * factor,
    em: m.em * factor,
  });
}

export function div(value: MeasureLike, divisor: number): Measure {
  return scale(value, 1 / divisor);
}

export function neg(value: MeasureLike): Measure {
  return scale(value, -1);
}

/** Components with a non-zero value, in canonical order. */
export function measureKinds(m: Measure): MeasureComponent[] {
  return MEASURE_COMPONENTS.filter((key) => m[key] !== 0);
}

export function isAbsolute(value: MeasureLike): boolean {
  const m = toMeasure(value);
  return measureKinds(m).every((key) => key === "abs");
}

export function measureEquals(a: MeasureLike, b: MeasureLike): boolean {
  const ma = toMeasure(a);
  const mb = toMeasure(b);
  return MEASURE_COMPONENTS.every((key) => ma[key] === mb[key]);
}

// ---- Comparison ----

/**
 * Order two measures without resolving them. Only defined when both are
 * expressed in the same single kind (or are zero); anything else throws.
 */
export function compareMeasures(a: MeasureLike, b: MeasureLike): number {
  const ma = toMeasure(a);
  const mb = toMeasure(b);
  const kinds = new Set([...measureKinds(ma), ...measureKinds(mb)]);

  if (kinds.size > 1) {
    throw new MeasureComparisonError(
      `Cannot compare measures with components [${[...kinds].join(", ")}] before resolution`,
    );
  }

  const [kind] = kinds;
  if (kind === undefined) return 0;
  return Math.sign(ma[kind] - mb[kind]);
}

export function minMeasure(first: MeasureLike, ...rest: MeasureLike[]): Measure {
  let best = toMeasure(first);
  for (const value of rest) {
    if (compareMeasures(value, best) < 0) best = toMeasure(value);
  }
  return best;
}

export function maxMeasure(first: MeasureLike, ...rest: MeasureLike[]): Measure {
  let best = toMeasure(first);
  for (const value of rest) {
    if (compareMeasures(value, best) > 0) best = toMeasure(value);
  }
  return best;
}
