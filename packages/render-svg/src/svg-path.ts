import type { AbsolutePoint } from "@vellum/core";
import { fmtFloat } from "./svg-format.js";

function isFinitePoint(p: AbsolutePoint): boolean {
  return Number.isFinite(p.x) && Number.isFinite(p.y);
}

/**
 * Split a point list at every non-finite point. Runs of fewer than two
 * points cannot be drawn and are dropped.
 */
export function splitSubpaths(points: readonly AbsolutePoint[]): AbsolutePoint[][] {
  const subpaths: AbsolutePoint[][] = [];
  let current: AbsolutePoint[] = [];

  for (const p of points) {
    if (isFinitePoint(p)) {
      current.push(p);
    } else {
      subpaths.push(current);
      current = [];
    }
  }
  subpaths.push(current);

  return subpaths.filter((run) => run.length >= 2);
}

/**
 * SVG path data for a point list, e.g. "M0,0 L10,0 10,10". Closed paths end
 * each sub-path with "z". Empty when nothing is drawable.
 */
export function pathData(points: readonly AbsolutePoint[], closed: boolean): string {
  return splitSubpaths(points)
    .map((run) => {
      const [first, ...rest] = run;
      const tail = rest.map((p) => `${fmtFloat(p.x)},${fmtFloat(p.y)}`).join(" ");
      const d = `M${fmtFloat(first.x)},${fmtFloat(first.y)} L${tail}`;
      return closed ? `${d} z` : d;
    })
    .join(" ");
}
