import { describe, expect, it } from "vitest";
import { pathData, splitSubpaths } from "../src/svg-path.js";

const pt = (x: number, y: number) => ({ x, y });

describe("splitSubpaths", () => {
  it("splits at non-finite points", () => {
    expect(splitSubpaths([pt(0, 0), pt(1, 0), pt(NaN, NaN), pt(0, 1), pt(1, 1)])).toEqual([
      [pt(0, 0), pt(1, 0)],
      [pt(0, 1), pt(1, 1)],
    ]);
  });

  it("drops runs too short to draw", () => {
    expect(splitSubpaths([pt(0, 0), pt(Infinity, 0), pt(2, 2), pt(3, 3)])).toEqual([
      [pt(2, 2), pt(3, 3)],
    ]);
    expect(splitSubpaths([pt(0, 0)])).toEqual([]);
  });
});

describe("pathData", () => {
  it("writes an open path", () => {
    expect(pathData([pt(0, 0), pt(10, 0), pt(10, 10)], false)).toBe("M0,0 L10,0 10,10");
  });

  it("closes each sub-path of a closed path", () => {
    expect(
      pathData([pt(0, 0), pt(1, 0), pt(1, 1), pt(NaN, 0), pt(5, 5), pt(6, 5), pt(6, 6)], true),
    ).toBe("M0,0 L1,0 1,1 z M5,5 L6,5 6,6 z");
  });

  it("is empty when nothing is drawable", () => {
    expect(pathData([pt(NaN, NaN)], false)).toBe("");
  });
});
