import { afterEach, describe, expect, it } from "vitest";
import {
  defaultMime,
  getDefaults,
  resetDefaults,
  setDefaultFill,
  setDefaultFont,
  setDefaultGraphicFormat,
  setDefaultGraphicSize,
  setDefaultLineWidth,
  setDefaultScriptMode,
  setDefaultStroke,
} from "../src/config/defaults.js";
import { ConfigurationError } from "../src/errors.js";
import { cm, mm, pt, w } from "../src/types/measure.js";

afterEach(() => {
  resetDefaults();
});

describe("render defaults", () => {
  it("starts from the documented values", () => {
    const d = getDefaults();
    expect(d.graphicWidth.abs).toBe(120);
    expect(d.graphicHeight.abs).toBe(120);
    expect(d.format).toBe("html");
    expect(d.scriptMode).toBe("embed");
    expect(d.fontFamily).toBe("Helvetica Neue,Helvetica,Arial,sans");
    expect(d.fontSize.abs).toBeCloseTo((11 * 25.4) / 72, 10);
    expect(d.lineWidth.abs).toBe(0.3);
    expect(d.strokeColor).toBeNull();
    expect(d.fillColor).toBe("black");
  });

  it("hands out snapshots unaffected by later changes", () => {
    const before = getDefaults();
    setDefaultFill("red");
    expect(before.fillColor).toBe("black");
    expect(getDefaults().fillColor).toBe("red");
  });

  it("restores the initial values on reset", () => {
    setDefaultStroke("blue");
    resetDefaults();
    expect(getDefaults().strokeColor).toBeNull();
  });
});

describe("setters", () => {
  it("sets the graphic size from absolute measures", () => {
    setDefaultGraphicSize(cm(4), mm(30));
    expect(getDefaults().graphicWidth.abs).toBe(40);
    expect(getDefaults().graphicHeight.abs).toBe(30);
  });

  it("rejects a relative graphic size", () => {
    expect(() => setDefaultGraphicSize(w(1), cm(1))).toThrow(
      'Default graphic width must be an absolute length, got "1w"',
    );
  });

  it("validates the output format", () => {
    setDefaultGraphicFormat("svg");
    expect(getDefaults().format).toBe("svg");
    expect(() => setDefaultGraphicFormat("gif")).toThrow(
      '"gif" is not a supported output format. Expected one of: html, png, svg, pdf, ps, pgf',
    );
  });

  it("validates the script mode", () => {
    setDefaultScriptMode("linkrel");
    expect(getDefaults().scriptMode).toBe("linkrel");
    expect(() => setDefaultScriptMode("inline")).toThrow(ConfigurationError);
  });

  it("sets the font family and optionally its size", () => {
    setDefaultFont("Courier", pt(10));
    expect(getDefaults().fontFamily).toBe("Courier");
    expect(getDefaults().fontSize.abs).toBeCloseTo((10 * 25.4) / 72, 10);

    setDefaultFont("Times");
    expect(getDefaults().fontSize.abs).toBeCloseTo((10 * 25.4) / 72, 10);
    expect(() => setDefaultFont("  ")).toThrow(ConfigurationError);
  });

  it("accepts null colours and rejects empty ones", () => {
    setDefaultFill(null);
    expect(getDefaults().fillColor).toBeNull();
    expect(() => setDefaultStroke("")).toThrow('"" is not a valid colour');
  });

  it("rejects a negative line width", () => {
    setDefaultLineWidth(0.5);
    expect(getDefaults().lineWidth.abs).toBe(0.5);
    expect(() => setDefaultLineWidth(-1)).toThrow('"-1mm" is not a valid line width');
  });
});

describe("defaultMime", () => {
  it("maps formats to MIME types", () => {
    expect(defaultMime()).toBe("text/html");
    expect(defaultMime("svg")).toBe("image/svg+xml");
    expect(defaultMime("pdf")).toBe("application/pdf");
  });
});
