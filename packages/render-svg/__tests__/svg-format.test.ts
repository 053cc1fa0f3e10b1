import { describe, expect, it } from "vitest";
import { escapeXml, fmtColor, fmtFloat } from "../src/svg-format.js";

describe("fmtFloat", () => {
  it("rounds to hundredths and trims trailing zeros", () => {
    expect(fmtFloat(1.23456)).toBe("1.23");
    expect(fmtFloat(10)).toBe("10");
    expect(fmtFloat(-1.5)).toBe("-1.5");
    expect(fmtFloat(0.1 + 0.2)).toBe("0.3");
    expect(fmtFloat(1234.5678)).toBe("1234.57");
  });

  it("never prints negative zero", () => {
    expect(fmtFloat(-0.001)).toBe("0");
    expect(fmtFloat(-0)).toBe("0");
  });
});

describe("fmtColor", () => {
  it("writes a missing colour as none", () => {
    expect(fmtColor(null)).toBe("none");
    expect(fmtColor("#ff0000")).toBe("#ff0000");
  });
});

describe("escapeXml", () => {
  it("escapes markup characters", () => {
    expect(escapeXml(`<a href="x">&'`)).toBe("&lt;a href=&quot;x&quot;&gt;&amp;&apos;");
  });
});
