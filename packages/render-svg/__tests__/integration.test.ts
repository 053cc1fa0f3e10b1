import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import {
  UnsupportedBackendError,
  compose,
  context,
  parseScene,
  rectangle,
} from "@vellum/core";
import { describe, expect, it } from "vitest";
import { createBackend, renderSvg } from "../src/render-svg.js";
import { SvgBackend } from "../src/svg-backend.js";

function example(name: string): string {
  return readFileSync(fileURLToPath(new URL(`../../../examples/${name}`, import.meta.url)), "utf-8");
}

function render(yaml: string): string {
  const doc = parseScene(yaml);
  return renderSvg(doc.root, { width: doc.width, height: doc.height });
}

describe("renderSvg", () => {
  it("renders nested circles from a scene file", () => {
    expect(render(example("nested-circles.yaml"))).toBe(
      [
        `<?xml version="1.0" encoding="UTF-8"?>`,
        `<svg xmlns="http://www.w3.org/2000/svg"`,
        `     xmlns:xlink="http://www.w3.org/1999/xlink"`,
        `     version="1.1"`,
        `     width="40mm" height="40mm" viewBox="0 0 40 40"`,
        `     stroke="none"`,
        `     fill="black"`,
        `     stroke-width="0.3">`,
        `<g fill="red">`,
        `  <circle cx="20" cy="20" r="16"/>`,
        `  <g fill="blue">`,
        `    <circle cx="20" cy="20" r="8"/>`,
        `  </g>`,
        `</g>`,
        `</svg>`,
        ``,
      ].join("\n"),
    );
  });

  it("places bars through a flipped unit box", () => {
    const svg = render(example("bar-chart.yaml"));
    expect(svg.match(/<rect /g)).toHaveLength(4);
    expect(svg).toContain(
      `  <rect x="7.75" y="40" width="22" height="15" fill="steelblue" class="bar-a"/>\n`,
    );
    expect(svg).toContain(`<g stroke="black" stroke-width="0.2">\n`);
  });

  it("wires event handlers, includes and clipping", () => {
    const svg = render(example("clickable.yaml"));
    expect(svg).toContain(`<g onclick="js_fn1(evt)" clip-path="url(#clippath1)">\n`);
    expect(svg).toContain(
      `<script type="application/ecmascript"><![CDATA[\nfunction highlight(el) { el.setAttribute('fill', 'gold'); }\n]]></script>\n`,
    );
    expect(svg).toContain(`function js_fn1(evt) {\nhighlight(evt.target)\n}\n`);
  });

  it("falls back to the default graphic size", () => {
    const svg = renderSvg(compose(context(), rectangle()));
    expect(svg).toContain(`width="120mm" height="120mm" viewBox="0 0 120 120"`);
  });
});

describe("createBackend", () => {
  it("creates SVG backends for html and svg output", () => {
    expect(createBackend("svg", undefined, 10, 10)).toBeInstanceOf(SvgBackend);
    expect(createBackend("html", undefined, 10, 10)).toBeInstanceOf(SvgBackend);
  });

  it("writes to a caller-owned stream", () => {
    const chunks: string[] = [];
    const backend = createBackend("svg", { write: (chunk: string | Uint8Array) => chunks.push(String(chunk)) }, 10, 10);
    backend.finish();
    expect(chunks.join("").endsWith("</svg>\n")).toBe(true);
  });

  it("needs a registered renderer for native formats", () => {
    expect(() => createBackend("png", "out.png", 10, 10)).toThrow(UnsupportedBackendError);
    expect(() => createBackend("pdf", undefined, 10, 10)).toThrow(
      '"pdf" output needs a file or stream target',
    );
  });

  it("does not support pgf", () => {
    expect(() => createBackend("pgf", "out.tex", 10, 10)).toThrow('"pgf" output is not supported');
  });
});
