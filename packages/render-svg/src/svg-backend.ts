import { resolve } from "node:path";
import type {
  AbsoluteBox,
  Backend,
  BackendState,
  MeasureLike,
  RenderDefaults,
  ResolvedForm,
  ResolvedProperty,
  ResolvedPropertyValue,
  ResolvedShape,
} from "@vellum/core";
import {
  BackendStateError,
  BatchLengthMismatchError,
  SinkError,
  UnitResolutionError,
  errorMessage,
  formatMeasure,
  getDefaults,
  isAbsolute,
  toMeasure,
} from "@vellum/core";
import type { Sink } from "./sink.js";
import { BufferSink, FileSink, streamSink } from "./sink.js";
import { escapeXml, fmtColor, fmtFloat } from "./svg-format.js";
import { pathData } from "./svg-path.js";

export interface SvgBackendOptions {
  /** Defaults snapshot; the process-wide defaults at construction otherwise. */
  defaults?: Readonly<RenderDefaults>;
  /** Close the sink when the document is finished. */
  ownsSink?: boolean;
  /** Receives the whole document once finished (in-memory backends). */
  display?: (svg: string) => void;
}

interface FrameEntry {
  scalar: boolean;
  property: ResolvedProperty;
}

/**
 * One pushed group of properties. Scalar properties open a `<g>` that is
 * closed when the frame is popped.
 */
interface PropertyFrame {
  entries: Map<string, FrameEntry>;
  hasGroup: boolean;
}

/**
 * Backend writing an SVG document to a sink.
 *
 * Scalar properties become attributes of nested `<g>` elements. Vector
 * properties are tracked per channel and written on each element, one value
 * per primitive. Clip paths, script functions and embedded fragments are
 * collected while drawing and written once by `finish`.
 */
export class SvgBackend implements Backend {
  readonly width: number;
  readonly height: number;
  readonly defaults: Readonly<RenderDefaults>;

  private sink: Sink;
  private readonly ownsSink: boolean;
  private readonly display?: (svg: string) => void;

  private currentState: BackendState = "open";
  private indentation = 0;
  private propertyStack: PropertyFrame[] = [];
  // Per channel, the entries of every frame on the stack that sets it,
  // shallowest first
  private channelHistory = new Map<string, FrameEntry[]>();
  private clipPaths = new Map<string, number>();
  private scripts = new Map<string, string>();
  private embeddedObjects = new Set<string>();

  constructor(
    sink: Sink,
    width: MeasureLike,
    height: MeasureLike,
    options: SvgBackendOptions = {},
  ) {
    this.width = absoluteSize("width", width);
    this.height = absoluteSize("height", height);
    this.defaults = options.defaults ?? getDefaults();
    this.sink = sink;
    this.ownsSink = options.ownsSink ?? false;
    this.display = options.display;
    this.writeHeader();
  }

  /** Write to a file the backend opens and closes itself. */
  static toFile(
    path: string,
    width: MeasureLike,
    height: MeasureLike,
    options: Omit<SvgBackendOptions, "ownsSink"> = {},
  ): SvgBackend {
    return new SvgBackend(new FileSink(path), width, height, { ...options, ownsSink: true });
  }

  /** Write to a caller-owned stream. The stream stays open after `finish`. */
  static toStream(
    writable: { write(chunk: string): unknown },
    width: MeasureLike,
    height: MeasureLike,
    options: Omit<SvgBackendOptions, "ownsSink"> = {},
  ): SvgBackend {
    return new SvgBackend(streamSink(writable), width, height, { ...options, ownsSink: false });
  }

  /** Buffer the document; `display` receives it once finished. */
  static inMemory(
    width: MeasureLike,
    height: MeasureLike,
    options: Omit<SvgBackendOptions, "ownsSink"> = {},
  ): SvgBackend {
    return new SvgBackend(new BufferSink(), width, height, { ...options, ownsSink: false });
  }

  get state(): BackendState {
    return this.currentState;
  }

  isFinished(): boolean {
    return this.currentState === "finished";
  }

  rootBox(): AbsoluteBox {
    return { x0: 0, y0: 0, width: this.width, height: this.height };
  }

  /** Document written so far, for in-memory backends. */
  getOutput(): string {
    if (!(this.sink instanceof BufferSink)) {
      throw new BackendStateError("Only an in-memory SVG backend can return its output");
    }
    return this.sink.toString();
  }

  // ---- Output ----

  private write(chunk: string): void {
    try {
      this.sink.write(chunk);
    } catch (err) {
      if (err instanceof SinkError) throw err;
      throw new SinkError(`Failed to write SVG output: ${errorMessage(err)}`, { cause: err });
    }
  }

  private indent(): string {
    return "  ".repeat(this.indentation);
  }

  private writeHeader(): void {
    const width = fmtFloat(this.width);
    const height = fmtFloat(this.height);
    this.write(
      [
        `<?xml version="1.0" encoding="UTF-8"?>`,
        `<svg xmlns="http://www.w3.org/2000/svg"`,
        `     xmlns:xlink="http://www.w3.org/1999/xlink"`,
        `     version="1.1"`,
        `     width="${width}mm" height="${height}mm" viewBox="0 0 ${width} ${height}"`,
        `     stroke="${fmtColor(this.defaults.strokeColor)}"`,
        `     fill="${fmtColor(this.defaults.fillColor)}"`,
        `     stroke-width="${fmtFloat(this.defaults.lineWidth.abs)}">`,
        "",
      ].join("\n"),
    );
  }

  private ensureDrawable(operation: string): void {
    if (this.currentState === "finished") {
      throw new BackendStateError(`Cannot ${operation} after the document is finished`);
    }
    this.currentState = "drawing";
  }

  // ---- Property frames ----

  pushPropertyFrame(properties: readonly ResolvedProperty[]): void {
    this.ensureDrawable("push properties");

    const frame: PropertyFrame = { entries: new Map(), hasGroup: false };
    for (const property of properties) {
      // A later declaration of a channel replaces an earlier one in the same frame
      frame.entries.set(property.channel, {
        scalar: property.primitives.length === 1,
        property,
      });
      // Includes accumulate for the whole document instead
      for (const value of property.primitives) {
        if (value.kind === "jsInclude") this.includeScript(value);
      }
    }

    let attrs = "";
    for (const [channel, entry] of frame.entries) {
      const history = this.channelHistory.get(channel) ?? [];
      history.push(entry);
      this.channelHistory.set(channel, history);

      if (entry.scalar) {
        attrs += this.attribute(entry.property.primitives[0]);
      }
    }

    this.propertyStack.push(frame);
    if (attrs === "") return;

    this.write(`${this.indent()}<g${attrs}>\n`);
    frame.hasGroup = true;
    this.indentation++;
  }

  popPropertyFrame(): void {
    const frame = this.propertyStack.pop();
    if (!frame) {
      throw new BackendStateError("popPropertyFrame called with no frame on the stack");
    }

    if (frame.hasGroup) {
      this.indentation--;
      this.write(`${this.indent()}</g>\n`);
    }

    for (const channel of frame.entries.keys()) {
      const history = this.channelHistory.get(channel);
      history?.pop();
      if (history?.length === 0) this.channelHistory.delete(channel);
    }
  }

  /** Number of frames currently pushed. */
  get frameDepth(): number {
    return this.propertyStack.length;
  }

  /**
   * Channels whose deepest active entry is a vector. A deeper scalar masks a
   * shallower vector of the same channel.
   */
  private activeVectors(): FrameEntry[] {
    const vectors: FrameEntry[] = [];
    for (const history of this.channelHistory.values()) {
      const top = history[history.length - 1];
      if (top && !top.scalar) vectors.push(top);
    }
    return vectors;
  }

  // ---- Drawing ----

  drawForm(form: ResolvedForm): void {
    this.ensureDrawable("draw");

    const count = form.primitives.length;
    const vectors = this.activeVectors();
    for (const entry of vectors) {
      if (entry.property.primitives.length !== count) {
        throw new BatchLengthMismatchError(
          entry.property.channel,
          count,
          entry.property.primitives.length,
        );
      }
    }

    const elements: string[] = [];
    form.primitives.forEach((shape, idx) => {
      const attrs = vectors
        .map((entry) => this.attribute(entry.property.primitives[idx]))
        .join("");
      const element = this.element(shape, attrs);
      if (element !== null) elements.push(`${this.indent()}${element}\n`);
    });

    if (elements.length > 0) this.write(elements.join(""));
  }

  private element(shape: ResolvedShape, attrs: string): string | null {
    switch (shape.kind) {
      case "rectangle":
        if (!allFinite(shape.x, shape.y, shape.width, shape.height)) return null;
        return `<rect x="${fmtFloat(shape.x)}" y="${fmtFloat(shape.y)}" width="${fmtFloat(shape.width)}" height="${fmtFloat(shape.height)}"${attrs}/>`;

      case "circle":
        if (!allFinite(shape.cx, shape.cy, shape.r)) return null;
        return `<circle cx="${fmtFloat(shape.cx)}" cy="${fmtFloat(shape.cy)}" r="${fmtFloat(shape.r)}"${attrs}/>`;

      case "ellipse": {
        const { center, xPoint, yPoint } = shape;
        const rx = Math.hypot(xPoint.x - center.x, xPoint.y - center.y);
        const ry = Math.hypot(yPoint.x - center.x, yPoint.y - center.y);
        const theta = (Math.atan2(xPoint.y - center.y, xPoint.x - center.x) * 180) / Math.PI;
        if (!allFinite(center.x, center.y, rx, ry, theta)) return null;

        const cx = fmtFloat(center.x);
        const cy = fmtFloat(center.y);
        const rotate =
          Math.abs(theta) > 1e-4 ? ` transform="rotate(${fmtFloat(theta)} ${cx} ${cy})"` : "";
        return `<ellipse cx="${cx}" cy="${cy}" rx="${fmtFloat(rx)}" ry="${fmtFloat(ry)}"${rotate}${attrs}/>`;
      }

      case "polygon":
      case "lines": {
        const d = pathData(shape.points, shape.kind === "polygon");
        if (d === "") return null;
        return `<path d="${d}"${attrs}/>`;
      }

      case "curve": {
        const points = [shape.anchor0, shape.ctrl0, shape.ctrl1, shape.anchor1];
        if (!points.every((p) => allFinite(p.x, p.y))) return null;
        const [a0, c0, c1, a1] = points.map((p) => `${fmtFloat(p.x)},${fmtFloat(p.y)}`);
        return `<path d="M${a0} C${c0} ${c1} ${a1}"${attrs}/>`;
      }

      case "text": {
        if (!allFinite(shape.x, shape.y)) return null;
        const x = fmtFloat(shape.x);
        const y = fmtFloat(shape.y);
        let textAttrs = "";
        if (shape.halign === "center") textAttrs += ` text-anchor="middle"`;
        else if (shape.halign === "right") textAttrs += ` text-anchor="end"`;
        if (shape.valign === "center") textAttrs += ` dominant-baseline="central"`;
        else if (shape.valign === "top") textAttrs += ` dominant-baseline="text-before-edge"`;
        if (shape.rotation !== 0) {
          textAttrs += ` transform="rotate(${fmtFloat(shape.rotation)}, ${x}, ${y})"`;
        }
        return `<text x="${x}" y="${y}"${textAttrs}${attrs}>${escapeXml(shape.value)}</text>`;
      }

      case "bitmap": {
        if (!allFinite(shape.x, shape.y, shape.width, shape.height)) return null;
        const href = `data:${escapeXml(shape.mime)};base64,${Buffer.from(shape.data).toString("base64")}`;
        return `<image x="${fmtFloat(shape.x)}" y="${fmtFloat(shape.y)}" width="${fmtFloat(shape.width)}" height="${fmtFloat(shape.height)}" xlink:href="${href}"${attrs}/>`;
      }
    }
  }

  // ---- Attributes ----

  private attribute(value: ResolvedPropertyValue): string {
    switch (value.kind) {
      case "stroke":
        return ` stroke="${fmtColor(value.color)}"`;
      case "fill":
        return ` fill="${fmtColor(value.color)}"`;
      case "lineWidth":
        return ` stroke-width="${fmtFloat(value.value)}"`;
      case "strokeDash":
        return value.pattern.length === 0
          ? ` stroke-dasharray="none"`
          : ` stroke-dasharray="${value.pattern.map(fmtFloat).join(",")}"`;
      case "lineCap":
        return ` stroke-linecap="${value.value}"`;
      case "lineJoin":
        return ` stroke-linejoin="${value.value}"`;
      case "fillOpacity":
        return ` fill-opacity="${fmtFloat(value.value)}"`;
      case "strokeOpacity":
        return ` stroke-opacity="${fmtFloat(value.value)}"`;
      case "visible":
        return ` visibility="${value.value ? "visible" : "hidden"}"`;
      case "clip":
        return ` clip-path="url(#${this.clipPathId(value.points)})"`;
      case "font":
        return ` font-family="${escapeXml(value.family)}"`;
      case "fontSize":
        return ` font-size="${fmtFloat(value.value)}"`;
      case "svgId":
        return ` id="${escapeXml(value.value)}"`;
      case "svgClass":
        return ` class="${escapeXml(value.value)}"`;
      case "svgAttribute":
        return ` ${value.name}="${escapeXml(value.value)}"`;
      case "jsCall": {
        if (this.defaults.scriptMode === "none") return "";
        const event = value.event.startsWith("on") ? value.event : `on${value.event}`;
        return ` ${event}="${this.scriptName(value.code)}(evt)"`;
      }
      case "jsInclude":
        return "";
    }
  }

  /** Identical clip geometry shares one definition. */
  private clipPathId(points: readonly { x: number; y: number }[]): string {
    const d = pathData(points, true);
    let id = this.clipPaths.get(d);
    if (id === undefined) {
      id = this.clipPaths.size + 1;
      this.clipPaths.set(d, id);
    }
    return `clippath${id}`;
  }

  /** Function name for a script fragment, assigned on first attachment. */
  private scriptName(code: string): string {
    for (const [name, existing] of this.scripts) {
      if (existing === code) return name;
    }
    const name = `js_fn${this.scripts.size + 1}`;
    this.scripts.set(name, code);
    return name;
  }

  private includeScript(value: { source: string; code?: string }): void {
    const mode = this.defaults.scriptMode;
    if (mode === "none" || mode === "exclude") return;

    if (mode === "embed" && value.code !== undefined) {
      this.embeddedObjects.add(
        `<script type="application/ecmascript"><![CDATA[\n${value.code}\n]]></script>`,
      );
      return;
    }

    const isUrl = /^[a-z][a-z0-9+.-]*:\/\//i.test(value.source);
    const href = mode === "linkabs" && !isUrl ? resolve(value.source) : value.source;
    this.embeddedObjects.add(
      `<script type="application/ecmascript" xlink:href="${escapeXml(href)}"></script>`,
    );
  }

  // ---- Lifecycle ----

  /**
   * Close open frames, write embedded fragments, scripts and clip-path
   * definitions, then the closing tag. Calling it again does nothing.
   */
  finish(): void {
    if (this.currentState === "finished") return;

    while (this.propertyStack.length > 0) {
      this.popPropertyFrame();
    }

    for (const obj of this.embeddedObjects) {
      this.write(`${obj}\n`);
    }

    if (this.scripts.size > 0) {
      const functions = [...this.scripts]
        .map(([name, code]) => `function ${name}(evt) {\n${code}\n}\n\n`)
        .join("");
      this.write(
        `<script type="application/ecmascript"><![CDATA[\n${functions}]]></script>\n`,
      );
    }

    if (this.clipPaths.size > 0) {
      const defs = [...this.clipPaths]
        .map(([d, id]) => `<clipPath id="clippath${id}">\n  <path d="${d}"/>\n</clipPath>\n`)
        .join("");
      this.write(`<defs>\n${defs}</defs>\n`);
    }

    this.write("</svg>\n");
    this.sink.flush?.();
    if (this.ownsSink) this.sink.close?.();

    this.currentState = "finished";

    if (this.display && this.sink instanceof BufferSink) {
      this.display(this.sink.toString());
    }
  }

  /**
   * Drop the document without writing its footer. An owned sink is closed;
   * what it already holds is incomplete. Does nothing once finished.
   */
  abort(): void {
    if (this.currentState === "finished") return;

    this.currentState = "finished";
    this.indentation = 0;
    this.propertyStack = [];
    this.channelHistory = new Map();
    if (this.ownsSink) this.sink.close?.();
  }

  /**
   * Start a new document on the same sink. Fails when the sink cannot be
   * rewound, such as a caller-owned stream.
   */
  reset(): void {
    if (!this.sink.rewind) {
      throw new SinkError("Backend can't be reused, since the output stream is not seekable");
    }
    this.sink.rewind();

    this.currentState = "open";
    this.indentation = 0;
    this.propertyStack = [];
    this.channelHistory = new Map();
    this.clipPaths = new Map();
    this.scripts = new Map();
    this.embeddedObjects = new Set();
    this.writeHeader();
  }
}

function allFinite(...values: number[]): boolean {
  return values.every(Number.isFinite);
}

function absoluteSize(name: string, value: MeasureLike): number {
  const m = toMeasure(value);
  if (!isAbsolute(m) || m.abs < 0) {
    throw new UnitResolutionError(
      `SVG image ${name} must be a non-negative absolute length, got "${formatMeasure(m)}"`,
    );
  }
  return m.abs;
}
