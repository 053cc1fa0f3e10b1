import { afterEach, describe, expect, it } from "vitest";
import type { Backend, BackendState } from "../src/backend/backend.js";
import { EMPTY, boundingBox, compose, context, deferred } from "../src/compose/context.js";
import { circle, rectangle, text } from "../src/compose/forms.js";
import { fill, lineWidth, stroke } from "../src/compose/properties.js";
import { getDefaults, resetDefaults, setDefaultFont } from "../src/config/defaults.js";
import { countScene, drawScene, walkScene } from "../src/resolver/tree-resolver.js";
import type { AbsoluteBox } from "../src/types/geometry.js";
import { cx, cy, em, h, mm, pt, w } from "../src/types/measure.js";
import type { RenderEvent, ResolvedForm, ResolvedProperty } from "../src/types/resolved.js";
import type { ContextNode } from "../src/types/scene.js";

const square: AbsoluteBox = { x0: 0, y0: 0, width: 100, height: 100 };

function events(root: ContextNode, box: AbsoluteBox = square): RenderEvent[] {
  return [...walkScene(root, box)];
}

function draws(root: ContextNode, box: AbsoluteBox = square): ResolvedForm[] {
  return events(root, box).flatMap((e) => (e.type === "draw" ? [e.form] : []));
}

class RecordingBackend implements Backend {
  readonly width = 40;
  readonly height = 20;
  readonly defaults = getDefaults();
  state: BackendState = "open";
  calls: string[] = [];

  rootBox(): AbsoluteBox {
    return { x0: 0, y0: 0, width: this.width, height: this.height };
  }

  pushPropertyFrame(properties: readonly ResolvedProperty[]): void {
    this.calls.push(`push ${properties.map((p) => p.channel).join(",")}`);
  }

  popPropertyFrame(): void {
    this.calls.push("pop");
  }

  drawForm(form: ResolvedForm): void {
    this.calls.push(`draw ${form.primitives.map((p) => p.kind).join(",")}`);
  }

  finish(): void {
    this.calls.push("finish");
    this.state = "finished";
  }

  abort(): void {
    this.calls.push("abort");
    this.state = "finished";
  }

  reset(): void {
    this.calls = [];
    this.state = "open";
  }
}

afterEach(() => {
  resetDefaults();
});

describe("walkScene", () => {
  it("pushes one frame per run of properties before drawing", () => {
    const root = compose(
      context(),
      fill("red"),
      stroke("black"),
      rectangle(),
      lineWidth(1),
      circle(),
    );

    const seen = events(root);
    expect(seen.map((e) => e.type)).toEqual(["push", "push", "draw", "draw", "pop", "pop"]);

    const [first, second] = seen;
    expect(first.type === "push" && first.properties.map((p) => p.channel)).toEqual([
      "fill",
      "stroke",
    ]);
    expect(second.type === "push" && second.properties.map((p) => p.channel)).toEqual([
      "lineWidth",
    ]);
  });

  it("keeps a run going across empty children", () => {
    const root: ContextNode = {
      kind: "context",
      box: boundingBox(0, 0, w(1), h(1)),
      children: [fill("red"), EMPTY, stroke("blue"), rectangle()],
    };
    expect(events(root).map((e) => e.type)).toEqual(["push", "draw", "pop"]);
  });

  it("balances pushes and pops through nested contexts", () => {
    const inner = compose(context(w(0.5), 0, w(0.5), h(1)), fill("blue"), circle());
    const root = compose(context(), fill("red"), circle(), inner, stroke("black"));

    let depth = 0;
    for (const e of events(root)) {
      if (e.type === "push") depth++;
      if (e.type === "pop") depth--;
      expect(depth).toBeGreaterThanOrEqual(0);
    }
    expect(depth).toBe(0);
  });

  it("resolves forms in their context's box", () => {
    const inner = compose(context(w(0.5), h(0.5), w(0.5), h(0.5)), rectangle());
    const [form] = draws(compose(context(), inner));
    expect(form.primitives).toEqual([
      { kind: "rectangle", x: 50, y: 50, width: 50, height: 50 },
    ]);
  });

  it("resolves properties in the box of the context declaring them", () => {
    const root = compose(context(), lineWidth(w(0.25)), rectangle());
    const [push] = events(root, { x0: 0, y0: 0, width: 8, height: 4 });
    expect(push).toEqual({
      type: "push",
      properties: [{ channel: "lineWidth", primitives: [{ kind: "lineWidth", value: 2 }] }],
    });
  });

  it("resolves unit-box coordinates", () => {
    const root = compose(
      context(0, 0, w(1), h(1), { units: { x0: 0, y0: 0, width: 10, height: 10 } }),
      circle(cx(5), cy(5), cx(1)),
    );
    const [form] = draws(root);
    expect(form.primitives).toEqual([{ kind: "circle", cx: 50, cy: 50, r: 10 }]);
  });

  it("wraps a deferred form in a context filling the box", () => {
    const lazy = deferred((box) => rectangle(0, 0, mm(box.width / 2), mm(box.height)));
    const root = compose(context(), compose(context(0, 0, mm(40), mm(20)), lazy));
    const [form] = draws(root);
    expect(form.primitives).toEqual([
      { kind: "rectangle", x: 0, y: 0, width: 20, height: 20 },
    ]);
  });

  it("walks a deferred context with its own properties", () => {
    const lazy = deferred(() => compose(context(), fill("green"), circle()));
    const seen = events(compose(context(), lazy));
    expect(seen.map((e) => e.type)).toEqual(["push", "draw", "pop"]);
  });

  it("yields nothing for an empty scene", () => {
    expect(events(context())).toEqual([]);
  });
});

describe("drawScene", () => {
  it("drives a backend and finishes the document", () => {
    const backend = new RecordingBackend();
    const root = compose(
      context(),
      fill("red"),
      rectangle(),
      compose(context(), stroke("black"), circle(), text(0, 0, "hi")),
    );

    drawScene(backend, root);

    expect(backend.calls).toEqual([
      "push fill",
      "draw rectangle",
      "push stroke",
      "draw circle",
      "draw text",
      "pop",
      "pop",
      "finish",
    ]);
    expect(backend.state).toBe("finished");
  });

  it("aborts the backend when drawing fails", () => {
    const backend = new RecordingBackend();
    backend.drawForm = () => {
      throw new Error("out of ink");
    };

    const root = compose(context(), fill("red"), rectangle(), circle());
    expect(() => drawScene(backend, root)).toThrow("out of ink");
    expect(backend.calls).toEqual(["push fill", "abort"]);
    expect(backend.state).toBe("finished");
  });

  it("resolves em against the backend's default font size", () => {
    setDefaultFont("Courier", pt(10));
    const resolved: ResolvedForm[] = [];
    const backend = new RecordingBackend();
    backend.drawForm = (form) => {
      resolved.push(form);
    };

    drawScene(backend, compose(context(), text(em(1), 0, "x")));

    const [shape] = resolved[0].primitives;
    expect(shape.kind === "text" && shape.x).toBeCloseTo((10 * 25.4) / 72, 10);
  });
});

describe("countScene", () => {
  it("counts forms, primitives and frames", () => {
    const root = compose(
      context(),
      fill(["red", "blue"]),
      circle(),
      compose(context(), stroke("black"), lineWidth(1), rectangle(), fill("green"), rectangle()),
    );

    expect(countScene(root, square)).toEqual({
      forms: 3,
      primitives: 3,
      frames: 3,
      maxFrameDepth: 3,
    });
  });

  it("surfaces unit resolution errors", () => {
    const root = compose(context(), text(em(2), 0, "x"));
    expect(() => countScene(root, square)).toThrow(
      "Cannot resolve 2em: no font size is known in this context",
    );
  });
});
