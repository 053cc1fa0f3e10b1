import { describe, expect, it } from "vitest";
import { EMPTY, compose, context } from "../src/compose/context.js";
import {
  circle,
  ellipse,
  polygon,
  rectangle,
  text,
} from "../src/compose/forms.js";
import {
  clip,
  fill,
  isScalarProperty,
  jsCall,
  property,
  stroke,
  strokeDash,
  svgAttribute,
} from "../src/compose/properties.js";
import { PropertyBatchError } from "../src/errors.js";
import { h, mm, w } from "../src/types/measure.js";

describe("context", () => {
  it("defaults to the whole parent box", () => {
    const ctx = context();
    expect(ctx.box).toEqual({ x0: mm(0), y0: mm(0), width: w(1), height: h(1) });
    expect(ctx.children).toEqual([]);
  });

  it("records a unit box and minimum sizes", () => {
    const ctx = context(0, 0, w(1), h(1), {
      units: { x0: 0, y0: 0, width: 10, height: 10 },
      minWidth: 30,
    });
    expect(ctx.unitBox).toEqual({ x0: 0, y0: 0, width: 10, height: 10 });
    expect(ctx.minWidth).toBe(30);
    expect(ctx.minHeight).toBeUndefined();
  });
});

describe("compose", () => {
  it("returns a new context and leaves the parent untouched", () => {
    const parent = context();
    const composed = compose(parent, rectangle());
    expect(composed).not.toBe(parent);
    expect(parent.children).toHaveLength(0);
    expect(composed.children).toHaveLength(1);
  });

  it("drops empty nodes", () => {
    const parent = context();
    expect(compose(parent, EMPTY)).toBe(parent);
    expect(compose(parent, EMPTY, circle(), EMPTY).children.map((c) => c.kind)).toEqual(["form"]);
  });

  it("composes nested lists into their head context first", () => {
    const child = context(w(0.5), 0, w(0.5), h(1));
    const root = compose(context(), [child, rectangle(), fill("red")]);
    expect(root.children).toHaveLength(1);

    const [nested] = root.children;
    expect(nested.kind).toBe("context");
    if (nested.kind === "context") {
      expect(nested.box.x0).toEqual(w(0.5));
      expect(nested.children.map((c) => c.kind)).toEqual(["form", "property"]);
    }
  });

  it("lets one context be composed into several parents", () => {
    const shared = compose(context(), circle());
    const a = compose(context(), shared);
    const b = compose(context(0, 0, mm(10), mm(10)), shared);
    expect(a.children[0]).toBe(shared);
    expect(b.children[0]).toBe(shared);
  });
});

describe("forms", () => {
  it("defaults a rectangle to the whole box", () => {
    const [shape] = rectangle().primitives;
    expect(shape).toEqual({
      kind: "rectangle",
      corner: { x: mm(0), y: mm(0) },
      width: w(1),
      height: h(1),
    });
  });

  it("describes an ellipse by its centre and two axis points", () => {
    const [shape] = ellipse(mm(5), mm(6), mm(2), mm(1)).primitives;
    expect(shape.kind).toBe("ellipse");
    if (shape.kind === "ellipse") {
      expect(shape.xPoint.x.abs).toBe(7);
      expect(shape.xPoint.y.abs).toBe(6);
      expect(shape.yPoint.y.abs).toBe(7);
    }
  });

  it("makes one polygon per point list", () => {
    const node = polygon(
      [[0, 0], [1, 0], [1, 1]],
      [[2, 2], [3, 2], [3, 3]],
    );
    expect(node.primitives).toHaveLength(2);
  });

  it("freezes every shape so a shared form cannot change", () => {
    const shared = rectangle();
    const parent = compose(context(), shared);
    const [shape] = shared.primitives;

    expect(Object.isFrozen(shape)).toBe(true);
    expect(Reflect.set(shape, "kind", "circle")).toBe(false);
    expect(parent.children[0]).toBe(shared);
    expect(shape.kind).toBe("rectangle");
  });

  it("freezes the points of a path", () => {
    const [shape] = polygon([[0, 0], [1, 0], [1, 1]]).primitives;
    expect(shape.kind === "polygon" && Object.isFrozen(shape.points)).toBe(true);
    expect(shape.kind === "polygon" && Object.isFrozen(shape.points[0])).toBe(true);
  });

  it("fills in text defaults", () => {
    const [shape] = text(mm(1), mm(2), "label").primitives;
    expect(shape).toMatchObject({ kind: "text", value: "label", halign: "left", valign: "bottom", rotation: 0 });
  });
});

describe("properties", () => {
  it("builds scalar and vector batches", () => {
    expect(isScalarProperty(fill("red"))).toBe(true);
    const vector = fill(["red", "blue", null]);
    expect(vector.channel).toBe("fill");
    expect(vector.primitives).toHaveLength(3);
    expect(isScalarProperty(vector)).toBe(false);
  });

  it("makes one dash pattern per argument", () => {
    expect(strokeDash([1, 2]).primitives).toHaveLength(1);
    expect(strokeDash([1, 2], [3]).primitives).toHaveLength(2);
  });

  it("gives each custom attribute its own channel", () => {
    expect(svgAttribute("data-x", ["1", "2"]).channel).toBe("svgAttribute:data-x");
    expect(svgAttribute("data-y", "1").channel).toBe("svgAttribute:data-y");
  });

  it("freezes each value of a batch", () => {
    const node = clip([[0, 0], [1, 0], [1, 1]]);
    const [value] = node.primitives;
    expect(Object.isFrozen(value)).toBe(true);
    expect(value.kind === "clip" && Object.isFrozen(value.points)).toBe(true);
    expect(Reflect.set(fill("red").primitives[0], "color", "blue")).toBe(false);
  });

  it("accepts prefixed attribute names", () => {
    expect(svgAttribute("xml:space", "preserve").channel).toBe("svgAttribute:xml:space");
  });

  it("rejects attribute names that would break the markup", () => {
    expect(() => svgAttribute('x" onload="alert(1)', "v")).toThrow(PropertyBatchError);
    expect(() => svgAttribute("", "v")).toThrow('"" is not a valid attribute name');
    expect(() => jsCall("click()", "f()")).toThrow('"click()" is not a valid event name');
  });

  it("rejects empty batches", () => {
    expect(() => property([])).toThrow(PropertyBatchError);
    expect(() => stroke([])).toThrow("A property batch needs at least one value");
  });

  it("rejects batches mixing channels", () => {
    expect(() =>
      property([
        { kind: "fill", color: "red" },
        { kind: "stroke", color: "red" },
      ]),
    ).toThrow('A property batch holds one channel, found "fill" and "stroke"');
  });
});
