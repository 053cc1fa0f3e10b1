import { afterEach, describe, expect, it } from "vitest";
import type { Backend } from "../src/backend/backend.js";
import {
  createNativeBackend,
  hasNativeRenderer,
  registerNativeRenderer,
  unregisterNativeRenderer,
} from "../src/backend/native-backends.js";
import { getDefaults } from "../src/config/defaults.js";
import { UnsupportedBackendError } from "../src/errors.js";
import { toMeasure } from "../src/types/measure.js";

afterEach(() => {
  unregisterNativeRenderer("png");
});

function stubBackend(width: number, height: number): Backend {
  return {
    width,
    height,
    defaults: getDefaults(),
    state: "open",
    rootBox: () => ({ x0: 0, y0: 0, width, height }),
    pushPropertyFrame: () => undefined,
    popPropertyFrame: () => undefined,
    drawForm: () => undefined,
    finish: () => undefined,
    abort: () => undefined,
    reset: () => undefined,
  };
}

describe("native backends", () => {
  it("fails before drawing when no renderer is registered", () => {
    expect(hasNativeRenderer("pdf")).toBe(false);
    expect(() => createNativeBackend("pdf", "out.pdf", 10, 10)).toThrow(UnsupportedBackendError);
    expect(() => createNativeBackend("ps", "out.ps", 10, 10)).toThrow(
      'No native renderer is registered for "ps" output. Register one with registerNativeRenderer() or render to SVG.',
    );
  });

  it("delegates to a registered renderer", () => {
    const targets: unknown[] = [];
    registerNativeRenderer({
      format: "png",
      create(target, width, height) {
        targets.push(target);
        return stubBackend(toMeasure(width).abs, toMeasure(height).abs);
      },
    });

    expect(hasNativeRenderer("png")).toBe(true);
    const backend = createNativeBackend("png", "out.png", 30, 20);
    expect(backend.rootBox()).toEqual({ x0: 0, y0: 0, width: 30, height: 20 });
    expect(targets).toEqual(["out.png"]);
  });

  it("forgets an unregistered renderer", () => {
    registerNativeRenderer({ format: "png", create: () => stubBackend(1, 1) });
    unregisterNativeRenderer("png");
    expect(() => createNativeBackend("png", "out.png", 1, 1)).toThrow(UnsupportedBackendError);
  });
});
