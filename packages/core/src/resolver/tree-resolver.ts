import type { Backend } from "../backend/backend.js";
import { boundingBox } from "../compose/context.js";
import type { AbsoluteBox, UnitBox } from "../types/geometry.js";
import { h, w } from "../types/measure.js";
import type { RenderEvent, ResolvedProperty } from "../types/resolved.js";
import type { ContextNode, SceneNode } from "../types/scene.js";
import { DEFAULT_UNIT_BOX, inheritUnitBox, resolveBox } from "./measure-resolver.js";
import { resolveForm, resolveProperty } from "./primitive-resolver.js";

/**
 * Depth-first traversal of a scene, yielding the push/draw/pop calls a
 * backend receives. Nothing is materialised ahead of the consumer.
 *
 * At each context:
 * 1. its box is resolved against the parent's resolved box
 * 2. each run of consecutive property children becomes one frame, and all
 *    frames are pushed in declaration order
 * 3. the remaining children are visited in order
 * 4. the frames are popped in reverse
 */
export function* walkScene(
  root: ContextNode,
  rootBox: AbsoluteBox,
  rootUnits: UnitBox = DEFAULT_UNIT_BOX,
): Generator<RenderEvent, void, undefined> {
  yield* walkContext(root, rootBox, rootUnits);
}

function* walkContext(
  ctx: ContextNode,
  parentBox: AbsoluteBox,
  parentUnits: UnitBox,
): Generator<RenderEvent, void, undefined> {
  const box = resolveBox(ctx.box, parentBox, parentUnits);
  const units = inheritUnitBox(parentUnits, ctx.unitBox);

  const frames: ResolvedProperty[][] = [];
  const rest: SceneNode[] = [];
  let run: ResolvedProperty[] | null = null;

  for (const child of ctx.children) {
    if (child.kind === "property") {
      if (!run) {
        run = [];
        frames.push(run);
      }
      run.push(resolveProperty(child, box, units));
    } else if (child.kind !== "empty") {
      run = null;
      rest.push(child);
    }
  }

  for (const properties of frames) {
    yield { type: "push", properties };
  }

  for (const child of rest) {
    yield* walkChild(child, box, units);
  }

  for (let i = 0; i < frames.length; i++) {
    yield { type: "pop" };
  }
}

function* walkChild(
  child: SceneNode,
  box: AbsoluteBox,
  units: UnitBox,
): Generator<RenderEvent, void, undefined> {
  switch (child.kind) {
    case "context":
      yield* walkContext(child, box, units);
      return;
    case "form":
      yield { type: "draw", form: resolveForm(child, box, units) };
      return;
    case "deferred": {
      const built = child.build(box, units);
      const ctx: ContextNode =
        built.kind === "context"
          ? built
          : { kind: "context", box: boundingBox(0, 0, w(1), h(1)), children: [built] };
      yield* walkContext(ctx, box, units);
      return;
    }
    case "property":
    case "empty":
      return;
  }
}

/** Root unit box carrying the backend's default font size. */
export function rootUnitBox(backend: Backend): UnitBox {
  return { ...DEFAULT_UNIT_BOX, fontSize: backend.defaults.fontSize.abs };
}

/**
 * Render a scene into a backend and finish the document. A failure part-way
 * aborts the backend before the error is rethrown.
 */
export function drawScene(backend: Backend, root: ContextNode): void {
  try {
    for (const event of walkScene(root, backend.rootBox(), rootUnitBox(backend))) {
      switch (event.type) {
        case "push":
          backend.pushPropertyFrame(event.properties);
          break;
        case "draw":
          backend.drawForm(event.form);
          break;
        case "pop":
          backend.popPropertyFrame();
          break;
      }
    }
    backend.finish();
  } catch (err) {
    backend.abort();
    throw err;
  }
}

export interface SceneStats {
  forms: number;
  primitives: number;
  frames: number;
  maxFrameDepth: number;
}

/**
 * Walk a scene without drawing it. Resolves every measure, so unit
 * resolution errors surface here too.
 */
export function countScene(
  root: ContextNode,
  rootBox: AbsoluteBox,
  rootUnits: UnitBox = DEFAULT_UNIT_BOX,
): SceneStats {
  const stats: SceneStats = { forms: 0, primitives: 0, frames: 0, maxFrameDepth: 0 };
  let depth = 0;

  for (const event of walkScene(root, rootBox, rootUnits)) {
    if (event.type === "push") {
      stats.frames++;
      depth++;
      stats.maxFrameDepth = Math.max(stats.maxFrameDepth, depth);
    } else if (event.type === "pop") {
      depth--;
    } else {
      stats.forms++;
      stats.primitives += event.form.primitives.length;
    }
  }

  return stats;
}
