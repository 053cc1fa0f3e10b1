import { UnsupportedBackendError } from "../errors.js";
import type { MeasureLike } from "../types/measure.js";
import type { Backend } from "./backend.js";

export type NativeFormat = "png" | "pdf" | "ps";

/** Where a backend writes: a file path, or a caller-owned writable. */
export type BackendTarget = string | { write(chunk: string | Uint8Array): unknown };

/**
 * A raster or print renderer backed by a native graphics library.
 * Registered once at start-up by whatever package provides it.
 */
export interface NativeRenderer {
  readonly format: NativeFormat;
  create(target: BackendTarget, width: MeasureLike, height: MeasureLike): Backend;
}

const renderers = new Map<NativeFormat, NativeRenderer>();

export function registerNativeRenderer(renderer: NativeRenderer): void {
  renderers.set(renderer.format, renderer);
}

export function unregisterNativeRenderer(format: NativeFormat): void {
  renderers.delete(format);
}

export function hasNativeRenderer(format: NativeFormat): boolean {
  return renderers.has(format);
}

/**
 * Create a native backend. Fails before anything is drawn when no renderer
 * for the format has been registered.
 */
export function createNativeBackend(
  format: NativeFormat,
  target: BackendTarget,
  width: MeasureLike,
  height: MeasureLike,
): Backend {
  const renderer = renderers.get(format);
  if (!renderer) {
    throw new UnsupportedBackendError(
      `No native renderer is registered for "${format}" output. Register one with registerNativeRenderer() or render to SVG.`,
    );
  }
  return renderer.create(target, width, height);
}
