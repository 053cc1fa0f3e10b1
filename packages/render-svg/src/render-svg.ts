import type {
  Backend,
  BackendTarget,
  ContextNode,
  MeasureLike,
  OutputFormat,
  RenderDefaults,
} from "@vellum/core";
import {
  UnsupportedBackendError,
  createNativeBackend,
  drawScene,
  getDefaults,
} from "@vellum/core";
import { SvgBackend } from "./svg-backend.js";

export interface SvgRenderOptions {
  /** Image width; the default graphic width otherwise. */
  width?: MeasureLike;
  /** Image height; the default graphic height otherwise. */
  height?: MeasureLike;
  defaults?: Readonly<RenderDefaults>;
}

/**
 * Render a scene to an SVG document string.
 */
export function renderSvg(root: ContextNode, options?: SvgRenderOptions): string {
  const defaults = options?.defaults ?? getDefaults();
  const backend = SvgBackend.inMemory(
    options?.width ?? defaults.graphicWidth,
    options?.height ?? defaults.graphicHeight,
    { defaults },
  );
  drawScene(backend, root);
  return backend.getOutput();
}

export interface CreateBackendOptions {
  defaults?: Readonly<RenderDefaults>;
  display?: (svg: string) => void;
}

/**
 * Create a backend for an output format. "html" and "svg" produce SVG markup;
 * "png", "pdf" and "ps" need a registered native renderer. Without a target
 * the SVG backend buffers its output in memory.
 */
export function createBackend(
  format: OutputFormat,
  target: BackendTarget | undefined,
  width: MeasureLike,
  height: MeasureLike,
  options: CreateBackendOptions = {},
): Backend {
  switch (format) {
    case "html":
    case "svg":
      if (target === undefined) return SvgBackend.inMemory(width, height, options);
      if (typeof target === "string") return SvgBackend.toFile(target, width, height, options);
      return SvgBackend.toStream(target, width, height, options);

    case "png":
    case "pdf":
    case "ps":
      if (target === undefined) {
        throw new UnsupportedBackendError(`"${format}" output needs a file or stream target`);
      }
      return createNativeBackend(format, target, width, height);

    case "pgf":
      throw new UnsupportedBackendError(`"${format}" output is not supported`);
  }
}
