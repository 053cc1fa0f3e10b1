export { renderSvg, createBackend } from "./render-svg.js";
export type { SvgRenderOptions, CreateBackendOptions } from "./render-svg.js";
export { SvgBackend } from "./svg-backend.js";
export type { SvgBackendOptions } from "./svg-backend.js";
export { BufferSink, FileSink, streamSink } from "./sink.js";
export type { Sink } from "./sink.js";
export { fmtFloat, fmtColor, escapeXml } from "./svg-format.js";
export { pathData, splitSubpaths } from "./svg-path.js";
