export * from "./errors.js";
export * from "./types/measure.js";
export * from "./types/geometry.js";
export * from "./types/scene.js";
export * from "./types/resolved.js";
export type * from "./types/scene-config.js";
export * from "./compose/context.js";
export * from "./compose/forms.js";
export * from "./compose/properties.js";
export * from "./config/defaults.js";
export type { Backend, BackendState } from "./backend/backend.js";
export * from "./backend/native-backends.js";
export { parseMeasure, formatMeasure } from "./parser/measure-parser.js";
export { parseScene, type SceneDocument } from "./parser/scene-parser.js";
export {
  DEFAULT_UNIT_BOX,
  inheritUnitBox,
  resolveBox,
  resolveLength,
  resolvePoint,
  resolvePosition,
} from "./resolver/measure-resolver.js";
export {
  resolveForm,
  resolveProperty,
  resolvePropertyValue,
  resolveShape,
} from "./resolver/primitive-resolver.js";
export {
  countScene,
  drawScene,
  rootUnitBox,
  walkScene,
  type SceneStats,
} from "./resolver/tree-resolver.js";
export * from "./text/text-extents.js";
export * from "./layout/stack.js";
