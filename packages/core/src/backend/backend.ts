import type { RenderDefaults } from "../config/defaults.js";
import type { AbsoluteBox } from "../types/geometry.js";
import type { ResolvedForm, ResolvedProperty } from "../types/resolved.js";

/**
 * Lifecycle of an output document:
 * open      - header written, nothing drawn yet
 * drawing   - frames pushed and forms drawn
 * finished  - footer and deferred tables written
 */
export type BackendState = "open" | "drawing" | "finished";

/**
 * Contract every output target implements. Tree traversal drives it with
 * strictly nested push/pop calls and draws forms against the live stack.
 */
export interface Backend {
  /** Document width in millimetres. */
  readonly width: number;
  /** Document height in millimetres. */
  readonly height: number;
  /** Defaults captured when the backend was created. */
  readonly defaults: Readonly<RenderDefaults>;
  readonly state: BackendState;

  rootBox(): AbsoluteBox;
  pushPropertyFrame(properties: readonly ResolvedProperty[]): void;
  popPropertyFrame(): void;
  drawForm(form: ResolvedForm): void;
  /** Idempotent. */
  finish(): void;
  /** Give up on a partly written document and release what the backend owns. */
  abort(): void;
  /** Start a fresh document on the same sink. */
  reset(): void;
}
