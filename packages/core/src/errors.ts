export type VellumErrorCode =
  | "CONFIGURATION"
  | "UNIT_RESOLUTION"
  | "MEASURE_COMPARISON"
  | "BATCH_LENGTH_MISMATCH"
  | "PROPERTY_BATCH"
  | "UNSUPPORTED_BACKEND"
  | "SINK"
  | "BACKEND_STATE"
  | "SCENE_PARSE";

/**
 * Base class for every error raised by the engine.
 * The `code` property identifies the failure; prefer it over `instanceof`
 * when errors cross package boundaries.
 */
export class VellumError extends Error {
  readonly code: VellumErrorCode;

  constructor(code: VellumErrorCode, message: string) {
    super(message);
    this.name = "VellumError";
    this.code = code;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Unsupported format, mode or default value passed to a setter. */
export class ConfigurationError extends VellumError {
  constructor(message: string) {
    super("CONFIGURATION", message);
    this.name = "ConfigurationError";
  }
}

/** A measure needs an ambient dimension the current box does not provide. */
export class UnitResolutionError extends VellumError {
  constructor(message: string) {
    super("UNIT_RESOLUTION", message);
    this.name = "UnitResolutionError";
  }
}

export class MeasureComparisonError extends VellumError {
  constructor(message: string) {
    super("MEASURE_COMPARISON", message);
    this.name = "MeasureComparisonError";
  }
}

/** A vector property and the form it is applied to have different lengths. */
export class BatchLengthMismatchError extends VellumError {
  readonly formLength: number;
  readonly propertyLength: number;

  constructor(channel: string, formLength: number, propertyLength: number) {
    super(
      "BATCH_LENGTH_MISMATCH",
      `Vector form and vector property differ in length: ${formLength} primitive(s) but ${propertyLength} "${channel}" value(s)`,
    );
    this.name = "BatchLengthMismatchError";
    this.formLength = formLength;
    this.propertyLength = propertyLength;
  }
}

/** Empty or mixed-channel property batch, or an attribute name markup cannot carry. */
export class PropertyBatchError extends VellumError {
  constructor(message: string) {
    super("PROPERTY_BATCH", message);
    this.name = "PropertyBatchError";
  }
}

export class UnsupportedBackendError extends VellumError {
  constructor(message: string) {
    super("UNSUPPORTED_BACKEND", message);
    this.name = "UnsupportedBackendError";
  }
}

/** I/O failure on an output sink, or a sink that cannot be rewound. */
export class SinkError extends VellumError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("SINK", message);
    this.name = "SinkError";
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export class BackendStateError extends VellumError {
  constructor(message: string) {
    super("BACKEND_STATE", message);
    this.name = "BackendStateError";
  }
}

export class SceneParseError extends VellumError {
  constructor(message: string) {
    super("SCENE_PARSE", message);
    this.name = "SceneParseError";
  }
}

/** Render an unknown thrown value as a message string. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
