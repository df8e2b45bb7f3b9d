export type MetricsErrorCode =
  | "invalid_series_definition"
  | "duplicate_series"
  | "unknown_series"
  | "label_mismatch"
  | "invalid_delta"
  | "invalid_observation"
  | "exposition_failed"
  | "exposition_parse_failed";

export class MetricsError extends Error {
  readonly code: MetricsErrorCode;

  constructor(code: MetricsErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidSeriesDefinitionError extends MetricsError {
  constructor(message: string) {
    super("invalid_series_definition", message);
  }
}

// Fatal at startup: two call sites disagree about a series.
export class DuplicateSeriesError extends MetricsError {
  constructor(readonly seriesName: string, detail: string) {
    super("duplicate_series", `Series "${seriesName}" is already registered with ${detail}`);
  }
}

export class UnknownSeriesError extends MetricsError {
  constructor(readonly seriesName: string, detail = "not registered in this registry") {
    super("unknown_series", `Series "${seriesName}" is ${detail}`);
  }
}

export class LabelMismatchError extends MetricsError {
  constructor(readonly seriesName: string, expected: readonly string[], received: readonly string[]) {
    super(
      "label_mismatch",
      `Series "${seriesName}" expects labels [${expected.join(", ")}], got [${received.join(", ")}]`
    );
  }
}

export class InvalidDeltaError extends MetricsError {
  constructor(readonly seriesName: string, readonly delta: number) {
    super("invalid_delta", `Counter "${seriesName}" cannot be incremented by ${delta}`);
  }
}

export class InvalidObservationError extends MetricsError {
  constructor(readonly seriesName: string, readonly value: number) {
    super("invalid_observation", `Histogram "${seriesName}" rejected observation ${value}`);
  }
}

export class ExpositionError extends MetricsError {
  constructor(message: string, cause: unknown) {
    super("exposition_failed", message, { cause });
  }
}

export class ExpositionParseError extends MetricsError {
  constructor(readonly line: number, detail: string) {
    super("exposition_parse_failed", `Line ${line}: ${detail}`);
  }
}

export function isMetricsError(err: unknown): err is MetricsError {
  return err instanceof MetricsError;
}
