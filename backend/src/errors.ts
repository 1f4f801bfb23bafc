/**
 * Error taxonomy for the chart pipeline. Every failure carries a stable `code`
 * plus the details a strategy author needs to fix the configuration.
 */
export class ChartError extends Error {
  code: string;
  details?: Record<string, unknown>;

  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "ChartError";
    this.code = code;
    this.details = details;

    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UnknownIndicatorError extends ChartError {
  readonly indicator: string;

  constructor(indicator: string) {
    super("UNKNOWN_INDICATOR", `Unknown indicator: ${indicator}`, { indicator });
    this.name = "UnknownIndicatorError";
    this.indicator = indicator;
  }
}

export class UnknownThemeError extends ChartError {
  readonly theme: string;

  constructor(theme: string, supported: readonly string[]) {
    super("UNKNOWN_THEME", `Unknown theme "${theme}" (supported: ${supported.join(", ")})`, {
      theme,
      supported: [...supported]
    });
    this.name = "UnknownThemeError";
    this.theme = theme;
  }
}

export class UnknownRequestError extends ChartError {
  readonly indicator: string;

  constructor(indicator: string) {
    super("UNKNOWN_REQUEST", `Indicator "${indicator}" has not been added to the plot configuration`, {
      indicator
    });
    this.name = "UnknownRequestError";
    this.indicator = indicator;
  }
}

export class MissingInputColumnError extends ChartError {
  readonly indicator: string;
  readonly column: string;

  constructor(indicator: string, column: string) {
    super("MISSING_INPUT_COLUMN", `${indicator}: price data has no "${column}" column`, { indicator, column });
    this.name = "MissingInputColumnError";
    this.indicator = indicator;
    this.column = column;
  }
}

export class InvalidParameterError extends ChartError {
  readonly indicator: string;
  readonly parameter: string;

  constructor(indicator: string, parameter: string, reason: string) {
    super("INVALID_PARAMETER", `${indicator}: invalid parameter "${parameter}": ${reason}`, {
      indicator,
      parameter,
      reason
    });
    this.name = "InvalidParameterError";
    this.indicator = indicator;
    this.parameter = parameter;
  }
}

export class InvalidPriceDataError extends ChartError {
  constructor(reason: string, details?: Record<string, unknown>) {
    super("INVALID_PRICE_DATA", `Invalid price data: ${reason}`, details);
    this.name = "InvalidPriceDataError";
  }
}

export class ConfigError extends ChartError {
  constructor(key: string, reason: string) {
    super("CONFIG_ERROR", `Invalid configuration ${key}: ${reason}`, { key });
    this.name = "ConfigError";
  }
}

export class ArtifactWriteError extends ChartError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("ARTIFACT_WRITE_FAILED", `Failed to write chart to ${path}: ${reason}`, { path });
    this.name = "ArtifactWriteError";
    this.path = path;
  }
}
