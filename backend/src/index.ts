export * from "./types.js";
export * from "./errors.js";
export * from "./logger.js";
export * from "./config.js";
export * from "./priceSeries.js";
export * from "./calculations.js";
export * from "./indicators.js";
export * from "./builtinIndicators.js";
export * from "./calculator.js";
export * from "./themes.js";
export * from "./plotConfig.js";
export * from "./chartDocument.js";
export * from "./customIndicator.js";
export * from "./autoPlotter.js";
export * from "./htmlRenderer.js";
export * from "./legacyRenderer.js";
export * from "./renderers.js";
export * from "./artifact.js";
export * from "./strategy.js";
export * from "./strategies.js";
export * from "./engine.js";
export * from "./db.js";
