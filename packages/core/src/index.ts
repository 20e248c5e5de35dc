export * from "./errors";
export * from "./logger";
export * from "./config/defaults";
export * from "./metrics/metrics";
export * from "./vision";
export * from "./filament";
