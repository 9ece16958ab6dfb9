export * from "./profiles/profile";
export * from "./reconcile/outcome";
export * from "./reconcile/report";
export * from "./reconcile/classify";
export * from "./health/health";
export * from "./constants";

export const DNSHA_VERSION = "0.1.0";
