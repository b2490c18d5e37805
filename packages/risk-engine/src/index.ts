export * from "./positionSizer";
export * from "./riskLevels";
export * from "./riskManager";
export * from "./guardrails";
export * from "./filters";
