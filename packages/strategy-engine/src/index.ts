export * from "./trendAggregator";
export * from "./hysteresis";
export * from "./patternZones";
export * from "./signalFusion";
