export * from "./loop/InstrumentLoop";
export * from "./feedHealth";
export * from "./marketStats";
export * from "./indicatorProvider";
export * from "./orchestrator";
export * from "./replay/replaySession";
export * from "./replay/runReplay";
