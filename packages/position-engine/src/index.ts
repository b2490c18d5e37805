export * from "./position";
export * from "./positionLifecycleManager";
