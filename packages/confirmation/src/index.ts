export * from "./orderbookProvider";
export * from "./confirmationGate";
export * from "./orderbookSampler";
