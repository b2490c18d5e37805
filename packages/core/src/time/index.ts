export * from "./constants";
export * from "./time";
export * from "./clock";
