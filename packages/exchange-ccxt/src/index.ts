export * from "./ccxtClient";
export * from "./ccxtOrderbookProvider";
export * from "./ccxtBarSource";
export * from "./ccxtExecutionProvider";
