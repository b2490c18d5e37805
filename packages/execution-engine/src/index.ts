export * from "./executionProvider";
export { PaperAccount } from "./paperAccount";
export type { PaperAccountSnapshot, ClosedTrade } from "./paperAccount";
export * from "./paperExecutionProvider";
