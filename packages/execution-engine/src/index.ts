export { PaperExecutionClient } from "./paperExecutionClient";
export type { PaperExecutionOptions, PaperFill } from "./paperExecutionClient";
