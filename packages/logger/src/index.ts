export { Logger } from "tslog";
export { createJsonLogger, createLogger, diagramLogger } from "./logger";
export type { AppLogObj, LogMode } from "./logger";
