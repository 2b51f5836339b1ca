export type { UserErrorMessage } from "./types";
export { CLIErrors, CLIDescriptions } from "./cli";
export { ParseErrors } from "./parse";
export { RenderWarnings, formatMessage } from "./render";
