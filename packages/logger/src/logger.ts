import { formatWithOptions } from "node:util";
import { Logger, type ILogObj } from "tslog";

/**
 * Structured log object with the context fields renderers attach.
 */
export interface AppLogObj extends ILogObj {
	diagram?: string;
	node?: string;
	connector?: number;
	path?: string;
	count?: number;
	[key: string]: unknown;
}

/**
 * Log verbosity mode.
 */
export type LogMode = "silent" | "error" | "info" | "debug";

const MIN_LEVELS: Record<LogMode, number> = {
	silent: 7,
	error: 5,
	info: 3,
	debug: 2,
};

/**
 * Log lines go to stderr; stdout carries rendered output.
 */
function writeFormatted(logMetaMarkup: string, logArgs: unknown[], logErrors: string[]): void {
	const errors = (logErrors.length > 0 && logArgs.length > 0 ? "\n" : "") + logErrors.join("\n");
	process.stderr.write(`${logMetaMarkup}${formatWithOptions({ colors: process.stderr.isTTY }, ...logArgs)}${errors}\n`);
}

function writeJson(json: unknown): void {
	process.stderr.write(`${JSON.stringify(json)}\n`);
}

/**
 * Create a logger with human-readable pretty output.
 */
export function createLogger(
	name: string,
	mode: LogMode = "info",
): Logger<AppLogObj> {
	return new Logger<AppLogObj>({
		name,
		type: mode === "silent" ? "hidden" : "pretty",
		minLevel: MIN_LEVELS[mode],
		hideLogPositionForProduction: true,
		overwrite: { transportFormatted: writeFormatted },
	});
}

/**
 * Create a logger with structured JSON output.
 */
export function createJsonLogger(
	name: string,
	mode: LogMode = "debug",
): Logger<AppLogObj> {
	return new Logger<AppLogObj>({
		name,
		type: mode === "silent" ? "hidden" : "json",
		minLevel: MIN_LEVELS[mode],
		hideLogPositionForProduction: true,
		overwrite: { transportJSON: writeJson },
	});
}

/**
 * Child logger scoped to one diagram; every entry carries its id.
 */
export function diagramLogger(
	parent: Logger<AppLogObj>,
	diagramId: string,
): Logger<AppLogObj> {
	return parent.getSubLogger({ name: diagramId }, { diagram: diagramId });
}
