import type { CanvasPreset, CanvasSpec, ThemeSpec } from "@boxwire/parser";

/**
 * CLI subcommands.
 */
export enum Command {
    RENDER = "render",
}

/**
 * Process exit codes.
 */
export enum ExitCode {
    SUCCESS = 0,
    RENDER_ERROR = 1,
    CONFIG_ERROR = 2,
}

export type OutputFormat = "svg" | "json";

export const OUTPUT_FORMATS: readonly OutputFormat[] = ["svg", "json"];

export type OutputMode = "quiet" | "normal" | "verbose" | "json";

/**
 * Parsed command-line arguments.
 */
export interface RenderArgs {
    command: Command;
    /** Input document path */
    input: string;
    /** Output path; stdout when absent */
    output?: string;
    format?: OutputFormat;
    canvas?: CanvasPreset;
    configPath?: string;
    noConfig: boolean;
    verbose: boolean;
    quiet: boolean;
    jsonLogs: boolean;
    help: boolean;
    version: boolean;
}

/**
 * Settings read from a config file. Every key is optional.
 */
export interface FileConfig {
    canvas?: CanvasSpec;
    theme?: ThemeSpec;
    format?: OutputFormat;
}

/**
 * Config file merged with command-line flags.
 */
export interface RenderSettings {
    format: OutputFormat;
    canvas?: CanvasSpec;
    /** The canvas came from --canvas and overrides the document's own */
    canvasFromFlag: boolean;
    theme?: ThemeSpec;
}

export function isOutputFormat(value: unknown): value is OutputFormat {
    return value === "svg" || value === "json";
}

export function isCanvasPreset(value: unknown): value is CanvasPreset {
    return value === "16x9" || value === "4x3";
}
