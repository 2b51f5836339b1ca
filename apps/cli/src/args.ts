import {
    Command as CommanderProgram,
    CommanderError,
    InvalidArgumentError,
} from "commander";
import { CLIDescriptions, CLIErrors } from "@boxwire/constants";
import type { CanvasPreset } from "@boxwire/parser";
import {
    Command,
    isCanvasPreset,
    isOutputFormat,
    type OutputFormat,
    type RenderArgs,
} from "./types";

export const VERSION = "0.1.0";

function parseFormat(value: string): OutputFormat {
    if (!isOutputFormat(value)) {
        throw new InvalidArgumentError(CLIErrors.INVALID_FORMAT(value));
    }
    return value;
}

function parseCanvas(value: string): CanvasPreset {
    if (!isCanvasPreset(value)) {
        throw new InvalidArgumentError(CLIErrors.INVALID_CANVAS(value));
    }
    return value;
}

/**
 * Create the commander program with all subcommands.
 */
export function createProgram(): CommanderProgram {
    const program = new CommanderProgram();
    program
        .name("boxwire")
        .description(CLIDescriptions.PROGRAM)
        .version(VERSION)
        .exitOverride()
        .configureOutput({
            writeOut: () => {},
            writeErr: () => {},
        });

    program
        .command("render")
        .description(CLIDescriptions.RENDER)
        .argument("<input>", "diagram document (.json)")
        .option("-o, --output <path>", "write to a file instead of stdout")
        .option("--format <format>", "output format: svg or json (default: svg)", parseFormat)
        .option("--canvas <preset>", "canvas preset: 16x9 or 4x3", parseCanvas)
        .option("--config <path>", "use specific config file")
        .option("--no-config", "skip config file loading")
        .option("-v, --verbose", "show detailed output", false)
        .option("-q, --quiet", "show errors only", false)
        .option("--json-logs", "log as JSON lines", false);

    return program;
}

function defaults(overrides: Partial<RenderArgs>): RenderArgs {
    return {
        command: Command.RENDER,
        input: "",
        noConfig: false,
        verbose: false,
        quiet: false,
        jsonLogs: false,
        help: false,
        version: false,
        ...overrides,
    };
}

/**
 * Map commander-parsed options to RenderArgs.
 */
function buildRenderArgs(input: string, opts: Record<string, unknown>): RenderArgs {
    if (opts.verbose === true && opts.quiet === true) {
        throw new Error(CLIErrors.CONFLICTING_FLAGS);
    }

    const args = defaults({
        input,
        noConfig: opts.config === false,
        verbose: opts.verbose === true,
        quiet: opts.quiet === true,
        jsonLogs: opts.jsonLogs === true,
    });
    if (typeof opts.output === "string") args.output = opts.output;
    if (typeof opts.config === "string") args.configPath = opts.config;
    if (isOutputFormat(opts.format)) args.format = opts.format;
    if (isCanvasPreset(opts.canvas)) args.canvas = opts.canvas;
    return args;
}

/**
 * Parse CLI arguments using commander.
 *
 * @param args - Command-line arguments (without program name)
 * @throws Error if unknown flag, missing value, or invalid subcommand
 */
export function parseArgs(args: string[]): RenderArgs {
    const program = createProgram();

    let result: RenderArgs | undefined;

    for (const cmd of program.commands) {
        if (cmd.name() !== Command.RENDER) continue;
        cmd.action((input: string, opts: Record<string, unknown>) => {
            result = buildRenderArgs(input, opts);
        });
    }

    try {
        program.parse(args, { from: "user" });
    } catch (err) {
        if (err instanceof CommanderError) {
            if (err.code === "commander.helpDisplayed") {
                return defaults({ help: true });
            }
            if (err.code === "commander.version") {
                return defaults({ version: true });
            }
            if (err.code === "commander.help") {
                throw new Error(CLIErrors.MISSING_SUBCOMMAND);
            }
            throw new Error(err.message.replace(/^error: /, ""));
        }
        throw err;
    }

    if (!result) {
        throw new Error(CLIErrors.MISSING_SUBCOMMAND);
    }

    return result;
}
