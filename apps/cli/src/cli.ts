import { writeFile, readFile } from "node:fs/promises";
import { dirname, extname, resolve } from "node:path";
import { CLIErrors } from "@boxwire/constants";
import {
    DEFAULT_THEME,
    mergeTheme,
    renderDocument,
    resolveCanvas,
    type DocumentRenderResult,
} from "@boxwire/core";
import { RecordingEmitter, SvgEmitter } from "@boxwire/emitter";
import { createJsonLogger, createLogger, type AppLogObj, type LogMode, type Logger } from "@boxwire/logger";
import { DocumentParser, type DiagramDocument } from "@boxwire/parser";
import { createProgram, parseArgs } from "./args";
import { ConfigLoader, DEFAULT_CONFIG } from "./config-loader";
import { ExitCode, type FileConfig, type OutputMode, type RenderArgs, type RenderSettings } from "./types";

const LOG_MODE_MAP: Record<OutputMode, LogMode> = {
    quiet: "error",
    normal: "info",
    verbose: "debug",
    json: "debug",
};

/**
 * Writes rendered output when no -o path is given.
 */
export type OutputWriter = (text: string) => void;

const writeStdout: OutputWriter = (text) => {
    process.stdout.write(text);
};

/**
 * Main CLI class.
 */
export class CLI {
    private readonly stdout: OutputWriter;
    private readonly parser = new DocumentParser();

    constructor(stdout: OutputWriter = writeStdout) {
        this.stdout = stdout;
    }

    /**
     * Run CLI with given arguments.
     * @returns Exit code
     */
    async run(args: string[]): Promise<number> {
        let logger = createLogger("boxwire", "info");
        let options: RenderArgs;

        try {
            options = parseArgs(args);
        } catch (error) {
            logger.error(error instanceof Error ? error.message : String(error));
            return ExitCode.CONFIG_ERROR;
        }

        if (options.help) {
            this.stdout(createProgram().helpInformation());
            return ExitCode.SUCCESS;
        }

        if (options.version) {
            this.stdout(`${createProgram().version() ?? ""}\n`);
            return ExitCode.SUCCESS;
        }

        const mode = this.getOutputMode(options);
        logger = mode === "json"
            ? createJsonLogger("boxwire", LOG_MODE_MAP[mode])
            : createLogger("boxwire", LOG_MODE_MAP[mode]);

        let settings: RenderSettings;
        try {
            settings = ConfigLoader.mergeWithCLI(await this.loadConfig(options), options);
        } catch (error) {
            logger.error(`Config error: ${error instanceof Error ? error.message : String(error)}`);
            return ExitCode.CONFIG_ERROR;
        }

        const document = await this.readDocument(options.input, logger);
        if (!document) {
            return ExitCode.RENDER_ERROR;
        }

        let output: string;
        try {
            output = this.render(document, settings, logger);
        } catch (error) {
            logger.error(`Render failed: ${error instanceof Error ? error.message : String(error)}`);
            return ExitCode.RENDER_ERROR;
        }

        if (options.output) {
            try {
                await writeFile(options.output, output, "utf8");
            } catch (error) {
                logger.error(`Cannot write ${options.output}: ${error instanceof Error ? error.message : String(error)}`);
                return ExitCode.RENDER_ERROR;
            }
            logger.info(`Wrote ${options.output}`, { path: options.output });
        } else {
            this.stdout(output);
        }

        return ExitCode.SUCCESS;
    }

    /**
     * --config wins; otherwise search from the input file's directory.
     */
    private async loadConfig(options: RenderArgs): Promise<FileConfig> {
        if (options.noConfig) {
            return { ...DEFAULT_CONFIG };
        }
        const configPath = options.configPath ?? ConfigLoader.findConfigFile(dirname(resolve(options.input)));
        return ConfigLoader.load(configPath);
    }

    /**
     * Read and validate the input document. Every problem is logged.
     */
    private async readDocument(input: string, logger: Logger<AppLogObj>): Promise<DiagramDocument | null> {
        if (extname(input).toLowerCase() !== ".json") {
            logger.error(CLIErrors.NOT_JSON(input));
            return null;
        }

        let text: string;
        try {
            text = await readFile(input, "utf8");
        } catch {
            logger.error(CLIErrors.INPUT_NOT_FOUND(input));
            return null;
        }

        let raw: unknown;
        try {
            raw = JSON.parse(text);
        } catch {
            logger.error(CLIErrors.INVALID_INPUT_JSON(input));
            return null;
        }

        const result = this.parser.parse(raw, logger);
        for (const issue of result.errors) {
            logger.error(`${input}: ${issue.path || "(root)"}: ${issue.message}`, { path: issue.path });
        }
        return result.document;
    }

    private render(document: DiagramDocument, settings: RenderSettings, logger: Logger<AppLogObj>): string {
        const canvasSpec = settings.canvasFromFlag ? settings.canvas : document.canvas ?? settings.canvas;
        const options = {
            canvas: resolveCanvas(canvasSpec),
            baseTheme: mergeTheme(DEFAULT_THEME, settings.theme),
            logger,
        };

        if (settings.format === "json") {
            const emitter = new RecordingEmitter();
            const result = renderDocument(document, emitter, options);
            this.logSummary(result, logger);
            return `${JSON.stringify({ canvas: result.canvas, events: emitter.events }, null, 2)}\n`;
        }

        const emitter = new SvgEmitter(options.canvas);
        try {
            const result = renderDocument(document, emitter, options);
            this.logSummary(result, logger);
            return `${emitter.toSvg()}\n`;
        } finally {
            emitter.dispose();
        }
    }

    private logSummary(result: DocumentRenderResult, logger: Logger<AppLogObj>): void {
        const skipped = result.diagrams.reduce(
            (total, diagram) => total + (diagram.type === "component" ? diagram.skipped.length : 0),
            0,
        );
        logger.debug("Document rendered", { count: result.diagrams.length, skipped });
    }

    private getOutputMode(options: RenderArgs): OutputMode {
        if (options.jsonLogs) return "json";
        if (options.quiet) return "quiet";
        if (options.verbose) return "verbose";
        return "normal";
    }
}
