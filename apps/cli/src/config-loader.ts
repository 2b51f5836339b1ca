import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { dirname, join, resolve } from "node:path";
import { CLIErrors, ParseErrors } from "@boxwire/constants";
import { parseCanvasSpec, parseThemeSpec, type ParseIssue } from "@boxwire/parser";
import { OUTPUT_FORMATS, isOutputFormat, type FileConfig, type RenderArgs, type RenderSettings } from "./types";

export const CONFIG_FILE_NAMES = ["boxwire.config.json", ".boxwire.json"] as const;

export const CONFIG_ENV_VAR = "BOXWIRE_CONFIG";

export const DEFAULT_CONFIG: FileConfig = {};

export const DEFAULT_FORMAT = "svg";

/**
 * Config file discovery, loading and merging with CLI flags.
 */
export class ConfigLoader {
    /**
     * Find the config file for a render.
     *
     * An existing file named by BOXWIRE_CONFIG wins. Otherwise looks for
     * `boxwire.config.json` then `.boxwire.json` in `startDir` and each
     * parent up to the git root, then `~/.config/boxwire/config.json`.
     */
    static findConfigFile(startDir: string = process.cwd(), homeDir: string = homedir()): string | undefined {
        const fromEnv = process.env[CONFIG_ENV_VAR];
        if (fromEnv && existsSync(fromEnv)) return fromEnv;

        let dir = resolve(startDir);
        for (;;) {
            for (const name of CONFIG_FILE_NAMES) {
                const candidate = join(dir, name);
                if (existsSync(candidate)) return candidate;
            }
            const parent = dirname(dir);
            if (existsSync(join(dir, ".git")) || parent === dir) break;
            dir = parent;
        }

        const userConfig = join(homeDir, ".config", "boxwire", "config.json");
        if (existsSync(userConfig)) return userConfig;

        return undefined;
    }

    /**
     * Load and validate a config file. No path means defaults.
     *
     * @throws Error if the file is missing, not JSON, or has invalid values
     */
    static async load(path: string | undefined): Promise<FileConfig> {
        if (path === undefined) {
            return { ...DEFAULT_CONFIG };
        }

        let text: string;
        try {
            text = await readFile(path, "utf8");
        } catch {
            throw new Error(CLIErrors.CONFIG_NOT_FOUND(path));
        }

        let raw: unknown;
        try {
            raw = JSON.parse(text);
        } catch {
            throw new Error(CLIErrors.CONFIG_PARSE(path));
        }

        return ConfigLoader.validate(raw, path);
    }

    /**
     * Check the known keys of a parsed config file. Unknown keys are ignored.
     */
    static validate(raw: unknown, path: string): FileConfig {
        if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
            throw new Error(CLIErrors.CONFIG_INVALID(path, ParseErrors.EXPECTED_OBJECT));
        }

        const config: FileConfig = {};
        const entries = new Map<string, unknown>(Object.entries(raw));

        const canvas = entries.get("canvas");
        if (canvas !== undefined) {
            const result = parseCanvasSpec(canvas);
            if (!result.value) throw new Error(CLIErrors.CONFIG_INVALID(path, describe(result.errors)));
            config.canvas = result.value;
        }

        const theme = entries.get("theme");
        if (theme !== undefined) {
            const result = parseThemeSpec(theme);
            if (!result.value) throw new Error(CLIErrors.CONFIG_INVALID(path, describe(result.errors)));
            config.theme = result.value;
        }

        const format = entries.get("format");
        if (format !== undefined) {
            if (!isOutputFormat(format)) {
                throw new Error(
                    CLIErrors.CONFIG_INVALID(path, `format: ${ParseErrors.INVALID_CHOICE(String(format), OUTPUT_FORMATS)}`),
                );
            }
            config.format = format;
        }

        return config;
    }

    /**
     * Layer CLI flags over a loaded config. Flags win.
     */
    static mergeWithCLI(config: FileConfig, args: RenderArgs): RenderSettings {
        const settings: RenderSettings = {
            format: args.format ?? config.format ?? DEFAULT_FORMAT,
            canvasFromFlag: args.canvas !== undefined,
        };
        if (args.canvas !== undefined) {
            settings.canvas = { kind: "preset", preset: args.canvas };
        } else if (config.canvas !== undefined) {
            settings.canvas = config.canvas;
        }
        if (config.theme !== undefined) settings.theme = config.theme;
        return settings;
    }
}

function describe(issues: ParseIssue[]): string {
    return issues.map((issue) => `${issue.path}: ${issue.message}`).join("; ");
}
