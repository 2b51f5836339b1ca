export const CLIErrors = {
	MISSING_SUBCOMMAND:
		"Missing subcommand. Usage: boxwire render <input.json>",
	CONFLICTING_FLAGS:
		"Conflicting flags: --verbose and --quiet cannot be used together",
	NOT_JSON: (path: string) =>
		`Not a JSON file: "${path}". Expected .json extension`,
	INPUT_NOT_FOUND: (path: string) =>
		`Input file not found: "${path}"`,
	INVALID_INPUT_JSON: (path: string) =>
		`Invalid JSON in input file "${path}"`,
	INVALID_FORMAT: (value: string) =>
		`Invalid output format "${value}". Expected svg or json`,
	INVALID_CANVAS: (value: string) =>
		`Invalid canvas preset "${value}". Expected 16x9 or 4x3`,
	CONFIG_NOT_FOUND: (path: string) =>
		`Config file not found: ${path}`,
	CONFIG_PARSE: (path: string) =>
		`Invalid config file: parse error at ${path}`,
	CONFIG_INVALID: (path: string, detail: string) =>
		`Invalid config file ${path}: ${detail}`,
} as const;

export const CLIDescriptions = {
	PROGRAM: "Render diagram descriptions (components, box trees) to SVG",
	RENDER: "Render a JSON diagram document",
} as const;
