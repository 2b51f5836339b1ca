/**
 * Messages attached to parser issues. The issue path is reported separately.
 */
export const ParseErrors = {
	EXPECTED_OBJECT: "Expected an object",
	EXPECTED_ARRAY: "Expected an array",
	EXPECTED_STRING: "Expected a string",
	EXPECTED_NUMBER: "Expected a finite number",
	EXPECTED_INTEGER: "Expected a positive integer",
	EXPECTED_INDEX: "Expected a non-negative integer",
	REQUIRED: "Required",
	EMPTY_STRING: "Must not be empty",
	INVALID_COLOR: (value: string) =>
		`Invalid colour "${value}". Expected #RRGGBB`,
	INVALID_CHOICE: (value: string, choices: readonly string[]) =>
		`Invalid value "${value}". Expected one of: ${choices.join(", ")}`,
	EXPECTED_BOX_ROOT: "Expected a box object or an array of boxes",
	EXPECTED_CANVAS:
		"Expected a preset name (16x9, 4x3) or an object with widthMm and heightMm",
	UNKNOWN_DIAGRAM_TYPE: (value: string) =>
		`Unknown diagram type "${value}". Expected component or boxes`,
	DUPLICATE_ID: (id: string) =>
		`Duplicate node id "${id}"`,
	NOT_A_DOCUMENT:
		"Expected a document object, a diagram object or an array of diagrams",
} as const;
