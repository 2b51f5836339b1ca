import { isHexColor } from "@boxwire/color";
import { ParseErrors } from "@boxwire/constants";
import type { ParseIssue } from "./types";

export type JsonObject = Record<string, unknown>;

export function isObject(value: unknown): value is JsonObject {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Append a key or index to a dotted issue path.
 */
export function childPath(path: string, key: string | number): string {
	if (typeof key === "number") {
		return `${path}[${key}]`;
	}
	return path === "" ? key : `${path}.${key}`;
}

/**
 * Reads typed fields out of untrusted JSON, recording an issue for every
 * bad value and returning a placeholder so reading can go on.
 */
export class FieldReader {
	readonly issues: ParseIssue[] = [];

	fail(path: string, message: string): void {
		this.issues.push({ path, message });
	}

	object(value: unknown, path: string): JsonObject | undefined {
		if (!isObject(value)) {
			this.fail(path, ParseErrors.EXPECTED_OBJECT);
			return undefined;
		}
		return value;
	}

	/**
	 * Array field; a missing field reads as empty.
	 */
	array(obj: JsonObject, key: string, path: string): unknown[] {
		const value = obj[key];
		if (value === undefined) {
			return [];
		}
		if (!Array.isArray(value)) {
			this.fail(childPath(path, key), ParseErrors.EXPECTED_ARRAY);
			return [];
		}
		return value;
	}

	requiredString(obj: JsonObject, key: string, path: string, allowEmpty = false): string {
		const value = obj[key];
		const at = childPath(path, key);
		if (value === undefined) {
			this.fail(at, ParseErrors.REQUIRED);
			return "";
		}
		if (typeof value !== "string") {
			this.fail(at, ParseErrors.EXPECTED_STRING);
			return "";
		}
		if (!allowEmpty && value.trim() === "") {
			this.fail(at, ParseErrors.EMPTY_STRING);
		}
		return value;
	}

	optionalString(obj: JsonObject, key: string, path: string): string | undefined {
		const value = obj[key];
		if (value === undefined || value === null) {
			return undefined;
		}
		if (typeof value !== "string") {
			this.fail(childPath(path, key), ParseErrors.EXPECTED_STRING);
			return undefined;
		}
		return value;
	}

	number(obj: JsonObject, key: string, path: string, fallback?: number): number {
		const value = obj[key];
		const at = childPath(path, key);
		if (value === undefined || value === null) {
			if (fallback === undefined) {
				this.fail(at, ParseErrors.REQUIRED);
				return 0;
			}
			return fallback;
		}
		if (typeof value !== "number" || !Number.isFinite(value)) {
			this.fail(at, ParseErrors.EXPECTED_NUMBER);
			return fallback ?? 0;
		}
		return value;
	}

	index(obj: JsonObject, key: string, path: string): number {
		const value = obj[key];
		const at = childPath(path, key);
		if (value === undefined || value === null) {
			this.fail(at, ParseErrors.REQUIRED);
			return 0;
		}
		if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
			this.fail(at, ParseErrors.EXPECTED_INDEX);
			return 0;
		}
		return value;
	}

	positiveInteger(obj: JsonObject, key: string, path: string): number {
		const value = this.optionalPositiveInteger(obj, key, path);
		if (value === undefined) {
			if (obj[key] === undefined || obj[key] === null) {
				this.fail(childPath(path, key), ParseErrors.REQUIRED);
			}
			return 1;
		}
		return value;
	}

	optionalPositiveInteger(obj: JsonObject, key: string, path: string): number | undefined {
		const value = obj[key];
		if (value === undefined || value === null) {
			return undefined;
		}
		if (typeof value !== "number" || !Number.isInteger(value) || value < 1) {
			this.fail(childPath(path, key), ParseErrors.EXPECTED_INTEGER);
			return undefined;
		}
		return value;
	}

	color(obj: JsonObject, key: string, path: string): string | undefined {
		const value = this.optionalString(obj, key, path);
		if (value === undefined) {
			return undefined;
		}
		return this.colorValue(value, childPath(path, key));
	}

	/**
	 * `#RRGGBB` with the hash added when missing.
	 */
	colorValue(value: string, path: string): string | undefined {
		if (!isHexColor(value)) {
			this.fail(path, ParseErrors.INVALID_COLOR(value));
			return undefined;
		}
		return value.startsWith("#") ? value : `#${value}`;
	}

	choice<T extends string>(obj: JsonObject, key: string, path: string, choices: readonly T[], fallback: T): T {
		const value = this.optionalString(obj, key, path);
		if (value === undefined) {
			return fallback;
		}
		const match = choices.find((choice) => choice === value);
		if (match === undefined) {
			this.fail(childPath(path, key), ParseErrors.INVALID_CHOICE(value, choices));
			return fallback;
		}
		return match;
	}

	stringList(obj: JsonObject, key: string, path: string): string[] {
		const result: string[] = [];
		this.array(obj, key, path).forEach((item, i) => {
			if (typeof item !== "string") {
				this.fail(childPath(childPath(path, key), i), ParseErrors.EXPECTED_STRING);
				return;
			}
			result.push(item);
		});
		return result;
	}
}
