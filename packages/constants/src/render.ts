import type { UserErrorMessage } from "./types";

/**
 * Composer warnings. Rendering continues after each of these.
 */
export const RenderWarnings = {
	CONNECTOR_SKIPPED: (index: number, missing: readonly string[]): UserErrorMessage => [
		`Skipping connector #${index}`,
		`unknown node id(s): ${missing.join(", ")}`,
	],
	UNKNOWN_NODE_KIND: (id: string, kind: string): UserErrorMessage => [
		`Unknown kind "${kind}" on node "${id}"`,
		"drawn as rect",
	],
	BOUNDARY_EMPTY: (label: string): UserErrorMessage => [
		`Skipping boundary "${label}"`,
		"none of its nodes exist",
	],
} as const;

/**
 * Join a user-facing message into a single log line.
 */
export function formatMessage(message: UserErrorMessage): string {
	return message.join(": ");
}
