/**
 * A user-facing message: summary line first, optional detail lines after.
 */
export type UserErrorMessage = readonly [string, ...string[]];
