/**
 * Asserts that the provided value is never, so a `switch` over a union
 * fails to compile when a member is left unhandled.
 */
export function assertNever(value: never, what = 'value'): never {
	throw(new Error(`Unexpected ${what}: ${String(value)}`));
}
