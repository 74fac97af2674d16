import type { CodecOptions, CodePoint, ErrorPolicy } from './common.js';
import { DEFAULT_ERROR_POLICY, REPLACEMENT_CHARACTER, isErrorPolicy } from './common.js';
import type { Utf8CodecError } from '../error.js';

/*
 * The error-policy register. Each Node.js worker thread loads its own copy
 * of this module, so the value is private to the thread that sets it.
 */
let currentPolicy: ErrorPolicy = DEFAULT_ERROR_POLICY;

function assertErrorPolicy(policy: unknown): asserts policy is ErrorPolicy {
	if (!isErrorPolicy(policy)) {
		throw(new TypeError(`Invalid error policy: ${String(policy)}, expected "replace" or "throw"`));
	}
}

export function getErrorPolicy(): ErrorPolicy {
	return(currentPolicy);
}

/**
 * Set the error policy for the current thread
 *
 * @returns The previous policy, so callers can restore it afterwards
 */
export function setErrorPolicy(policy: ErrorPolicy): ErrorPolicy {
	assertErrorPolicy(policy);

	const previous = currentPolicy;
	currentPolicy = policy;

	return(previous);
}

/**
 * Run `fn` with a temporary error policy, restoring the previous one when
 * `fn` returns or throws
 */
export function withErrorPolicy<T>(policy: ErrorPolicy, fn: () => T): T {
	const previous = setErrorPolicy(policy);
	try {
		return(fn());
	} finally {
		setErrorPolicy(previous);
	}
}

/**
 * The policy in effect for a call: the per-call option if present,
 * otherwise the register as it is right now
 */
export function effectivePolicy(options?: CodecOptions): ErrorPolicy {
	const policy = options?.onError;
	if (policy === undefined) {
		return(currentPolicy);
	}

	assertErrorPolicy(policy);

	return(policy);
}

/**
 * Resolve a detected failure: throw the error built by `createError` under
 * the "throw" policy, or hand back the replacement character
 */
export function resolveFailure(options: CodecOptions | undefined, createError: () => Utf8CodecError): CodePoint {
	if (effectivePolicy(options) === 'throw') {
		throw(createError());
	}

	return(REPLACEMENT_CHARACTER);
}
