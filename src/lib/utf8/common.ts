/**
 * A Unicode scalar value: an integer in [0, 0x10FFFF] outside of the
 * surrogate range [0xD800, 0xDFFF]
 */
export type CodePoint = number;

/**
 * What to do when a malformed input is encountered
 *   - replace: substitute {@link REPLACEMENT_CHARACTER} and continue
 *   - throw: abort the operation with a {@link Utf8CodecError} subclass
 */
export type ErrorPolicy = 'replace' | 'throw';

export const ERROR_POLICIES: readonly ErrorPolicy[] = ['replace', 'throw'] as const;

export const DEFAULT_ERROR_POLICY: ErrorPolicy = 'replace';

/**
 * Substituted for anything that fails validation under the "replace" policy
 */
export const REPLACEMENT_CHARACTER = 0xFFFD;

/**
 * UTF-8 encoding of U+FFFD
 */
export const REPLACEMENT_CHARACTER_BYTES: readonly number[] = [0xEF, 0xBF, 0xBD] as const;

export const MAX_CODE_POINT = 0x10FFFF;

export const SURROGATE_MIN = 0xD800;
export const HIGH_SURROGATE_MAX = 0xDBFF;
export const LOW_SURROGATE_MIN = 0xDC00;
export const SURROGATE_MAX = 0xDFFF;

export const SUPPLEMENTARY_MIN = 0x10000;

/**
 * The part of a logger the codec writes to, satisfied by `Log` and by the
 * console logger from `createConsoleLog`
 */
export type CodecLogger = {
	debug(from: string, ...args: unknown[]): void;
	warn(from: string, ...args: unknown[]): void;
};

/**
 * Options accepted by every encode/decode operation
 */
export type CodecOptions = {
	/**
	 * Error policy to use for this call, if not provided the current
	 * value of the error-policy register is read at the moment a
	 * failure is detected
	 */
	onError?: ErrorPolicy;

	/**
	 * Logger to report replaced values to
	 */
	logger?: CodecLogger;
};

/**
 * Why a UTF-8 byte sequence was rejected
 */
export type InvalidUTF8Reason =
	'UNEXPECTED_CONTINUATION' |
	'INVALID_LEAD_BYTE' |
	'SHORT_SEQUENCE' |
	'SURROGATE' |
	'OVERLONG' |
	'OUT_OF_RANGE' |
	'END_OF_INPUT';

export function isErrorPolicy(input: unknown): input is ErrorPolicy {
	return(input === 'replace' || input === 'throw');
}

export function isSurrogate(value: number): boolean {
	return(value >= SURROGATE_MIN && value <= SURROGATE_MAX);
}

/**
 * Check whether a number is a valid code point, i.e. an integer in
 * [0, 0x10FFFF] which is not a surrogate
 */
export function isCodePoint(value: number): value is CodePoint {
	if (!Number.isInteger(value)) {
		return(false);
	}

	if (value < 0 || value > MAX_CODE_POINT) {
		return(false);
	}

	return(!isSurrogate(value));
}

export function isContinuationByte(byte: number): boolean {
	return((byte & 0xC0) === 0x80);
}

/**
 * Number of continuation bytes promised by a lead byte, or null if the byte
 * cannot start a sequence (a continuation byte, or 0xF8 and above)
 */
export function continuationCount(lead: number): 0 | 1 | 2 | 3 | null {
	if ((lead & 0x80) === 0) {
		return(0);
	}
	if ((lead & 0xE0) === 0xC0) {
		return(1);
	}
	if ((lead & 0xF0) === 0xE0) {
		return(2);
	}
	if ((lead & 0xF8) === 0xF0) {
		return(3);
	}

	return(null);
}

/*
 * Smallest value that needs the given number of continuation bytes, anything
 * below is an overlong encoding
 */
const MIN_VALUE_FOR_CONTINUATIONS = [0, 0x80, 0x800, 0x10000] as const;

/**
 * Checks applied to a value after its bits have been accumulated, shared by
 * the forward and reverse decoders
 */
export function checkDecodedValue(value: number, continuations: 0 | 1 | 2 | 3): InvalidUTF8Reason | null {
	if (isSurrogate(value)) {
		return('SURROGATE');
	}

	if (value < MIN_VALUE_FOR_CONTINUATIONS[continuations]) {
		return('OVERLONG');
	}

	if (value > MAX_CODE_POINT) {
		return('OUT_OF_RANGE');
	}

	return(null);
}

export function formatCodePoint(value: number): string {
	if (!Number.isInteger(value) || value < 0) {
		return(String(value));
	}

	return(`U+${value.toString(16).toUpperCase().padStart(4, '0')}`);
}
