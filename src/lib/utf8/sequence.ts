import type { CodecOptions, CodePoint } from './common.js';
import { isContinuationByte } from './common.js';
import { tryDecodeOne } from './decoder.js';
import { resolveFailure } from './policy.js';
import { InvalidUTF8Error } from '../error.js';
import { toBytes } from '../utils/buffer.js';
import type { ByteSource } from '../utils/buffer.js';

/**
 * Drive the forward decoder over a whole byte sequence, handing every
 * decoded (or replaced) code point to `visit` together with the offset it
 * started at.
 *
 * @returns The number of malformed spans that were replaced
 */
export function forEachCodePoint(input: ByteSource, options: CodecOptions | undefined, from: string, visit: (codePoint: CodePoint, offset: number) => void): number {
	const bytes = toBytes(input);
	const logger = options?.logger;

	let replaced = 0;
	let cursor = 0;
	while (cursor < bytes.length) {
		const result = tryDecodeOne(bytes, cursor);
		if (result.ok) {
			visit(result.codePoint, cursor);
		} else {
			const offset = cursor;
			const codePoint = resolveFailure(options, function() {
				return(new InvalidUTF8Error(result.reason, offset));
			});

			logger?.debug(from, `Replaced malformed sequence at offset ${offset} (${result.reason}), ${result.next - offset} byte(s)`);
			replaced++;
			visit(codePoint, offset);
		}

		cursor = result.next;
	}

	if (replaced > 0) {
		logger?.warn(from, `Replaced ${replaced} malformed sequence(s) in ${bytes.length} byte(s) of input`);
	}

	return(replaced);
}

/**
 * Decode a UTF-8 byte sequence into code points.
 *
 * Under the "throw" policy the first malformed sequence aborts the decode
 * with {@link InvalidUTF8Error} and nothing is returned.
 */
export function decodeAll(input: ByteSource, options?: CodecOptions): CodePoint[] {
	const codePoints: CodePoint[] = [];

	forEachCodePoint(input, options, 'utf8.decodeAll', function(codePoint) {
		codePoints.push(codePoint);
	});

	return(codePoints);
}

/**
 * Number of malformed spans a full decode would replace
 */
export function countReplacements(input: ByteSource): number {
	return(forEachCodePoint(input, { onError: 'replace' }, 'utf8.countReplacements', function() {
		/* Only the count is needed */
	}));
}

/**
 * Check that an entire byte sequence is well-formed UTF-8.
 *
 * This never throws regardless of the error policy in effect, and does
 * not change it.
 */
export function isValid(input: ByteSource): boolean {
	const bytes = toBytes(input);

	let cursor = 0;
	while (cursor < bytes.length) {
		const result = tryDecodeOne(bytes, cursor);
		if (!result.ok) {
			return(false);
		}

		cursor = result.next;
	}

	return(true);
}

/**
 * Check that a well-formed encoding starts at `cursor`
 */
export function isValidAt(input: ByteSource, cursor: number): boolean {
	return(tryDecodeOne(toBytes(input), cursor).ok);
}

/**
 * Number of code points in a byte sequence, counted as the bytes that are
 * not continuation bytes. No validation is performed.
 */
export function lengthInCodePoints(input: ByteSource): number {
	const bytes = toBytes(input);

	let count = 0;
	for (const byte of bytes) {
		if (!isContinuationByte(byte)) {
			count++;
		}
	}

	return(count);
}
