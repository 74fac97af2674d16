import type { CodecOptions, CodePoint } from './common.js';
import { REPLACEMENT_CHARACTER_BYTES, isCodePoint } from './common.js';
import { resolveFailure } from './policy.js';
import { InvalidCodePointError } from '../error.js';
import { ByteBuffer } from '../utils/buffer.js';

/**
 * Number of bytes the UTF-8 encoding of `codePoint` takes; invalid values
 * report the size of the replacement character
 */
export function encodedLength(codePoint: number): 1 | 2 | 3 | 4 {
	if (!isCodePoint(codePoint)) {
		return(3);
	}

	if (codePoint <= 0x7F) {
		return(1);
	}
	if (codePoint <= 0x7FF) {
		return(2);
	}
	if (codePoint <= 0xFFFF) {
		return(3);
	}

	return(4);
}

/**
 * Append the canonical (shortest) UTF-8 encoding of a code point to
 * `target`.
 *
 * Values outside of the code point domain append U+FFFD under the
 * "replace" policy, or throw {@link InvalidCodePointError} under "throw",
 * in which case nothing is appended.
 */
export function encodeCodePoint(codePoint: number, target: ByteBuffer, options?: CodecOptions): void {
	if (!isCodePoint(codePoint)) {
		resolveFailure(options, function() {
			return(new InvalidCodePointError(codePoint));
		});

		target.push(...REPLACEMENT_CHARACTER_BYTES);
		return;
	}

	if (codePoint <= 0x7F) {
		target.push(codePoint);
	} else if (codePoint <= 0x7FF) {
		target.push(
			0xC0 | (codePoint >>> 6),
			0x80 | (codePoint & 0x3F)
		);
	} else if (codePoint <= 0xFFFF) {
		target.push(
			0xE0 | (codePoint >>> 12),
			0x80 | ((codePoint >>> 6) & 0x3F),
			0x80 | (codePoint & 0x3F)
		);
	} else {
		target.push(
			0xF0 | (codePoint >>> 18),
			0x80 | ((codePoint >>> 12) & 0x3F),
			0x80 | ((codePoint >>> 6) & 0x3F),
			0x80 | (codePoint & 0x3F)
		);
	}
}

/**
 * Encode a single code point, or a sequence of them, to UTF-8.
 *
 * Under the "throw" policy the first invalid code point aborts the whole
 * operation and no partial output is returned.
 */
export function encode(input: CodePoint | Iterable<CodePoint>, options?: CodecOptions): Uint8Array {
	const target = new ByteBuffer();
	const logger = options?.logger;
	const codePoints = typeof input === 'number' ? [input] : input;

	let replaced = 0;
	let index = 0;
	for (const codePoint of codePoints) {
		encodeCodePoint(codePoint, target, options);
		if (!isCodePoint(codePoint)) {
			logger?.debug('utf8.encode', `Replaced invalid code point at index ${index}:`, codePoint);
			replaced++;
		}

		index++;
	}

	if (replaced > 0) {
		logger?.warn('utf8.encode', `Replaced ${replaced} invalid code point(s) in ${index} code point(s) of input`);
	}

	return(target.toBytes());
}
