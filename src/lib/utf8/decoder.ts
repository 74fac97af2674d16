import type { CodecOptions, CodePoint, InvalidUTF8Reason } from './common.js';
import { checkDecodedValue, continuationCount, isContinuationByte } from './common.js';
import { resolveFailure } from './policy.js';
import { InvalidUTF8Error } from '../error.js';

/**
 * Outcome of decoding forward from a cursor. On failure `next` is where
 * decoding should resume: past every byte that was consumed while trying.
 */
export type DecodeResult = {
	ok: true;
	codePoint: CodePoint;
	next: number;
} | {
	ok: false;
	error: 'INVALID_UTF8';
	reason: InvalidUTF8Reason;
	next: number;
};

/**
 * Outcome of decoding backward from a cursor. On failure `start` is the
 * cursor that was passed in.
 */
export type ReverseDecodeResult = {
	ok: true;
	codePoint: CodePoint;
	start: number;
} | {
	ok: false;
	error: 'INVALID_UTF8';
	reason: InvalidUTF8Reason;
	start: number;
};

/*
 * Bits of the lead byte that carry data, indexed by continuation count
 */
const LEAD_BYTE_MASK = [0x7F, 0x1F, 0x0F, 0x07] as const;

function assertCursor(bytes: Uint8Array, cursor: number, name = 'cursor'): void {
	if (!Number.isInteger(cursor) || cursor < 0 || cursor > bytes.length) {
		throw(new RangeError(`Invalid ${name} ${cursor} for a sequence of ${bytes.length} bytes`));
	}
}

function forwardFailure(reason: InvalidUTF8Reason, next: number): DecodeResult {
	return({ ok: false, error: 'INVALID_UTF8', reason, next });
}

/**
 * Decode the code point starting at `cursor` without applying any error
 * policy.
 *
 * A continuation byte where a lead byte is expected is skipped together
 * with every continuation byte that follows it, so the next attempt starts
 * at a candidate lead byte. A sequence cut short by a non-continuation byte
 * leaves `next` on that byte.
 */
export function tryDecodeOne(bytes: Uint8Array, cursor: number): DecodeResult {
	assertCursor(bytes, cursor);

	const end = bytes.length;
	if (cursor === end) {
		return(forwardFailure('END_OF_INPUT', cursor));
	}

	const lead = bytes[cursor] ?? 0;
	let pos = cursor + 1;

	if (lead < 0x80) {
		return({ ok: true, codePoint: lead, next: pos });
	}

	const continuations = continuationCount(lead);
	if (continuations === null) {
		while (pos < end && isContinuationByte(bytes[pos] ?? 0)) {
			pos++;
		}

		if (isContinuationByte(lead)) {
			return(forwardFailure('UNEXPECTED_CONTINUATION', pos));
		}

		return(forwardFailure('INVALID_LEAD_BYTE', pos));
	}

	let value = lead & LEAD_BYTE_MASK[continuations];
	let consumed = 0;
	while (consumed < continuations && pos < end) {
		const byte = bytes[pos] ?? 0;
		if (!isContinuationByte(byte)) {
			break;
		}

		value = (value << 6) | (byte & 0x3F);
		consumed++;
		pos++;
	}

	if (consumed !== continuations) {
		return(forwardFailure('SHORT_SEQUENCE', pos));
	}

	const invalid = checkDecodedValue(value, continuations);
	if (invalid !== null) {
		return(forwardFailure(invalid, pos));
	}

	return({ ok: true, codePoint: value, next: pos });
}

/**
 * Decode the code point starting at `cursor`.
 *
 * On malformed input the cursor still moves past the bytes consumed, then
 * the error policy decides between U+FFFD and {@link InvalidUTF8Error}.
 */
export function decodeOne(bytes: Uint8Array, cursor: number, options?: CodecOptions): { codePoint: CodePoint; next: number } {
	const result = tryDecodeOne(bytes, cursor);
	if (result.ok) {
		return({ codePoint: result.codePoint, next: result.next });
	}

	const codePoint = resolveFailure(options, function() {
		return(new InvalidUTF8Error(result.reason, cursor));
	});

	return({ codePoint, next: result.next });
}

/**
 * The code point at `cursor`
 */
export function codePointAt(bytes: Uint8Array, cursor: number, options?: CodecOptions): CodePoint {
	return(decodeOne(bytes, cursor, options).codePoint);
}

function reverseFailure(reason: InvalidUTF8Reason, start: number): ReverseDecodeResult {
	return({ ok: false, error: 'INVALID_UTF8', reason, start });
}

/**
 * Decode the code point that ends just before `cursor`, never looking at
 * bytes before `lowerBound`, without applying any error policy.
 */
export function tryDecodePrev(bytes: Uint8Array, cursor: number, lowerBound = 0): ReverseDecodeResult {
	assertCursor(bytes, cursor);
	assertCursor(bytes, lowerBound, 'lower bound');

	if (cursor <= lowerBound) {
		return(reverseFailure('END_OF_INPUT', cursor));
	}

	let pos = cursor - 1;
	let continuations = 0;
	let value = 0;

	while (isContinuationByte(bytes[pos] ?? 0)) {
		/*
		 * A fourth continuation byte, or one sitting on the lower
		 * bound, can never belong to a valid sequence
		 */
		if (continuations === 3 || pos === lowerBound) {
			return(reverseFailure('UNEXPECTED_CONTINUATION', cursor));
		}

		value |= ((bytes[pos] ?? 0) & 0x3F) << (6 * continuations);
		continuations++;
		pos--;
	}

	const lead = bytes[pos] ?? 0;
	const promised = continuationCount(lead);
	if (promised === null) {
		return(reverseFailure('INVALID_LEAD_BYTE', cursor));
	}

	if (promised !== continuations) {
		/*
		 * Either the lead byte wants more bytes than the cursor left
		 * room for, or there are continuation bytes it did not ask for
		 */
		if (promised > continuations) {
			return(reverseFailure('SHORT_SEQUENCE', cursor));
		}

		return(reverseFailure('UNEXPECTED_CONTINUATION', cursor));
	}

	value |= (lead & LEAD_BYTE_MASK[promised]) << (6 * continuations);

	const invalid = checkDecodedValue(value, promised);
	if (invalid !== null) {
		return(reverseFailure(invalid, cursor));
	}

	return({ ok: true, codePoint: value, start: pos });
}

/**
 * Decode the code point that ends just before `cursor`.
 *
 * Unlike {@link decodeOne} no progress is made on failure: `start` is the
 * original cursor, and the error policy picks U+FFFD or
 * {@link InvalidUTF8Error}.
 */
export function decodePrev(bytes: Uint8Array, cursor: number, lowerBound = 0, options?: CodecOptions): { codePoint: CodePoint; start: number } {
	const result = tryDecodePrev(bytes, cursor, lowerBound);
	if (result.ok) {
		return({ codePoint: result.codePoint, start: result.start });
	}

	const codePoint = resolveFailure(options, function() {
		return(new InvalidUTF8Error(result.reason, cursor));
	});

	return({ codePoint, start: result.start });
}
