import type { CodecOptions, CodePoint } from './common.js';
import {
	HIGH_SURROGATE_MAX,
	LOW_SURROGATE_MIN,
	SUPPLEMENTARY_MIN,
	SURROGATE_MAX,
	SURROGATE_MIN,
	isCodePoint
} from './common.js';
import { resolveFailure } from './policy.js';
import { forEachCodePoint } from './sequence.js';
import { encodeCodePoint } from './encoder.js';
import { InvalidCodePointError, InvalidWideCharError } from '../error.js';
import { ByteBuffer } from '../utils/buffer.js';
import type { ByteSource } from '../utils/buffer.js';

export function isHighSurrogate(unit: number): boolean {
	return(unit >= SURROGATE_MIN && unit <= HIGH_SURROGATE_MAX);
}

export function isLowSurrogate(unit: number): boolean {
	return(unit >= LOW_SURROGATE_MIN && unit <= SURROGATE_MAX);
}

/**
 * Split a supplementary code point (U+10000 and above) into its high and
 * low surrogate units
 */
export function splitSurrogates(codePoint: CodePoint): [high: number, low: number] {
	if (!isCodePoint(codePoint) || codePoint < SUPPLEMENTARY_MIN) {
		throw(new RangeError(`Code point ${codePoint} is not in the supplementary planes`));
	}

	const offset = codePoint - SUPPLEMENTARY_MIN;

	return([
		(offset >>> 10) + SURROGATE_MIN,
		(offset & 0x3FF) + LOW_SURROGATE_MIN
	]);
}

export function combineSurrogates(high: number, low: number): CodePoint {
	if (!isHighSurrogate(high) || !isLowSurrogate(low)) {
		throw(new RangeError(`Units ${high}, ${low} do not form a surrogate pair`));
	}

	return(((high - SURROGATE_MIN) << 10) + (low - LOW_SURROGATE_MIN) + SUPPLEMENTARY_MIN);
}

function pushUnits(codePoint: CodePoint, target: number[]): void {
	if (codePoint < SUPPLEMENTARY_MIN) {
		target.push(codePoint);
		return;
	}

	target.push(...splitSurrogates(codePoint));
}

/**
 * Convert code points to UTF-16 code units.
 *
 * Invalid code points are replaced by U+FFFD or rejected with
 * {@link InvalidCodePointError} depending on the error policy.
 */
export function toUtf16(codePoints: Iterable<CodePoint>, options?: CodecOptions): Uint16Array {
	const units: number[] = [];
	const logger = options?.logger;

	let replaced = 0;
	let index = 0;
	for (const value of codePoints) {
		let codePoint = value;
		if (!isCodePoint(codePoint)) {
			codePoint = resolveFailure(options, function() {
				return(new InvalidCodePointError(value));
			});
			logger?.debug('utf8.toUtf16', `Replaced invalid code point at index ${index}:`, value);
			replaced++;
		}

		pushUnits(codePoint, units);
		index++;
	}

	if (replaced > 0) {
		logger?.warn('utf8.toUtf16', `Replaced ${replaced} invalid code point(s) in ${index} code point(s) of input`);
	}

	return(Uint16Array.from(units));
}

/**
 * Read the code point starting at unit `index`.
 *
 * Only the offending unit is consumed when a surrogate is unpaired, so a
 * character following a lone high surrogate is kept.
 */
function readUnit(units: ArrayLike<number>, index: number, options: CodecOptions | undefined, from: string): { codePoint: CodePoint; next: number; replaced: boolean } {
	const unit = units[index] ?? 0;

	if (isHighSurrogate(unit)) {
		const low = index + 1 < units.length ? units[index + 1] ?? 0 : null;
		if (low !== null && isLowSurrogate(low)) {
			return({ codePoint: combineSurrogates(unit, low), next: index + 2, replaced: false });
		}
	} else if (!isLowSurrogate(unit)) {
		return({ codePoint: unit, next: index + 1, replaced: false });
	}

	const codePoint = resolveFailure(options, function() {
		return(new InvalidWideCharError(index));
	});
	options?.logger?.debug(from, `Replaced unpaired surrogate at unit ${index}:`, unit);

	return({ codePoint, next: index + 1, replaced: true });
}

function assertUnits(units: ArrayLike<number>): void {
	for (let index = 0; index < units.length; index++) {
		const unit = units[index];
		if (unit === undefined || !Number.isInteger(unit) || unit < 0 || unit > 0xFFFF) {
			throw(new RangeError(`Invalid UTF-16 code unit at index ${index}: ${String(unit)}`));
		}
	}
}

/**
 * Walk 16-bit code units one code point at a time, handing each decoded
 * (or replaced) code point to `visit`
 */
function forEachUnitCodePoint(units: ArrayLike<number>, options: CodecOptions | undefined, from: string, visit: (codePoint: CodePoint) => void): void {
	assertUnits(units);

	let replaced = 0;
	let index = 0;
	while (index < units.length) {
		const result = readUnit(units, index, options, from);
		if (result.replaced) {
			replaced++;
		}

		visit(result.codePoint);
		index = result.next;
	}

	if (replaced > 0) {
		options?.logger?.warn(from, `Replaced ${replaced} unpaired surrogate(s) in ${units.length} unit(s) of input`);
	}
}

/**
 * Convert UTF-16 code units to code points, validating surrogate pairs.
 *
 * Under the "throw" policy the first unpaired surrogate aborts the
 * conversion with {@link InvalidWideCharError}.
 */
export function fromUtf16(units: ArrayLike<number>, options?: CodecOptions): CodePoint[] {
	const codePoints: CodePoint[] = [];

	forEachUnitCodePoint(units, options, 'utf8.fromUtf16', function(codePoint) {
		codePoints.push(codePoint);
	});

	return(codePoints);
}

/**
 * Convert UTF-8 bytes directly to UTF-16 code units
 */
export function utf8ToUtf16(input: ByteSource, options?: CodecOptions): Uint16Array {
	const units: number[] = [];

	forEachCodePoint(input, options, 'utf8.utf8ToUtf16', function(codePoint) {
		pushUnits(codePoint, units);
	});

	return(Uint16Array.from(units));
}

/**
 * Convert UTF-16 code units directly to UTF-8 bytes
 */
export function utf16ToUtf8(units: ArrayLike<number>, options?: CodecOptions): Uint8Array {
	const target = new ByteBuffer(units.length);

	forEachUnitCodePoint(units, options, 'utf8.utf16ToUtf8', function(codePoint) {
		encodeCodePoint(codePoint, target, options);
	});

	return(target.toBytes());
}

function stringUnits(input: string): number[] {
	const units: number[] = [];
	for (let index = 0; index < input.length; index++) {
		units.push(input.charCodeAt(index));
	}

	return(units);
}

/**
 * Encode a JavaScript string, which is a sequence of UTF-16 code units, to
 * UTF-8. Lone surrogates in the string follow the error policy.
 */
export function encodeString(input: string, options?: CodecOptions): Uint8Array {
	return(utf16ToUtf8(stringUnits(input), options));
}

/**
 * Decode UTF-8 bytes to a JavaScript string
 */
export function decodeToString(input: ByteSource, options?: CodecOptions): string {
	const units = utf8ToUtf16(input, options);

	/*
	 * String.fromCharCode takes its arguments on the stack, so convert
	 * in chunks
	 */
	const CHUNK_SIZE = 0x2000;
	let output = '';
	for (let start = 0; start < units.length; start += CHUNK_SIZE) {
		output += String.fromCharCode(...units.subarray(start, start + CHUNK_SIZE));
	}

	return(output);
}
