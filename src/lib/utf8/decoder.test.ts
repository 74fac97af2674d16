import { test, expect, describe } from 'vitest';
import * as fc from 'fast-check';
import type { InvalidUTF8Reason } from './common.js';
import { codePointAt, decodeOne, decodePrev, tryDecodeOne, tryDecodePrev } from './decoder.js';
import { encode } from './encoder.js';
import { setErrorPolicy, withErrorPolicy } from './policy.js';
import { InvalidUTF8Error } from '../error.js';
import { codePointArbitrary, codePointsArbitrary, bytesArbitrary } from '../utils/tests/unicode.js';

describe('UTF-8 Forward Decoder', function() {
	test('Well-formed Sequences', function() {
		const checks = [
			{ bytes: [0x00], codePoint: 0x00 },
			{ bytes: [0x7F], codePoint: 0x7F },
			{ bytes: [0xC2, 0x80], codePoint: 0x80 },
			{ bytes: [0xDF, 0xBF], codePoint: 0x7FF },
			{ bytes: [0xE0, 0xA0, 0x80], codePoint: 0x800 },
			{ bytes: [0xE2, 0x82, 0xAC], codePoint: 0x20AC },
			{ bytes: [0xEF, 0xBF, 0xBD], codePoint: 0xFFFD },
			{ bytes: [0xEF, 0xBF, 0xBF], codePoint: 0xFFFF },
			{ bytes: [0xF0, 0x90, 0x80, 0x80], codePoint: 0x10000 },
			{ bytes: [0xF4, 0x8F, 0xBF, 0xBF], codePoint: 0x10FFFF }
		];

		for (const check of checks) {
			const bytes = new Uint8Array(check.bytes);
			expect(tryDecodeOne(bytes, 0)).toEqual({ ok: true, codePoint: check.codePoint, next: check.bytes.length });
			expect(decodeOne(bytes, 0, { onError: 'throw' })).toEqual({ codePoint: check.codePoint, next: check.bytes.length });
			expect(codePointAt(bytes, 0)).toBe(check.codePoint);
		}
	});

	test('Malformed Sequences', function() {
		const checks: { bytes: number[]; reason: InvalidUTF8Reason; next: number; description: string }[] = [
			{ bytes: [0xF0, 0x82, 0x82, 0xAC], reason: 'OVERLONG', next: 4, description: 'overlong U+20AC' },
			{ bytes: [0xC0, 0x80], reason: 'OVERLONG', next: 2, description: 'overlong NUL' },
			{ bytes: [0xE0, 0x9F, 0xBF], reason: 'OVERLONG', next: 3, description: 'overlong U+07FF' },
			{ bytes: [0xED, 0xA0, 0x80], reason: 'SURROGATE', next: 3, description: 'encoded U+D800' },
			{ bytes: [0xED, 0xBF, 0xBF], reason: 'SURROGATE', next: 3, description: 'encoded U+DFFF' },
			{ bytes: [0xF4, 0x90, 0x80, 0x80], reason: 'OUT_OF_RANGE', next: 4, description: 'U+110000' },
			{ bytes: [0xF5, 0x80, 0x80, 0x80], reason: 'OUT_OF_RANGE', next: 4, description: 'lead byte 0xF5' },
			{ bytes: [0x80, 0x80, 0x41], reason: 'UNEXPECTED_CONTINUATION', next: 2, description: 'stray continuation bytes' },
			{ bytes: [0xBF], reason: 'UNEXPECTED_CONTINUATION', next: 1, description: 'lone continuation byte' },
			{ bytes: [0xF8, 0x80, 0x41], reason: 'INVALID_LEAD_BYTE', next: 2, description: '5-byte lead byte' },
			{ bytes: [0xFF, 0x41], reason: 'INVALID_LEAD_BYTE', next: 1, description: '0xFF' },
			{ bytes: [0xE2, 0x82, 0x41], reason: 'SHORT_SEQUENCE', next: 2, description: 'truncated by ASCII' },
			{ bytes: [0xE2, 0x82], reason: 'SHORT_SEQUENCE', next: 2, description: 'truncated by end of input' },
			{ bytes: [0xC3], reason: 'SHORT_SEQUENCE', next: 1, description: 'lone lead byte' },
			{ bytes: [0xF0, 0x9F, 0xC3, 0xA9], reason: 'SHORT_SEQUENCE', next: 2, description: 'truncated by another lead byte' }
		];

		for (const check of checks) {
			const bytes = new Uint8Array(check.bytes);
			expect(tryDecodeOne(bytes, 0), check.description).toEqual({ ok: false, error: 'INVALID_UTF8', reason: check.reason, next: check.next });
			expect(decodeOne(bytes, 0, { onError: 'replace' }), check.description).toEqual({ codePoint: 0xFFFD, next: check.next });

			let error: unknown;
			try {
				decodeOne(bytes, 0, { onError: 'throw' });
			} catch (caught) {
				error = caught;
			}

			expect(InvalidUTF8Error.isInstance(error), check.description).toBe(true);
			if (InvalidUTF8Error.isInstance(error)) {
				expect(error.reason).toBe(check.reason);
				expect(error.offset).toBe(0);
			}
		}
	});

	test('Truncated sequences make progress', function() {
		const bytes = new Uint8Array([0xE2, 0x82, 0x41]);

		const first = decodeOne(bytes, 0, { onError: 'replace' });
		expect(first).toEqual({ codePoint: 0xFFFD, next: 2 });

		const second = decodeOne(bytes, first.next, { onError: 'replace' });
		expect(second).toEqual({ codePoint: 0x41, next: 3 });
	});

	test('End of input', function() {
		const bytes = new Uint8Array([0x41]);

		expect(tryDecodeOne(bytes, 1)).toEqual({ ok: false, error: 'INVALID_UTF8', reason: 'END_OF_INPUT', next: 1 });
		expect(decodeOne(bytes, 1, { onError: 'replace' })).toEqual({ codePoint: 0xFFFD, next: 1 });
		expect(function() {
			decodeOne(bytes, 1, { onError: 'throw' });
		}).toThrow('Invalid UTF-8 encoding at offset 1: no bytes left to decode');
	});

	test('Cursor validation', function() {
		const bytes = new Uint8Array([0x41]);

		for (const cursor of [-1, 2, 0.5, Number.NaN]) {
			expect(function() {
				tryDecodeOne(bytes, cursor);
			}).toThrow(RangeError);
		}
	});

	test('Error policy is read at the moment of failure', function() {
		const bytes = new Uint8Array([0xED, 0xA0, 0x80]);

		const previous = setErrorPolicy('throw');
		try {
			expect(function() {
				decodeOne(bytes, 0);
			}).toThrow(InvalidUTF8Error);

			/* Per-call options take precedence over the register */
			expect(decodeOne(bytes, 0, { onError: 'replace' }).codePoint).toBe(0xFFFD);
		} finally {
			setErrorPolicy(previous);
		}

		expect(decodeOne(bytes, 0).codePoint).toBe(0xFFFD);
	});

	test('Round trip', function() {
		fc.assert(fc.property(codePointArbitrary, function(codePoint) {
			const bytes = encode(codePoint);
			expect(decodeOne(bytes, 0, { onError: 'throw' })).toEqual({ codePoint, next: bytes.length });
		}));
	});

	test('Always makes progress before the end', function() {
		fc.assert(fc.property(bytesArbitrary, function(bytes) {
			let cursor = 0;
			while (cursor < bytes.length) {
				const result = tryDecodeOne(bytes, cursor);
				expect(result.next).toBeGreaterThan(cursor);
				expect(result.next).toBeLessThanOrEqual(bytes.length);
				cursor = result.next;
			}
		}));
	});

	test('Agrees with the platform decoder on well-formed input', function() {
		const decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

		fc.assert(fc.property(bytesArbitrary, function(bytes) {
			let platform: string | null;
			try {
				platform = decoder.decode(bytes);
			} catch {
				platform = null;
			}

			const codePoints: number[] = [];
			let valid = true;
			let cursor = 0;
			while (cursor < bytes.length) {
				const result = tryDecodeOne(bytes, cursor);
				if (!result.ok) {
					valid = false;
					break;
				}

				codePoints.push(result.codePoint);
				cursor = result.next;
			}

			expect(valid).toBe(platform !== null);
			if (platform !== null) {
				expect(String.fromCodePoint(...codePoints)).toBe(platform);
			}
		}));
	});
});

describe('UTF-8 Reverse Decoder', function() {
	test('Well-formed Sequences', function() {
		const bytes = new Uint8Array([0x41, 0xC3, 0xA9, 0xE2, 0x82, 0xAC, 0xF0, 0x9F, 0x98, 0x80]);

		const checks = [
			{ cursor: 10, codePoint: 0x1F600, start: 6 },
			{ cursor: 6, codePoint: 0x20AC, start: 3 },
			{ cursor: 3, codePoint: 0xE9, start: 1 },
			{ cursor: 1, codePoint: 0x41, start: 0 }
		];

		for (const check of checks) {
			expect(tryDecodePrev(bytes, check.cursor)).toEqual({ ok: true, codePoint: check.codePoint, start: check.start });
			expect(decodePrev(bytes, check.cursor, 0, { onError: 'throw' })).toEqual({ codePoint: check.codePoint, start: check.start });
		}
	});

	test('Malformed Sequences', function() {
		const checks: { bytes: number[]; reason: InvalidUTF8Reason; description: string }[] = [
			{ bytes: [0x80], reason: 'UNEXPECTED_CONTINUATION', description: 'continuation byte at the lower bound' },
			{ bytes: [0x41, 0x80, 0x80, 0x80, 0x80], reason: 'UNEXPECTED_CONTINUATION', description: 'four continuation bytes' },
			{ bytes: [0x41, 0x80], reason: 'UNEXPECTED_CONTINUATION', description: 'ASCII followed by a continuation byte' },
			{ bytes: [0xC3, 0xA9, 0xA9], reason: 'UNEXPECTED_CONTINUATION', description: 'one continuation byte too many' },
			{ bytes: [0xE2, 0x82], reason: 'SHORT_SEQUENCE', description: 'missing a continuation byte' },
			{ bytes: [0xE2], reason: 'SHORT_SEQUENCE', description: 'lone lead byte' },
			{ bytes: [0xFF], reason: 'INVALID_LEAD_BYTE', description: '0xFF' },
			{ bytes: [0xF8, 0x80], reason: 'INVALID_LEAD_BYTE', description: '5-byte lead byte' },
			{ bytes: [0xED, 0xA0, 0x80], reason: 'SURROGATE', description: 'encoded U+D800' },
			{ bytes: [0xF0, 0x82, 0x82, 0xAC], reason: 'OVERLONG', description: 'overlong U+20AC' },
			{ bytes: [0xF4, 0x90, 0x80, 0x80], reason: 'OUT_OF_RANGE', description: 'U+110000' }
		];

		for (const check of checks) {
			const bytes = new Uint8Array(check.bytes);
			const cursor = bytes.length;

			expect(tryDecodePrev(bytes, cursor), check.description).toEqual({ ok: false, error: 'INVALID_UTF8', reason: check.reason, start: cursor });
			expect(decodePrev(bytes, cursor, 0, { onError: 'replace' }), check.description).toEqual({ codePoint: 0xFFFD, start: cursor });
			expect(function() {
				decodePrev(bytes, cursor, 0, { onError: 'throw' });
			}, check.description).toThrow(InvalidUTF8Error);
		}
	});

	test('Lower bound', function() {
		const bytes = new Uint8Array([0x41, 0xC3, 0xA9]);

		expect(tryDecodePrev(bytes, 0)).toEqual({ ok: false, error: 'INVALID_UTF8', reason: 'END_OF_INPUT', start: 0 });
		expect(tryDecodePrev(bytes, 1, 1)).toEqual({ ok: false, error: 'INVALID_UTF8', reason: 'END_OF_INPUT', start: 1 });
		expect(tryDecodePrev(bytes, 3, 2)).toEqual({ ok: false, error: 'INVALID_UTF8', reason: 'UNEXPECTED_CONTINUATION', start: 3 });
		expect(tryDecodePrev(bytes, 3, 1)).toEqual({ ok: true, codePoint: 0xE9, start: 1 });

		expect(function() {
			tryDecodePrev(bytes, 4);
		}).toThrow(RangeError);
		expect(function() {
			tryDecodePrev(bytes, 3, -1);
		}).toThrow(RangeError);
	});

	test('Throwing reports the original cursor', function() {
		const bytes = new Uint8Array([0x41, 0xE2, 0x82]);

		withErrorPolicy('throw', function() {
			let error: unknown;
			try {
				decodePrev(bytes, 3);
			} catch (caught) {
				error = caught;
			}

			expect(InvalidUTF8Error.isInstance(error)).toBe(true);
			if (InvalidUTF8Error.isInstance(error)) {
				expect(error.offset).toBe(3);
				expect(error.reason).toBe('SHORT_SEQUENCE');
			}
		});
	});

	test('Inverse navigation', function() {
		fc.assert(fc.property(codePointsArbitrary, function(codePoints) {
			const bytes = encode(codePoints);

			const forward: number[] = [];
			let cursor = 0;
			while (cursor < bytes.length) {
				const { codePoint, next } = decodeOne(bytes, cursor, { onError: 'throw' });
				forward.push(codePoint);
				cursor = next;
			}

			const backward: number[] = [];
			cursor = bytes.length;
			while (cursor > 0) {
				const { codePoint, start } = decodePrev(bytes, cursor, 0, { onError: 'throw' });
				backward.push(codePoint);
				cursor = start;
			}

			expect(forward).toEqual(codePoints);
			expect(backward.reverse()).toEqual(forward);
		}));
	});
});
