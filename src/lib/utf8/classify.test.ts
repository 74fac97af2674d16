import { test, expect, describe } from 'vitest';
import { isAlnum, isAlpha, isBlank, isDigit, isLower, isSpace, isUpper, isXDigit } from './classify.js';
import type { CharacterClassPredicate } from './classify.js';
import { encode } from './encoder.js';
import { withErrorPolicy } from './policy.js';
import { InvalidUTF8Error } from '../error.js';

function between(value: number, first: string, last: string): boolean {
	return(value >= first.charCodeAt(0) && value <= last.charCodeAt(0));
}

/*
 * The classic 7-bit ctype tables of the "C" locale
 */
const asciiTables: { name: string; predicate: CharacterClassPredicate; expected: (value: number) => boolean }[] = [
	{ name: 'space', predicate: isSpace, expected: function(value) { return((value >= 0x09 && value <= 0x0D) || value === 0x20); } },
	{ name: 'blank', predicate: isBlank, expected: function(value) { return(value === 0x09 || value === 0x20); } },
	{ name: 'digit', predicate: isDigit, expected: function(value) { return(between(value, '0', '9')); } },
	{ name: 'alpha', predicate: isAlpha, expected: function(value) { return(between(value, 'A', 'Z') || between(value, 'a', 'z')); } },
	{ name: 'alnum', predicate: isAlnum, expected: function(value) { return(between(value, '0', '9') || between(value, 'A', 'Z') || between(value, 'a', 'z')); } },
	{ name: 'xdigit', predicate: isXDigit, expected: function(value) { return(between(value, '0', '9') || between(value, 'A', 'F') || between(value, 'a', 'f')); } },
	{ name: 'upper', predicate: isUpper, expected: function(value) { return(between(value, 'A', 'Z')); } },
	{ name: 'lower', predicate: isLower, expected: function(value) { return(between(value, 'a', 'z')); } }
];

describe('Character Classification', function() {
	test('ASCII matches the C locale', function() {
		for (const table of asciiTables) {
			for (let value = 0; value < 0x80; value++) {
				expect(table.predicate(value), `${table.name}(${value})`).toBe(table.expected(value));
			}
		}
	});

	test('White space', function() {
		const spaces = [0x85, 0xA0, 0x1680, 0x2000, 0x2005, 0x200A, 0x2028, 0x2029, 0x202F, 0x205F, 0x3000];
		const notSpaces = [0x200B, 0x180E, 0xFEFF, 0x2060, 0xFFFD, 0x10FFFF];

		for (const value of spaces) {
			expect(isSpace(value), `U+${value.toString(16)}`).toBe(true);
		}

		for (const value of notSpaces) {
			expect(isSpace(value), `U+${value.toString(16)}`).toBe(false);
		}
	});

	test('Blank characters', function() {
		const blanks = [0xA0, 0x1680, 0x2000, 0x200A, 0x202F, 0x205F, 0x3000];
		const notBlanks = [0x0A, 0x0D, 0x85, 0x2028, 0x2029, 0x200B];

		for (const value of blanks) {
			expect(isBlank(value), `U+${value.toString(16)}`).toBe(true);
		}

		for (const value of notBlanks) {
			expect(isBlank(value), `U+${value.toString(16)}`).toBe(false);
		}
	});

	test('Digits and letters are ASCII only', function() {
		expect(isDigit(0x0660)).toBe(false);
		expect(isDigit(0xFF10)).toBe(false);
		expect(isAlpha(0xE9)).toBe(false);
		expect(isAlpha(0x3B1)).toBe(false);
		expect(isAlnum(0xFF21)).toBe(false);
		expect(isXDigit(0xFF21)).toBe(false);
	});

	test('Case outside of ASCII', function() {
		const checks = [
			{ value: 0xC9, upper: true, lower: false },
			{ value: 0xE9, upper: false, lower: true },
			{ value: 0xDF, upper: false, lower: true },
			{ value: 0x391, upper: true, lower: false },
			{ value: 0x3B1, upper: false, lower: true },
			{ value: 0x1D400, upper: true, lower: false },
			{ value: 0x4E2D, upper: false, lower: false },
			{ value: 0x1F600, upper: false, lower: false },
			{ value: 0xD800, upper: false, lower: false },
			{ value: 0x110000, upper: false, lower: false }
		];

		for (const check of checks) {
			expect(isUpper(check.value), `U+${check.value.toString(16)}`).toBe(check.upper);
			expect(isLower(check.value), `U+${check.value.toString(16)}`).toBe(check.lower);
		}
	});

	test('Byte sequence form', function() {
		const bytes = encode([0x61, 0xC9, 0x3000, 0x37]);

		expect(isLower(bytes, 0)).toBe(true);
		expect(isUpper(bytes, 1)).toBe(true);
		expect(isSpace(bytes, 3)).toBe(true);
		expect(isBlank(bytes, 3)).toBe(true);
		expect(isDigit(bytes, 6)).toBe(true);
		expect(isXDigit(bytes, 6)).toBe(true);
	});

	test('Malformed bytes follow the error policy', function() {
		const bytes = new Uint8Array([0x20, 0x80]);

		expect(isSpace(bytes, 1)).toBe(false);
		expect(isSpace(bytes, 1, { onError: 'replace' })).toBe(false);
		expect(function() {
			isSpace(bytes, 1, { onError: 'throw' });
		}).toThrow(InvalidUTF8Error);

		withErrorPolicy('throw', function() {
			expect(isSpace(bytes, 0)).toBe(true);
			expect(function() {
				isAlpha(bytes, 1);
			}).toThrow(InvalidUTF8Error);
		});
	});
});
