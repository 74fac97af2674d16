import type { CodecOptions, CodePoint } from './common.js';
import { codePointAt } from './decoder.js';

/*
 * Code points with the White_Space=yes property, sorted
 */
const SPACE_TABLE: readonly CodePoint[] = [
	0x09, 0x0A, 0x0B, 0x0C, 0x0D, 0x20, 0x85, 0xA0, 0x1680,
	0x2000, 0x2001, 0x2002, 0x2003, 0x2004, 0x2005, 0x2006, 0x2007, 0x2008, 0x2009, 0x200A,
	0x2028, 0x2029, 0x202F, 0x205F, 0x3000
];

/*
 * HORIZONTAL TAB plus the Space_Separator (Zs) category, sorted
 */
const BLANK_TABLE: readonly CodePoint[] = [
	0x09, 0x20, 0xA0, 0x1680,
	0x2000, 0x2001, 0x2002, 0x2003, 0x2004, 0x2005, 0x2006, 0x2007, 0x2008, 0x2009, 0x200A,
	0x202F, 0x205F, 0x3000
];

const uppercaseRegex = /^\p{Lu}$/u;
const lowercaseRegex = /^\p{Ll}$/u;

function inTable(table: readonly CodePoint[], codePoint: CodePoint): boolean {
	let low = 0;
	let high = table.length;
	while (low < high) {
		const middle = (low + high) >>> 1;
		const entry = table[middle] ?? 0;
		if (entry < codePoint) {
			low = middle + 1;
		} else {
			high = middle;
		}
	}

	return(table[low] === codePoint);
}

function inRange(codePoint: CodePoint, first: string, last: string): boolean {
	return(codePoint >= first.charCodeAt(0) && codePoint <= last.charCodeAt(0));
}

function isAsciiDigit(codePoint: CodePoint): boolean {
	return(inRange(codePoint, '0', '9'));
}

function isAsciiUpper(codePoint: CodePoint): boolean {
	return(inRange(codePoint, 'A', 'Z'));
}

function isAsciiLower(codePoint: CodePoint): boolean {
	return(inRange(codePoint, 'a', 'z'));
}

function isUnicodeCategory(regex: RegExp, codePoint: CodePoint): boolean {
	if (codePoint < 0 || codePoint > 0x10FFFF || !Number.isInteger(codePoint)) {
		return(false);
	}

	return(regex.test(String.fromCodePoint(codePoint)));
}

type CodePointTest = (codePoint: CodePoint) => boolean;

/**
 * A predicate that can be asked about a code point, or about the code
 * point encoded at a position in a UTF-8 byte sequence
 */
export interface CharacterClassPredicate {
	(codePoint: CodePoint): boolean;
	(bytes: Uint8Array, cursor: number, options?: CodecOptions): boolean;
}

function predicate(test: CodePointTest): CharacterClassPredicate {
	function classify(codePoint: CodePoint): boolean;
	function classify(bytes: Uint8Array, cursor: number, options?: CodecOptions): boolean;
	function classify(input: CodePoint | Uint8Array, cursor?: number, options?: CodecOptions): boolean {
		if (typeof input === 'number') {
			return(test(input));
		}

		return(test(codePointAt(input, cursor ?? 0, options)));
	}

	return(classify);
}

/**
 * White space: TAB, LF, VT, FF, CR, SPACE and every other code point with
 * the White_Space property (NEL, NBSP, the U+2000 block spaces, ...)
 */
export const isSpace: CharacterClassPredicate = predicate(function(codePoint) {
	return(inTable(SPACE_TABLE, codePoint));
});

/**
 * TAB or a Space_Separator (Zs) character
 */
export const isBlank: CharacterClassPredicate = predicate(function(codePoint) {
	return(inTable(BLANK_TABLE, codePoint));
});

/**
 * ASCII decimal digit 0-9
 */
export const isDigit: CharacterClassPredicate = predicate(isAsciiDigit);

/**
 * ASCII letter A-Z or a-z
 */
export const isAlpha: CharacterClassPredicate = predicate(function(codePoint) {
	return(isAsciiUpper(codePoint) || isAsciiLower(codePoint));
});

/**
 * ASCII digit or letter
 */
export const isAlnum: CharacterClassPredicate = predicate(function(codePoint) {
	return(isAsciiDigit(codePoint) || isAsciiUpper(codePoint) || isAsciiLower(codePoint));
});

/**
 * Hexadecimal digit 0-9, A-F or a-f
 */
export const isXDigit: CharacterClassPredicate = predicate(function(codePoint) {
	return(isAsciiDigit(codePoint) || inRange(codePoint, 'A', 'F') || inRange(codePoint, 'a', 'f'));
});

/**
 * Upper case letter: A-Z, or any code point in the Lu category above ASCII
 */
export const isUpper: CharacterClassPredicate = predicate(function(codePoint) {
	if (codePoint < 0x80) {
		return(isAsciiUpper(codePoint));
	}

	return(isUnicodeCategory(uppercaseRegex, codePoint));
});

/**
 * Lower case letter: a-z, or any code point in the Ll category above ASCII
 */
export const isLower: CharacterClassPredicate = predicate(function(codePoint) {
	if (codePoint < 0x80) {
		return(isAsciiLower(codePoint));
	}

	return(isUnicodeCategory(lowercaseRegex, codePoint));
});
