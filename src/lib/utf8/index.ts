export type {
	CodePoint,
	ErrorPolicy,
	CodecLogger,
	CodecOptions,
	InvalidUTF8Reason
} from './common.js';
export {
	ERROR_POLICIES,
	DEFAULT_ERROR_POLICY,
	REPLACEMENT_CHARACTER,
	REPLACEMENT_CHARACTER_BYTES,
	MAX_CODE_POINT,
	isErrorPolicy,
	isCodePoint,
	isSurrogate,
	isContinuationByte,
	formatCodePoint
} from './common.js';
export {
	getErrorPolicy,
	setErrorPolicy,
	withErrorPolicy
} from './policy.js';
export {
	encodedLength,
	encodeCodePoint,
	encode
} from './encoder.js';
export type {
	DecodeResult,
	ReverseDecodeResult
} from './decoder.js';
export {
	tryDecodeOne,
	decodeOne,
	codePointAt,
	tryDecodePrev,
	decodePrev
} from './decoder.js';
export {
	isHighSurrogate,
	isLowSurrogate,
	splitSurrogates,
	combineSurrogates,
	toUtf16,
	fromUtf16,
	utf8ToUtf16,
	utf16ToUtf8,
	encodeString,
	decodeToString
} from './surrogate.js';
export {
	decodeAll,
	countReplacements,
	isValid,
	isValidAt,
	lengthInCodePoints
} from './sequence.js';
export type { CharacterClassPredicate } from './classify.js';
export {
	isSpace,
	isBlank,
	isDigit,
	isAlnum,
	isAlpha,
	isXDigit,
	isUpper,
	isLower
} from './classify.js';
export type { Utf8CursorOptions } from './cursor.js';
export { Utf8Cursor } from './cursor.js';
