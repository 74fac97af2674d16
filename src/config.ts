import type { CodecLogger, CodecOptions, CodePoint, ErrorPolicy } from './lib/utf8/common.js';
import { DEFAULT_ERROR_POLICY, isErrorPolicy } from './lib/utf8/common.js';
import { setErrorPolicy } from './lib/utf8/policy.js';
import { encode } from './lib/utf8/encoder.js';
import { codePointAt, decodeOne, decodePrev } from './lib/utf8/decoder.js';
import {
	decodeToString,
	encodeString,
	fromUtf16,
	toUtf16,
	utf16ToUtf8,
	utf8ToUtf16
} from './lib/utf8/surrogate.js';
import { decodeAll } from './lib/utf8/sequence.js';
import { Utf8Cursor } from './lib/utf8/cursor.js';
import type { Utf8CursorOptions } from './lib/utf8/cursor.js';
import type { ByteSource } from './lib/utils/buffer.js';
import { isLogTargetLevel } from './lib/log/common.js';
import { createConsoleLog } from './lib/log/index.js';

export type CodecConfig = {
	errorPolicy: ErrorPolicy;
	logger?: CodecLogger | undefined;
};

type CodecConfigOptions = Partial<CodecConfig>;

type CodecEnvironment = { [key: string]: string | undefined };

function getPolicyFromEnvironment(env: CodecEnvironment): ErrorPolicy | undefined {
	const value = env['UTF8_CODEC_ERROR_POLICY'];
	if (value === undefined || value === '') {
		return(undefined);
	}

	const policy = value.trim().toLowerCase();
	if (!isErrorPolicy(policy)) {
		throw(new Error(`Invalid UTF8_CODEC_ERROR_POLICY: ${value}, expected "replace" or "throw"`));
	}

	return(policy);
}

function getLoggerFromEnvironment(env: CodecEnvironment): CodecLogger | undefined {
	const value = env['UTF8_CODEC_LOG_LEVEL'];
	if (value === undefined || value === '') {
		return(undefined);
	}

	const logLevel = value.trim().toUpperCase();
	if (!isLogTargetLevel(logLevel)) {
		throw(new Error(`Invalid UTF8_CODEC_LOG_LEVEL: ${value}`));
	}

	return(createConsoleLog(logLevel));
}

/**
 * Build a codec configuration from explicit options, falling back to the
 * environment:
 *   - UTF8_CODEC_ERROR_POLICY: "replace" or "throw"
 *   - UTF8_CODEC_LOG_LEVEL: log to the console at this level
 */
export function getDefaultCodecConfig(options: CodecConfigOptions = {}, env: CodecEnvironment = process.env): CodecConfig {
	const errorPolicy = options.errorPolicy ?? getPolicyFromEnvironment(env) ?? DEFAULT_ERROR_POLICY;
	if (!isErrorPolicy(errorPolicy)) {
		throw(new Error(`Invalid error policy: ${String(errorPolicy)}`));
	}

	return({
		errorPolicy,
		logger: options.logger ?? getLoggerFromEnvironment(env)
	});
}

/**
 * Install the configured policy in the error-policy register of the current
 * thread
 *
 * @returns The policy that was in effect before
 */
export function applyCodecConfig(config: CodecConfig): ErrorPolicy {
	const previous = setErrorPolicy(config.errorPolicy);
	if (previous !== config.errorPolicy) {
		config.logger?.debug('config.applyCodecConfig', `Error policy changed from "${previous}" to "${config.errorPolicy}"`);
	}

	return(previous);
}

/**
 * The codec operations with the configured policy and logger bound to every
 * call, so they do not depend on the error-policy register
 */
export type Codec = {
	readonly config: Readonly<CodecConfig>;
	encode(input: CodePoint | Iterable<CodePoint>): Uint8Array;
	decode(input: ByteSource): CodePoint[];
	decodeOne(bytes: Uint8Array, cursor: number): { codePoint: CodePoint; next: number };
	decodePrev(bytes: Uint8Array, cursor: number, lowerBound?: number): { codePoint: CodePoint; start: number };
	codePointAt(bytes: Uint8Array, cursor: number): CodePoint;
	toUtf16(codePoints: Iterable<CodePoint>): Uint16Array;
	fromUtf16(units: ArrayLike<number>): CodePoint[];
	utf8ToUtf16(input: ByteSource): Uint16Array;
	utf16ToUtf8(units: ArrayLike<number>): Uint8Array;
	encodeString(input: string): Uint8Array;
	decodeToString(input: ByteSource): string;
	cursor(input: ByteSource, options?: Pick<Utf8CursorOptions, 'start' | 'end' | 'position'>): Utf8Cursor;
};

export function createCodec(config: CodecConfig = getDefaultCodecConfig()): Codec {
	const options: CodecOptions = { onError: config.errorPolicy };
	if (config.logger !== undefined) {
		options.logger = config.logger;
	}

	return({
		config: { ...config },
		encode: function(input) {
			return(encode(input, options));
		},
		decode: function(input) {
			return(decodeAll(input, options));
		},
		decodeOne: function(bytes, cursor) {
			return(decodeOne(bytes, cursor, options));
		},
		decodePrev: function(bytes, cursor, lowerBound = 0) {
			return(decodePrev(bytes, cursor, lowerBound, options));
		},
		codePointAt: function(bytes, cursor) {
			return(codePointAt(bytes, cursor, options));
		},
		toUtf16: function(codePoints) {
			return(toUtf16(codePoints, options));
		},
		fromUtf16: function(units) {
			return(fromUtf16(units, options));
		},
		utf8ToUtf16: function(input) {
			return(utf8ToUtf16(input, options));
		},
		utf16ToUtf8: function(units) {
			return(utf16ToUtf8(units, options));
		},
		encodeString: function(input) {
			return(encodeString(input, options));
		},
		decodeToString: function(input) {
			return(decodeToString(input, options));
		},
		cursor: function(input, cursorOptions = {}) {
			return(new Utf8Cursor(input, { ...cursorOptions, ...options }));
		}
	});
}
