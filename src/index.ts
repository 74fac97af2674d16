import * as lib from './lib/index.js';
import {
	applyCodecConfig,
	createCodec,
	getDefaultCodecConfig
} from './config.js';
import type { Codec, CodecConfig } from './config.js';

export * from './lib/utf8/index.js';
export {
	Utf8CodecError,
	InvalidUTF8Error,
	InvalidCodePointError,
	InvalidWideCharError,
	deserializeError
} from './lib/error.js';
export type { Utf8CodecErrorCode } from './lib/error.js';

export type {
	Codec,
	CodecConfig
};
export {
	applyCodecConfig,
	createCodec,
	getDefaultCodecConfig,
	lib
};
