import type { InvalidUTF8Reason } from './utf8/common.js';
import { formatCodePoint } from './utf8/common.js';
import { assertNever } from './utils/never.js';

export type Utf8CodecErrorCode = 'INVALID_UTF8' | 'INVALID_CODE_POINT' | 'INVALID_WIDE_CHAR';

const INVALID_UTF8_REASONS: readonly InvalidUTF8Reason[] = [
	'UNEXPECTED_CONTINUATION',
	'INVALID_LEAD_BYTE',
	'SHORT_SEQUENCE',
	'SURROGATE',
	'OVERLONG',
	'OUT_OF_RANGE',
	'END_OF_INPUT'
] as const;

function isInvalidUTF8Reason(input: unknown): input is InvalidUTF8Reason {
	return(INVALID_UTF8_REASONS.some(function(reason) {
		return(reason === input);
	}));
}

type Utf8CodecErrorJSON = {
	ok: false;
	error: string;
	name: string;
	code: Utf8CodecErrorCode;
};

/**
 * Type for error classes that can be deserialized
 */
interface DeserializableErrorClass {
	readonly name: string;
	fromJSON: (input: unknown) => Utf8CodecError;
}

let ERROR_CLASS_MAPPING: { [key: string]: (input: unknown) => Utf8CodecError } | null = null;

function getErrorClassMapping(): { [key: string]: (input: unknown) => Utf8CodecError } {
	if (ERROR_CLASS_MAPPING) {
		return(ERROR_CLASS_MAPPING);
	}

	const ERROR_CLASSES: DeserializableErrorClass[] = [
		/*
		 * The base class is left out since it cannot be constructed
		 * without knowing which failure it describes
		 */
		// eslint-disable-next-line @typescript-eslint/no-use-before-define
		InvalidUTF8Error, InvalidCodePointError, InvalidWideCharError
	];

	const mapping: { [key: string]: (input: unknown) => Utf8CodecError } = {};
	for (const errorClass of ERROR_CLASSES) {
		mapping[errorClass.name] = errorClass.fromJSON.bind(errorClass);
	}

	ERROR_CLASS_MAPPING = mapping;
	return(mapping);
}

/**
 * Base error class for all codec failures
 */
export class Utf8CodecError extends Error {
	static override readonly name: string = 'Utf8CodecError';
	#name: string;
	private readonly utf8CodecErrorObjectTypeID!: string;
	private static readonly utf8CodecErrorObjectTypeID = '0b7c2a4e-93d1-4f0a-8d6e-51c6a2f4e7b9';
	readonly code: Utf8CodecErrorCode;

	override get name(): string {
		return(this.#name);
	}

	protected override set name(value: string) {
		this.#name = value;
	}

	constructor(code: Utf8CodecErrorCode, message: string) {
		super(message);

		// Need to cast to access the static name property from the constructor
		// eslint-disable-next-line @typescript-eslint/consistent-type-assertions
		this.#name = (this.constructor as typeof Utf8CodecError).name;
		this.code = code;

		Object.defineProperty(this, 'utf8CodecErrorObjectTypeID', {
			value: Utf8CodecError.utf8CodecErrorObjectTypeID,
			enumerable: false
		});
	}

	static isInstance(input: unknown, code?: Utf8CodecErrorCode): input is Utf8CodecError {
		if (!this.hasPropWithValue(input, 'utf8CodecErrorObjectTypeID', Utf8CodecError.utf8CodecErrorObjectTypeID)) {
			return(false);
		}

		if (code !== undefined && !this.hasPropWithValue(input, 'code', code)) {
			return(false);
		}

		return(true);
	}

	toJSON(): Utf8CodecErrorJSON {
		return({
			ok: false,
			error: this.message,
			name: this.#name,
			code: this.code
		});
	}

	protected static hasPropWithValue<PROP extends string, VALUE extends string | number | boolean>(input: unknown, prop: PROP, value: VALUE): input is { [key in PROP]: VALUE } {
		if (typeof input !== 'object' || input === null) {
			return(false);
		}

		if (!(prop in input)) {
			return(false);
		}

		// eslint-disable-next-line @typescript-eslint/consistent-type-assertions
		const inputValue = input[prop as keyof typeof input] as unknown;
		if (inputValue !== value) {
			return(false);
		}

		return(true);
	}

	/**
	 * Extract common error properties from JSON input
	 * This validates the structure and extracts properties needed for construction
	 */
	protected static extractErrorProperties(input: unknown, expectedClass?: { name: string }): { message: string; other: { [key: string]: unknown }} {
		if (!this.hasPropWithValue(input, 'ok', false)) {
			throw(new Error('Invalid error JSON object'));
		}

		if (typeof input !== 'object' || input === null) {
			throw(new Error('Invalid error JSON object'));
		}

		if (expectedClass && 'name' in input && input.name !== expectedClass.name) {
			throw(new Error(`Error name mismatch: expected ${expectedClass.name}, got ${String(input.name)}`));
		}

		let message = 'Internal error';
		if ('error' in input && typeof input.error === 'string') {
			message = input.error;
		}

		const other: { [key: string]: unknown } = {};
		for (const [key, value] of Object.entries(input)) {
			if (key !== 'error' && key !== 'ok') {
				other[key] = value;
			}
		}

		return({ message, other });
	}

	protected static requireOffset(other: { [key: string]: unknown }): number {
		const offset = other['offset'];
		if (typeof offset !== 'number' || !Number.isInteger(offset) || offset < 0) {
			throw(new Error('Invalid offset: expected non-negative integer'));
		}

		return(offset);
	}

	/**
	 * Rebuild the specific error subclass from its JSON form
	 */
	static fromJSON(input: unknown): Utf8CodecError {
		if (typeof input !== 'object' || input === null) {
			throw(new Error('Invalid error JSON object'));
		}

		if (!('ok' in input) || input.ok !== false) {
			throw(new Error('Invalid error JSON object: expected ok: false'));
		}

		if ('name' in input && typeof input.name === 'string') {
			const deserializer = getErrorClassMapping()[input.name];
			if (deserializer) {
				return(deserializer(input));
			}
		}

		throw(new Error('Invalid error JSON object: unknown error class'));
	}
}

/**
 * A byte sequence is not well-formed UTF-8
 */
export class InvalidUTF8Error extends Utf8CodecError {
	static override readonly name: string = 'InvalidUTF8Error';
	private readonly invalidUTF8ErrorObjectTypeID!: string;
	private static readonly invalidUTF8ErrorObjectTypeID = 'c3e8f0a9-2b57-4d61-9f3c-7a0d8e6b1c24';

	readonly reason: InvalidUTF8Reason;

	/**
	 * Byte offset of the start of the malformed sequence
	 */
	readonly offset: number;

	constructor(reason: InvalidUTF8Reason, offset: number, message?: string) {
		super('INVALID_UTF8', message ?? InvalidUTF8Error.describe(reason, offset));

		Object.defineProperty(this, 'invalidUTF8ErrorObjectTypeID', {
			value: InvalidUTF8Error.invalidUTF8ErrorObjectTypeID,
			enumerable: false
		});

		this.reason = reason;
		this.offset = offset;
	}

	static override isInstance(input: unknown): input is InvalidUTF8Error {
		return(this.hasPropWithValue(input, 'invalidUTF8ErrorObjectTypeID', InvalidUTF8Error.invalidUTF8ErrorObjectTypeID));
	}

	static describe(reason: InvalidUTF8Reason, offset: number): string {
		let detail: string;
		switch (reason) {
			case 'UNEXPECTED_CONTINUATION':
				detail = 'continuation byte where a lead byte was expected';
				break;
			case 'INVALID_LEAD_BYTE':
				detail = 'byte cannot start a sequence';
				break;
			case 'SHORT_SEQUENCE':
				detail = 'sequence is missing continuation bytes';
				break;
			case 'SURROGATE':
				detail = 'encoded surrogate';
				break;
			case 'OVERLONG':
				detail = 'overlong encoding';
				break;
			case 'OUT_OF_RANGE':
				detail = 'value exceeds U+10FFFF';
				break;
			case 'END_OF_INPUT':
				detail = 'no bytes left to decode';
				break;
			default:
				assertNever(reason);
		}

		return(`Invalid UTF-8 encoding at offset ${offset}: ${detail}`);
	}

	override toJSON(): Utf8CodecErrorJSON & { reason: InvalidUTF8Reason; offset: number } {
		return({
			...super.toJSON(),
			reason: this.reason,
			offset: this.offset
		});
	}

	static override fromJSON(input: unknown): InvalidUTF8Error {
		const { message, other } = this.extractErrorProperties(input, this);

		const reason = other['reason'];
		if (!isInvalidUTF8Reason(reason)) {
			throw(new Error('Invalid InvalidUTF8Error JSON: bad reason'));
		}

		return(new this(reason, this.requireOffset(other), message));
	}
}

/**
 * A number presented for encoding is not a Unicode scalar value
 */
export class InvalidCodePointError extends Utf8CodecError {
	static override readonly name: string = 'InvalidCodePointError';
	private readonly invalidCodePointErrorObjectTypeID!: string;
	private static readonly invalidCodePointErrorObjectTypeID = '6d2f9b18-c0e4-4a7b-b5d3-e1f87a2c9054';

	readonly value: number;

	constructor(value: number, message?: string) {
		super('INVALID_CODE_POINT', message ?? `Invalid code point value: ${formatCodePoint(value)}`);

		Object.defineProperty(this, 'invalidCodePointErrorObjectTypeID', {
			value: InvalidCodePointError.invalidCodePointErrorObjectTypeID,
			enumerable: false
		});

		this.value = value;
	}

	static override isInstance(input: unknown): input is InvalidCodePointError {
		return(this.hasPropWithValue(input, 'invalidCodePointErrorObjectTypeID', InvalidCodePointError.invalidCodePointErrorObjectTypeID));
	}

	override toJSON(): Utf8CodecErrorJSON & { value: number } {
		return({
			...super.toJSON(),
			value: this.value
		});
	}

	static override fromJSON(input: unknown): InvalidCodePointError {
		const { message, other } = this.extractErrorProperties(input, this);

		const value = other['value'];
		if (typeof value !== 'number') {
			throw(new Error('Invalid InvalidCodePointError JSON: expected numeric value'));
		}

		return(new this(value, message));
	}
}

/**
 * A lone or mismatched surrogate in a 16-bit code unit sequence
 */
export class InvalidWideCharError extends Utf8CodecError {
	static override readonly name: string = 'InvalidWideCharError';
	private readonly invalidWideCharErrorObjectTypeID!: string;
	private static readonly invalidWideCharErrorObjectTypeID = 'e9a41c7d-58f2-4b06-a3e9-0c6d2b8f7a13';

	/**
	 * Index of the offending 16-bit unit
	 */
	readonly offset: number;

	constructor(offset: number, message?: string) {
		super('INVALID_WIDE_CHAR', message ?? `Invalid UTF-16 encoding at unit ${offset}: unpaired surrogate`);

		Object.defineProperty(this, 'invalidWideCharErrorObjectTypeID', {
			value: InvalidWideCharError.invalidWideCharErrorObjectTypeID,
			enumerable: false
		});

		this.offset = offset;
	}

	static override isInstance(input: unknown): input is InvalidWideCharError {
		return(this.hasPropWithValue(input, 'invalidWideCharErrorObjectTypeID', InvalidWideCharError.invalidWideCharErrorObjectTypeID));
	}

	override toJSON(): Utf8CodecErrorJSON & { offset: number } {
		return({
			...super.toJSON(),
			offset: this.offset
		});
	}

	static override fromJSON(input: unknown): InvalidWideCharError {
		const { message, other } = this.extractErrorProperties(input, this);

		return(new this(this.requireOffset(other), message));
	}
}

/**
 * Deserialize a JSON object to the appropriate {@link Utf8CodecError} subclass
 */
export function deserializeError(input: unknown): Utf8CodecError {
	return(Utf8CodecError.fromJSON(input));
}
