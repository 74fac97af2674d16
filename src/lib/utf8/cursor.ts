import type { CodecOptions, CodePoint, ErrorPolicy } from './common.js';
import { decodeOne, tryDecodePrev } from './decoder.js';
import { effectivePolicy, resolveFailure } from './policy.js';
import { InvalidUTF8Error } from '../error.js';
import { toBytes } from '../utils/buffer.js';
import type { ByteSource } from '../utils/buffer.js';

export type Utf8CursorOptions = CodecOptions & {
	/**
	 * First byte the cursor may read (default 0)
	 */
	start?: number;

	/**
	 * One past the last byte the cursor may read (default: the length of
	 * the input)
	 */
	end?: number;

	/**
	 * Initial position (default: `start`)
	 */
	position?: number;
};

function checkOffset(name: string, value: number, min: number, max: number): number {
	if (!Number.isInteger(value) || value < min || value > max) {
		throw(new RangeError(`Invalid ${name} ${value}, expected an integer in [${min}, ${max}]`));
	}

	return(value);
}

/**
 * A position within a UTF-8 byte sequence that moves one code point at a
 * time in either direction, never leaving the bounds [start, end).
 *
 * Malformed input is handled according to the error policy: under
 * "replace" {@link next} and {@link prev} produce U+FFFD, under "throw"
 * they raise {@link InvalidUTF8Error}.
 */
export class Utf8Cursor implements Iterable<CodePoint> {
	readonly bytes: Uint8Array;
	readonly start: number;
	readonly end: number;

	readonly #view: Uint8Array;
	readonly #options: CodecOptions;
	#position: number;

	constructor(input: ByteSource, options: Utf8CursorOptions = {}) {
		const { start, end, position, ...codecOptions } = options;

		this.bytes = toBytes(input);
		this.end = checkOffset('end', end ?? this.bytes.length, 0, this.bytes.length);
		this.start = checkOffset('start', start ?? 0, 0, this.end);
		this.#position = checkOffset('position', position ?? this.start, this.start, this.end);

		/*
		 * The forward decoder reads up to the end of the array it is
		 * given; offsets stay the same since the view begins at 0
		 */
		this.#view = this.bytes.subarray(0, this.end);
		this.#options = codecOptions;
	}

	get position(): number {
		return(this.#position);
	}

	set position(value: number) {
		this.#position = checkOffset('position', value, this.start, this.end);
	}

	get atStart(): boolean {
		return(this.#position === this.start);
	}

	get atEnd(): boolean {
		return(this.#position === this.end);
	}

	/**
	 * The code point at the current position, without moving
	 */
	peek(): CodePoint | undefined {
		if (this.atEnd) {
			return(undefined);
		}

		return(decodeOne(this.#view, this.#position, this.#options).codePoint);
	}

	/**
	 * Read the code point at the current position and move past it, or
	 * return undefined at the end
	 */
	next(): CodePoint | undefined {
		if (this.atEnd) {
			return(undefined);
		}

		const { codePoint, next } = decodeOne(this.#view, this.#position, this.#options);
		this.#position = next;

		return(codePoint);
	}

	/**
	 * Move to the start of the previous code point and return it, or return
	 * undefined at the start.
	 *
	 * A malformed sequence leaves the position where it was under the
	 * "throw" policy; under "replace" the cursor steps back a single byte.
	 */
	prev(): CodePoint | undefined {
		if (this.atStart) {
			return(undefined);
		}

		const cursor = this.#position;
		const result = tryDecodePrev(this.#view, cursor, this.start);
		if (result.ok) {
			this.#position = result.start;
			return(result.codePoint);
		}

		const codePoint = resolveFailure(this.#options, function() {
			return(new InvalidUTF8Error(result.reason, cursor));
		});
		this.#position = cursor - 1;

		return(codePoint);
	}

	clone(): Utf8Cursor {
		return(new Utf8Cursor(this.bytes, {
			...this.#options,
			start: this.start,
			end: this.end,
			position: this.#position
		}));
	}

	/**
	 * Code points from the current position to the end. The cursor itself
	 * does not move.
	 */
	*[Symbol.iterator](): Generator<CodePoint, void, undefined> {
		const cursor = this.clone();
		for (let codePoint = cursor.next(); codePoint !== undefined; codePoint = cursor.next()) {
			yield codePoint;
		}
	}

	/**
	 * Code points from the current position back to the start, nearest
	 * first. The cursor itself does not move.
	 */
	*reverse(): Generator<CodePoint, void, undefined> {
		const cursor = this.clone();
		for (let codePoint = cursor.prev(); codePoint !== undefined; codePoint = cursor.prev()) {
			yield codePoint;
		}
	}

	/**
	 * The error policy this cursor is currently operating under
	 */
	get errorPolicy(): ErrorPolicy {
		return(effectivePolicy(this.#options));
	}
}
