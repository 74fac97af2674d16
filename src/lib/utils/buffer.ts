/*
 * Byte input accepted by the codec: typed arrays and DataViews are viewed in
 * place, plain arrays of numbers are checked to be octets and copied
 */
export type ByteSource = ArrayBufferView | ArrayBuffer | ArrayLike<number>;

export function toBytes(src: ByteSource): Uint8Array {
	if (src instanceof Uint8Array) {
		return(src);
	}

	if (ArrayBuffer.isView(src)) {
		// Zero-copy: references the same ArrayBuffer range.
		return(new Uint8Array(src.buffer, src.byteOffset, src.byteLength));
	}

	if (src instanceof ArrayBuffer) {
		// Zero-copy: shares memory with the ArrayBuffer
		return(new Uint8Array(src));
	}

	const bytes = new Uint8Array(src.length);
	for (let index = 0; index < src.length; index++) {
		const byte = src[index];
		if (byte === undefined || !Number.isInteger(byte) || byte < 0 || byte > 0xFF) {
			throw(new RangeError(`Invalid byte at index ${index}: ${String(byte)}`));
		}

		bytes[index] = byte;
	}

	return(bytes);
}

const INITIAL_CAPACITY = 16;

/**
 * Growable, append-only byte buffer; the capacity doubles whenever it is
 * exceeded
 */
export class ByteBuffer {
	#storage: Uint8Array;
	#length = 0;

	constructor(initialCapacity: number = INITIAL_CAPACITY) {
		if (!Number.isInteger(initialCapacity) || initialCapacity < 0) {
			throw(new RangeError(`Invalid initial capacity: ${initialCapacity}`));
		}

		this.#storage = new Uint8Array(Math.max(initialCapacity, 1));
	}

	get length(): number {
		return(this.#length);
	}

	get capacity(): number {
		return(this.#storage.length);
	}

	#reserve(additional: number): void {
		const required = this.#length + additional;
		if (required <= this.#storage.length) {
			return;
		}

		let capacity = this.#storage.length * 2;
		while (capacity < required) {
			capacity *= 2;
		}

		const storage = new Uint8Array(capacity);
		storage.set(this.#storage.subarray(0, this.#length));
		this.#storage = storage;
	}

	/**
	 * Append one or more bytes, each truncated to 8 bits
	 */
	push(...bytes: number[]): void {
		this.#reserve(bytes.length);
		for (const byte of bytes) {
			this.#storage[this.#length++] = byte & 0xFF;
		}
	}

	append(bytes: ByteSource): void {
		const view = toBytes(bytes);
		this.#reserve(view.length);
		this.#storage.set(view, this.#length);
		this.#length += view.length;
	}

	/**
	 * Copy of the bytes written so far
	 */
	toBytes(): Uint8Array {
		return(this.#storage.slice(0, this.#length));
	}
}
