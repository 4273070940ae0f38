/**
 * Sequential little-endian reader with explicit position control.
 *
 * Reads never throw: running out of data yields `undefined` for numbers and
 * `''` for strings, and the decoders substitute their own defaults.
 */
export class ByteCursor {
	private readonly bytes: Uint8Array;
	private offset: number = 0;

	constructor(bytes: Uint8Array) {
		this.bytes = bytes;
	}

	get position(): number {
		return this.offset;
	}

	get length(): number {
		return this.bytes.length;
	}

	get remaining(): number {
		return Math.max(0, this.bytes.length - this.offset);
	}

	/** Absolute seek. Positions past the end are allowed; reads there return nothing. */
	seek(offset: number): void {
		this.offset = Math.max(0, offset);
	}

	skip(count: number): void {
		this.seek(this.offset + count);
	}

	readU8(): number | undefined {
		if (this.offset >= this.bytes.length) {
			return undefined;
		}
		const value = this.bytes[this.offset];
		this.offset += 1;
		return value;
	}

	readI8(): number | undefined {
		const value = this.readU8();
		if (value === undefined) return undefined;
		return value >= 0x80 ? value - 0x100 : value;
	}

	readU16(): number | undefined {
		const lo = this.readU8();
		const hi = this.readU8();
		if (lo === undefined || hi === undefined) return undefined;
		return lo | (hi << 8);
	}

	readU32(): number | undefined {
		const lo = this.readU16();
		const hi = this.readU16();
		if (lo === undefined || hi === undefined) return undefined;
		// multiply instead of shifting so values >= 2^31 stay positive
		return lo + hi * 0x10000;
	}

	/**
	 * Up to `count` bytes as a view into the buffer; `undefined` when nothing is left.
	 */
	readBytes(count: number): Uint8Array | undefined {
		if (this.offset >= this.bytes.length) {
			this.skip(count);
			return undefined;
		}
		const end = Math.min(this.bytes.length, this.offset + count);
		const view = this.bytes.subarray(this.offset, end);
		this.skip(count);
		return view;
	}

	/**
	 * Fixed-width latin1 string, cut at the first NUL. A short read gives ''.
	 */
	readFixedString(count: number): string {
		const raw = this.readBytes(count);
		if (!raw || raw.length < count) {
			return '';
		}
		const nul = raw.indexOf(0);
		const text = nul >= 0 ? raw.subarray(0, nul) : raw;
		return String.fromCharCode(...text);
	}
}

/**
 * XM size fields count from the start of the field itself: the structure they
 * describe ends `size` bytes after the 4-byte field began. `fieldEnd` is the
 * cursor position right after reading the field.
 */
export function offsetFromSizeField(fieldEnd: number, size: number): number {
	return fieldEnd - 4 + size;
}

export default ByteCursor;
