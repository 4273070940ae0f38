/**
 * Pattern decoding: header plus the packed cell stream.
 *
 * Each cell starts with a control byte. With bit 7 set, bits 0-4 say which of
 * note / instrument / volume / effect type / effect param follow. With bit 7
 * clear the control byte is the note itself and all four other fields follow.
 */

import { report, type DecodeContext } from './decodeContext.js';
import { usesByteRowCount } from './headerDecoder.js';
import { createLogger } from '../../util/logger.js';
import {
	EMPTY_CELL,
	XM_DEFAULT_ROWS,
	XM_MAX_ROWS,
	type XMCell,
	type XMPattern,
	type XMVersion,
} from './xm.types.js';

const log = createLogger('xm-reader');
const COMPONENT = 'xm-pattern';

const PACKED = 0x80;
const HAS_NOTE = 0x01;
const HAS_INSTRUMENT = 0x02;
const HAS_VOLUME = 0x04;
const HAS_EFFECT_TYPE = 0x08;
const HAS_EFFECT_PARAM = 0x10;

/**
 * All-empty pattern of the given size.
 */
export function emptyPattern(rows: number, channels: number): XMPattern {
	const cells: Readonly<XMCell>[] = new Array(rows * channels).fill(EMPTY_CELL);
	return Object.freeze({ rows, channels, cells: Object.freeze(cells) });
}

/**
 * Reader over one pattern's packed data that yields 0 past the end of the slice,
 * so a short or corrupt stream can never pull bytes from the next structure.
 */
class PackedStream {
	private pos = 0;

	constructor(private readonly data: Uint8Array) {}

	next(): number {
		if (this.pos >= this.data.length) {
			return 0;
		}
		return this.data[this.pos++];
	}
}

/**
 * Unpack `rows × channels` cells from a packed data slice.
 */
export function unpackCells(data: Uint8Array, rows: number, channels: number): Readonly<XMCell>[] {
	const stream = new PackedStream(data);
	const cells: Readonly<XMCell>[] = [];

	for (let i = 0; i < rows * channels; i++) {
		const control = stream.next();
		let cell: XMCell;

		if (control & PACKED) {
			cell = {
				note: control & HAS_NOTE ? stream.next() : 0,
				instrument: control & HAS_INSTRUMENT ? stream.next() : 0,
				volume: control & HAS_VOLUME ? stream.next() : 0,
				effectType: control & HAS_EFFECT_TYPE ? stream.next() : 0,
				effectParam: control & HAS_EFFECT_PARAM ? stream.next() : 0,
			};
		} else {
			cell = {
				note: control,
				instrument: stream.next(),
				volume: stream.next(),
				effectType: stream.next(),
				effectParam: stream.next(),
			};
		}

		cells.push(Object.freeze(cell));
	}

	return cells;
}

/**
 * Decode one pattern at the cursor. Unreadable headers give a 64-row empty pattern.
 */
export function decodePattern(ctx: DecodeContext, channels: number, version: XMVersion, index: number): XMPattern {
	const { cursor } = ctx;
	const start = cursor.position;

	const headerLength = cursor.readU32();
	if (headerLength === undefined) {
		report(ctx, COMPONENT, `Pattern ${index} header missing, using ${XM_DEFAULT_ROWS} empty rows`, start);
		return emptyPattern(XM_DEFAULT_ROWS, channels);
	}

	cursor.readU8(); // packing type, always 0

	let rows: number;
	if (usesByteRowCount(version)) {
		rows = (cursor.readU8() ?? XM_DEFAULT_ROWS - 1) + 1;
	} else {
		rows = cursor.readU16() ?? XM_DEFAULT_ROWS;
	}

	if (rows < 1 || rows > XM_MAX_ROWS) {
		report(ctx, COMPONENT, `Pattern ${index} declares ${rows} rows, using ${XM_DEFAULT_ROWS}`, start);
		rows = XM_DEFAULT_ROWS;
	}

	const packedSize = cursor.readU16();
	if (packedSize === undefined) {
		report(ctx, COMPONENT, `Pattern ${index} packed size missing, using ${rows} empty rows`, start);
		return emptyPattern(rows, channels);
	}
	if (packedSize === 0) {
		log.debug(`pattern ${index}: ${rows} rows, empty`);
		return emptyPattern(rows, channels);
	}

	const dataStart = cursor.position;
	const packed = cursor.readBytes(packedSize);
	if (!packed) {
		report(ctx, COMPONENT, `Pattern ${index} data missing, using ${rows} empty rows`, dataStart);
		return emptyPattern(rows, channels);
	}
	if (packed.length < packedSize) {
		report(ctx, COMPONENT, `Pattern ${index} data truncated (${packed.length} of ${packedSize} bytes)`, dataStart);
	}

	log.debug(`pattern ${index}: ${rows} rows, ${packedSize} packed bytes`);

	const cells = unpackCells(packed, rows, channels);
	return Object.freeze({ rows, channels, cells: Object.freeze(cells) });
}
