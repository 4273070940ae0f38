/**
 * Module header: signature, names, version, song parameters and order table.
 *
 * Layout (offsets in bytes):
 *   0  "Extended Module: " (17)
 *  17  module name (20)
 *  37  0x1A
 *  38  tracker name (20)
 *  58  version minor, version major
 *  60  header size (u32, counted from offset 60)
 *  64  song length, restart, channels, patterns, instruments, flags, tempo, bpm (u16 each)
 *  80  pattern order table (256 × u8)
 */

import { offsetFromSizeField } from './byteCursor.js';
import { report, type DecodeContext } from './decodeContext.js';
import {
	FrequencyTable,
	XMFormatError,
	XM_DEFAULT_BPM,
	XM_DEFAULT_TEMPO,
	XM_MARKER,
	XM_ORDER_TABLE_SIZE,
	XM_SIGNATURE,
	XM_STANDARD_HEADER_SIZE,
	type XMVersion,
} from './xm.types.js';

const COMPONENT = 'xm-header';

export interface XMHeader {
	name: string;
	trackerName: string;
	version: XMVersion;
	headerSize: number;
	songLength: number;
	restartPosition: number;
	channelCount: number;
	patternCount: number;
	instrumentCount: number;
	frequencyTable: FrequencyTable;
	defaultTempo: number;
	defaultBpm: number;
	patternOrder: number[];
}

/**
 * Read the header and leave the cursor on the first pattern.
 * Throws XMFormatError when the signature or marker byte is wrong.
 */
export function decodeHeader(ctx: DecodeContext): XMHeader {
	const { cursor } = ctx;

	const signature = cursor.readBytes(XM_SIGNATURE.length);
	if (!signature || String.fromCharCode(...signature) !== XM_SIGNATURE) {
		throw new XMFormatError('BAD_SIGNATURE', 'Invalid XM file signature (expected "Extended Module: ")');
	}

	const name = cursor.readFixedString(20);

	const marker = cursor.readU8();
	if (marker !== XM_MARKER) {
		const found = marker === undefined ? 'end of file' : `0x${marker.toString(16).padStart(2, '0')}`;
		throw new XMFormatError('BAD_MARKER', `Invalid XM signature byte (expected 0x1a, found ${found})`);
	}

	const trackerName = cursor.readFixedString(20);
	const minor = cursor.readU8() ?? 0;
	const major = cursor.readU8() ?? 0;

	let headerSize = cursor.readU32();
	const headerStart = cursor.position;
	if (headerSize === undefined) {
		report(ctx, COMPONENT, `Header size missing, assuming ${XM_STANDARD_HEADER_SIZE}`);
		headerSize = XM_STANDARD_HEADER_SIZE;
	}

	const songLength = cursor.readU16() ?? 0;
	const restartPosition = cursor.readU16() ?? 0;
	const channelCount = cursor.readU16() ?? 0;
	const patternCount = cursor.readU16() ?? 0;
	const instrumentCount = cursor.readU16() ?? 0;
	const flags = cursor.readU16() ?? 0;
	const defaultTempo = cursor.readU16() ?? XM_DEFAULT_TEMPO;
	const defaultBpm = cursor.readU16() ?? XM_DEFAULT_BPM;

	const patternOrder: number[] = [];
	for (let i = 0; i < XM_ORDER_TABLE_SIZE; i++) {
		patternOrder.push(cursor.readU8() ?? 0);
	}

	cursor.seek(offsetFromSizeField(headerStart, headerSize));

	return {
		name,
		trackerName,
		version: { major, minor },
		headerSize,
		songLength,
		restartPosition,
		channelCount,
		patternCount,
		instrumentCount,
		frequencyTable: (flags & 1) === 1 ? FrequencyTable.LINEAR : FrequencyTable.AMIGA,
		defaultTempo,
		defaultBpm,
		patternOrder,
	};
}

/**
 * Version 1.02 files store the row count as one byte holding `rows - 1`.
 */
export function usesByteRowCount(version: XMVersion): boolean {
	return version.major === 1 && version.minor === 2;
}
