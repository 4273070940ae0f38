/**
 * Data model for decoded FastTracker 2 Extended Module (XM) files.
 *
 * Everything here is produced once by the reader and never mutated afterwards.
 */

export const XM_SIGNATURE = 'Extended Module: ';
export const XM_MARKER = 0x1a;

/** Header size written by FastTracker 2 and nearly every other tracker. */
export const XM_STANDARD_HEADER_SIZE = 276;
export const XM_ORDER_TABLE_SIZE = 256;
export const XM_DEFAULT_TEMPO = 6;
export const XM_DEFAULT_BPM = 125;
export const XM_DEFAULT_ROWS = 64;
export const XM_MAX_ROWS = 256;

export const NOTE_EMPTY = 0;
export const NOTE_OFF = 97;
export const NOTE_MAX = 96;

// Frequency table (bit 0 of the header flags)
export enum FrequencyTable {
	AMIGA = 0,
	LINEAR = 1,
}

/**
 * One channel's data on one row.
 */
export interface XMCell {
	note: number; // 0 = empty, 1-96 = pitch, 97 = note-off
	instrument: number; // 0 = keep the channel's previous instrument
	volume: number; // volume column byte, 0 = unset
	effectType: number; // 0-35
	effectParam: number; // 0-255
}

export const EMPTY_CELL: Readonly<XMCell> = Object.freeze({
	note: 0,
	instrument: 0,
	volume: 0,
	effectType: 0,
	effectParam: 0,
});

/**
 * Pattern grid. `cells` is row-major with `rows * channels` entries.
 */
export interface XMPattern {
	readonly rows: number;
	readonly channels: number;
	readonly cells: ReadonlyArray<Readonly<XMCell>>;
}

/**
 * Sample header. The audio payload is skipped, only its size is kept.
 */
export interface XMSampleHeader {
	readonly name: string;
	/** Length in sample frames as stored in the header. */
	readonly length: number;
	readonly sixteenBit: boolean;
	/** Bytes occupied by the sample data in the file. */
	readonly byteLength: number;
}

export interface XMInstrument {
	readonly name: string;
	readonly type: number;
	readonly samples: ReadonlyArray<XMSampleHeader>;
}

export interface XMVersion {
	readonly major: number;
	readonly minor: number;
}

/**
 * Non-fatal problem found while decoding (truncated structure, odd field).
 */
export interface XMDiagnostic {
	readonly level: 'WARN';
	readonly component: string;
	readonly message: string;
	readonly offset: number;
}

/**
 * Complete decoded module.
 */
export interface XMModule {
	readonly name: string;
	readonly trackerName: string;
	readonly version: XMVersion;
	readonly headerSize: number;
	readonly songLength: number;
	readonly restartPosition: number;
	readonly channelCount: number;
	readonly patternCount: number;
	readonly instrumentCount: number;
	readonly frequencyTable: FrequencyTable;
	readonly defaultTempo: number;
	readonly defaultBpm: number;
	/** All 256 entries; only the first `songLength` are played. */
	readonly patternOrder: ReadonlyArray<number>;
	readonly patterns: ReadonlyArray<XMPattern>;
	readonly instruments: ReadonlyArray<XMInstrument>;
	readonly diagnostics: ReadonlyArray<XMDiagnostic>;
}

export type XMFormatErrorCode = 'BAD_SIGNATURE' | 'BAD_MARKER';

/**
 * Thrown when the data is not an XM file at all.
 */
export class XMFormatError extends Error {
	readonly code: XMFormatErrorCode;

	constructor(code: XMFormatErrorCode, message: string) {
		super(message);
		this.name = 'XMFormatError';
		this.code = code;
	}
}

/**
 * Cell at `row`/`channel` (both 0-based). Out-of-range lookups give the empty cell.
 */
export function cellAt(pattern: XMPattern, row: number, channel: number): Readonly<XMCell> {
	if (row < 0 || row >= pattern.rows || channel < 0 || channel >= pattern.channels) {
		return EMPTY_CELL;
	}
	return pattern.cells[row * pattern.channels + channel] ?? EMPTY_CELL;
}
