/**
 * Instrument headers and their sample headers. Sample audio is skipped.
 */

import { offsetFromSizeField } from './byteCursor.js';
import { report, type DecodeContext } from './decodeContext.js';
import type { XMInstrument, XMSampleHeader } from './xm.types.js';

const COMPONENT = 'xm-instrument';

// keymap (96) + volume envelope (48) + panning envelope (48) + envelope
// counts/sustain/loop points/types (14) + vibrato (4) + fadeout (2) + reserved (2)
const INSTRUMENT_EXTRA_SIZE = 96 + 48 + 48 + 14 + 4 + 2 + 2;

const SAMPLE_16BIT = 0x10;

function emptyInstrument(): XMInstrument {
	return Object.freeze({ name: '', type: 0, samples: Object.freeze([]) });
}

/**
 * 40-byte sample header: length, loop start, loop length, volume, finetune,
 * type, panning, relative note, reserved, name (22).
 */
function decodeSampleHeader(ctx: DecodeContext): XMSampleHeader {
	const { cursor } = ctx;
	const length = cursor.readU32() ?? 0;
	cursor.skip(4 + 4 + 1 + 1); // loop start, loop length, volume, finetune
	const type = cursor.readU8() ?? 0;
	cursor.skip(1 + 1 + 1); // panning, relative note, reserved
	const name = cursor.readFixedString(22);

	const sixteenBit = (type & SAMPLE_16BIT) !== 0;
	return Object.freeze({
		name,
		length,
		sixteenBit,
		byteLength: sixteenBit ? length * 2 : length,
	});
}

/**
 * Decode one instrument and leave the cursor after its sample data.
 */
export function decodeInstrument(ctx: DecodeContext, index: number): XMInstrument {
	const { cursor } = ctx;
	const start = cursor.position;

	const headerSize = cursor.readU32();
	if (headerSize === undefined) {
		report(ctx, COMPONENT, `Instrument ${index} header missing, using an empty instrument`, start);
		return emptyInstrument();
	}
	const headerStart = cursor.position;

	const name = cursor.readFixedString(22);
	const type = cursor.readU8() ?? 0;
	const sampleCount = cursor.readU16() ?? 0;

	if (sampleCount > 0) {
		cursor.readU32(); // sample header size, always 40
		cursor.skip(INSTRUMENT_EXTRA_SIZE);
	}

	// trust the declared size over what was consumed, extended headers exist
	cursor.seek(offsetFromSizeField(headerStart, headerSize));

	const samples: XMSampleHeader[] = [];
	for (let s = 0; s < sampleCount; s++) {
		samples.push(decodeSampleHeader(ctx));
	}

	const sampleBytes = samples.reduce((sum, sample) => sum + sample.byteLength, 0);
	if (sampleBytes > cursor.remaining) {
		report(ctx, COMPONENT, `Instrument ${index} sample data truncated (${cursor.remaining} of ${sampleBytes} bytes)`);
	}
	cursor.skip(sampleBytes);

	return Object.freeze({ name, type, samples: Object.freeze(samples) });
}
