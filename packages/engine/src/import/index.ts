/**
 * Import module exports
 */

export {
	isXM,
	parseXM,
	readXMFile,
	getXMSummary,
	type ParseXMOptions,
} from './xm/xm.reader.js';

export { ByteCursor, offsetFromSizeField } from './xm/byteCursor.js';

export {
	FrequencyTable,
	XMFormatError,
	cellAt,
	EMPTY_CELL,
	NOTE_EMPTY,
	NOTE_OFF,
	NOTE_MAX,
	type XMCell,
	type XMPattern,
	type XMSampleHeader,
	type XMInstrument,
	type XMVersion,
	type XMDiagnostic,
	type XMModule,
	type XMFormatErrorCode,
} from './xm/xm.types.js';
