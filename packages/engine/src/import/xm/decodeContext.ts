import { warn } from '../../util/diag.js';
import type { ByteCursor } from './byteCursor.js';
import type { XMDiagnostic } from './xm.types.js';

/**
 * State shared by the header, pattern and instrument decoders during one parse.
 */
export interface DecodeContext {
	readonly cursor: ByteCursor;
	readonly file?: string;
	readonly diagnostics: XMDiagnostic[];
}

/**
 * Record a non-fatal decode problem and log it.
 */
export function report(ctx: DecodeContext, component: string, message: string, offset: number = ctx.cursor.position): void {
	ctx.diagnostics.push({ level: 'WARN', component, message, offset });
	warn(component, message, { file: ctx.file, offset });
}
