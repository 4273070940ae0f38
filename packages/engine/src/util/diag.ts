import { createLogger } from './logger.js';

const log = createLogger('diagnostics');

export type DiagLevel = 'WARN' | 'ERROR' | 'INFO';

export interface DiagMeta {
  file?: string;
  /** Byte offset in the source file where the problem was noticed. */
  offset?: number;
}

export function formatDiagnostic(level: DiagLevel, component: string, message: string, meta?: DiagMeta): string {
  const lvl = level || 'WARN';
  const comp = component || 'unknown';
  const parts: string[] = [];
  parts.push(`[${lvl}]`);
  parts.push(`[${comp}]`);
  parts.push(message);
  const fields: string[] = [];
  if (meta) {
    if (meta.file) fields.push(`file=${meta.file}`);
    if (typeof meta.offset === 'number') fields.push(`offset=${meta.offset}`);
  }
  if (fields.length) parts.push(fields.join(', '));
  return parts.join(' ');
}

export function warn(component: string, message: string, meta?: DiagMeta): void {
  log.warn(formatDiagnostic('WARN', component, message, meta));
}

export function error(component: string, message: string, meta?: DiagMeta): void {
  log.error(formatDiagnostic('ERROR', component, message, meta));
}

export default { formatDiagnostic, warn, error };
