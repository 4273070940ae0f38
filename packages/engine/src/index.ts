/**
 * Trackline engine: XM decoding, note timeline reconstruction and exports.
 *
 * @example
 * ```ts
 * import { readXMFile, reconstructTimeline, xmNoteToName } from '@trackline/engine';
 *
 * const module = readXMFile('song.xm');
 * for (const ev of reconstructTimeline(module)) {
 *   console.log(ev.channel, xmNoteToName(ev.note), ev.start, ev.end);
 * }
 * ```
 */

export * from './import/index.js';
export * from './timeline/index.js';
export * from './export/index.js';
export {
  createLogger,
  configureLogging,
  loadLoggingFromEnv,
  getLoggingConfig,
  resetLogging,
  isLogLevel,
  formatDiagnostic,
  type Logger,
  type LogLevel,
  type LoggerConfig,
} from './util/index.js';
export { xmNoteToName, xmNoteToSemitones, xmNoteToMidi, MIDDLE_C } from './song/noteNames.js';
export {
  planArrangement,
  instrumentColor,
  channelPan,
  channelTrackName,
  instrumentTrackName,
  itemLabel,
  itemNotes,
  type Arrangement,
  type ChannelTrack,
  type InstrumentTrack,
  type PlannedItem,
  type RGB,
} from './arrange/arrangement.js';
