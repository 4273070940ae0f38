export { exportJSON, buildTimelineDocument, type TimelineDocument, type TimelineDocumentEvent } from './jsonExport.js';
export {
  exportMIDI,
  buildMidi,
  secondsToTicks,
  volumeToVelocity,
  vlq,
  TICKS_PER_QUARTER,
  TICKS_PER_SECOND,
} from './midiExport.js';
export type { ExportOptions } from './options.js';
