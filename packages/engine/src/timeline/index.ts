export { iterateNoteEvents, reconstructTimeline, songDuration } from './reconstructor.js';
export { collectInstrumentUsage } from './instrumentUsage.js';
export {
  buildRowTimings,
  initialTiming,
  resolveInstrument,
  resolveVolume,
  rowDuration,
  tickOffsets,
  type TimingState,
  type TickOffsets,
} from './channelState.js';
export type { NoteEvent, RowTiming, ChannelInstruments } from './types.js';
