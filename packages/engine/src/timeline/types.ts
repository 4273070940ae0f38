/**
 * Output types of the timeline passes.
 */

/**
 * A finished note with absolute timing. Always `end > start`.
 */
export interface NoteEvent {
  /** 1-based channel number. */
  channel: number;
  /** Resolved instrument number, never 0. */
  instrument: number;
  /** Raw XM note code (1-96). */
  note: number;
  /** 0-64 */
  volume: number;
  /** Seconds from the start of the song. */
  start: number;
  end: number;
}

/**
 * Timing of one pattern row after its tempo/BPM changes were applied.
 */
export interface RowTiming {
  start: number;
  duration: number;
  /** Seconds per tick on this row (`duration / tempo`). */
  tickDuration: number;
  tempo: number;
  bpm: number;
}

/**
 * Distinct instruments sounded on one channel, ascending.
 */
export interface ChannelInstruments {
  channel: number;
  instruments: number[];
}
