/**
 * Timeline reconstruction: replays the song order row by row and turns the
 * pattern grid into finished note events with absolute times in seconds.
 *
 * Each channel is either idle or sounding exactly one open note. A note-on
 * closes the open note at its own (delayed) start, a note-off closes it at the
 * row start plus delay, and the end of every pattern closes whatever is left.
 * One forward pass, no lookahead beyond the current pattern's row timings.
 */
import { createLogger } from '../util/logger.js';
import { NOTE_OFF, cellAt, type XMModule } from '../import/xm/xm.types.js';
import {
  buildRowTimings,
  initialTiming,
  isNoteOn,
  resolveInstrument,
  resolveVolume,
  songPositions,
  tickOffsets,
} from './channelState.js';
import type { NoteEvent } from './types.js';

const log = createLogger('timeline');

/** Open note; `end` is provisional until the note is closed. */
type OpenNote = NoteEvent;

/**
 * Close an open note at `time` (or earlier, if a cut already shortened it).
 * Returns undefined for notes that would have no duration.
 */
function closeNote(open: OpenNote, time: number): NoteEvent | undefined {
  const end = Math.min(open.end, time);
  if (end <= open.start) {
    return undefined;
  }
  return { ...open, end };
}

/**
 * Yield note events in the order they close.
 */
export function* iterateNoteEvents(module: XMModule): Generator<NoteEvent> {
  const timing = initialTiming(module);
  const lastInstrument: number[] = [];
  let emitted = 0;
  let dropped = 0;

  for (const { order, patternIndex, pattern } of songPositions(module)) {
    const timings = buildRowTimings(pattern, timing);
    const patternEnd = timing.time;
    const active: Array<OpenNote | undefined> = new Array(pattern.channels).fill(undefined);

    log.debug(`order ${order}: pattern ${patternIndex}, ${pattern.rows} rows, ends at ${patternEnd.toFixed(3)}s`);

    for (let row = 0; row < pattern.rows; row++) {
      const rowTiming = timings[row];

      for (let ch = 0; ch < pattern.channels; ch++) {
        const cell = cellAt(pattern, row, ch);
        const { delay, cut } = tickOffsets(cell, rowTiming.tickDuration);
        const open = active[ch];
        const at = rowTiming.start + delay;

        if (isNoteOn(cell.note)) {
          if (open) {
            const done = closeNote(open, at);
            if (done) { emitted++; yield done; } else { dropped++; }
          }
          active[ch] = {
            channel: ch + 1,
            instrument: resolveInstrument(lastInstrument, ch, cell.instrument),
            note: cell.note,
            volume: resolveVolume(cell),
            start: at,
            end: cut === undefined ? patternEnd : at + cut,
          };
        } else if (cell.note === NOTE_OFF) {
          if (open) {
            const done = closeNote(open, at);
            if (done) { emitted++; yield done; } else { dropped++; }
            active[ch] = undefined;
          }
        } else if (cut !== undefined && open) {
          open.end = Math.min(open.end, rowTiming.start + cut);
        }
      }
    }

    for (let ch = 0; ch < pattern.channels; ch++) {
      const open = active[ch];
      if (!open) continue;
      const done = closeNote(open, patternEnd);
      if (done) { emitted++; yield done; } else { dropped++; }
    }
  }

  log.info(`${emitted} note events, ${dropped} zero-length notes dropped, song ends at ${timing.time.toFixed(3)}s`);
}

/**
 * All note events of the song, in closing order.
 */
export function reconstructTimeline(module: XMModule): NoteEvent[] {
  return [...iterateNoteEvents(module)];
}

/**
 * Length of the song in seconds, following every tempo/BPM change.
 */
export function songDuration(module: XMModule): number {
  const timing = initialTiming(module);
  for (const { pattern } of songPositions(module)) {
    buildRowTimings(pattern, timing);
  }
  return timing.time;
}
