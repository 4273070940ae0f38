/**
 * Rules shared by the timeline reconstructor and the instrument usage pass:
 * song traversal, instrument carry-over, volume resolution, tempo and
 * note delay/cut effects.
 */
import { createLogger } from '../util/logger.js';
import { NOTE_MAX, XM_DEFAULT_BPM, XM_DEFAULT_TEMPO, type XMCell, type XMModule, type XMPattern } from '../import/xm/xm.types.js';
import type { RowTiming } from './types.js';

const log = createLogger('timeline');

export const EFFECT_SET_VOLUME = 0xc;
export const EFFECT_EXTENDED = 0xe;
export const EFFECT_SET_SPEED = 0xf;
export const EXTENDED_NOTE_CUT = 0xc;
export const EXTENDED_NOTE_DELAY = 0xd;

export const MAX_VOLUME = 64;
const VOLUME_COLUMN_MIN = 0x10;
const VOLUME_COLUMN_MAX = 0x50;
const DEFAULT_INSTRUMENT = 1;

export interface SongPosition {
  order: number;
  patternIndex: number;
  pattern: XMPattern;
}

/**
 * Walk the first `songLength` order entries, skipping entries that point at
 * patterns the module does not contain.
 */
export function* songPositions(module: XMModule): Generator<SongPosition> {
  for (let order = 0; order < module.songLength; order++) {
    const patternIndex = module.patternOrder[order] ?? -1;
    const pattern = module.patterns[patternIndex];
    if (!pattern) {
      log.debug(`order ${order}: pattern ${patternIndex} not present, skipped`);
      continue;
    }
    yield { order, patternIndex, pattern };
  }
}

export function isNoteOn(note: number): boolean {
  return note > 0 && note <= NOTE_MAX;
}

/**
 * Instrument carry-over: a non-zero cell instrument becomes the channel's
 * current one; 0 reuses it, or instrument 1 before any was given.
 * `lastInstrument` is indexed by 0-based channel and updated in place.
 */
export function resolveInstrument(lastInstrument: number[], channel: number, cellInstrument: number): number {
  if (cellInstrument !== 0) {
    lastInstrument[channel] = cellInstrument;
    return cellInstrument;
  }
  return lastInstrument[channel] ?? DEFAULT_INSTRUMENT;
}

/**
 * Volume column 0x10-0x50 maps to 0-64, anything else means full volume.
 * A Cxx effect on the same cell wins.
 */
export function resolveVolume(cell: Readonly<XMCell>): number {
  let volume = MAX_VOLUME;
  if (cell.volume >= VOLUME_COLUMN_MIN && cell.volume <= VOLUME_COLUMN_MAX) {
    volume = cell.volume - VOLUME_COLUMN_MIN;
  }
  if (cell.effectType === EFFECT_SET_VOLUME) {
    volume = Math.min(MAX_VOLUME, cell.effectParam);
  }
  return volume;
}

/**
 * Live speed settings plus the running song clock.
 */
export interface TimingState {
  tempo: number;
  bpm: number;
  time: number;
}

export function initialTiming(module: XMModule): TimingState {
  return {
    tempo: module.defaultTempo > 0 ? module.defaultTempo : XM_DEFAULT_TEMPO,
    bpm: module.defaultBpm > 0 ? module.defaultBpm : XM_DEFAULT_BPM,
    time: 0,
  };
}

export function rowDuration(tempo: number, bpm: number): number {
  return (2.5 / bpm) * tempo;
}

/**
 * Apply every Fxx on the row. Below 0x20 sets ticks per row, otherwise BPM;
 * F00 is ignored.
 */
export function applySpeedEffects(pattern: XMPattern, row: number, state: TimingState): void {
  const base = row * pattern.channels;
  for (let ch = 0; ch < pattern.channels; ch++) {
    const cell = pattern.cells[base + ch];
    if (!cell || cell.effectType !== EFFECT_SET_SPEED || cell.effectParam === 0) continue;
    if (cell.effectParam < 0x20) {
      state.tempo = cell.effectParam;
    } else {
      state.bpm = cell.effectParam;
    }
  }
}

/**
 * Time every row of a pattern, advancing `state.time` to the pattern's end.
 */
export function buildRowTimings(pattern: XMPattern, state: TimingState): RowTiming[] {
  const timings: RowTiming[] = [];
  for (let row = 0; row < pattern.rows; row++) {
    applySpeedEffects(pattern, row, state);
    const duration = rowDuration(state.tempo, state.bpm);
    timings.push({
      start: state.time,
      duration,
      tickDuration: duration / state.tempo,
      tempo: state.tempo,
      bpm: state.bpm,
    });
    state.time += duration;
  }
  return timings;
}

export interface TickOffsets {
  /** Seconds the note-on is deferred by (EDx). */
  delay: number;
  /** Seconds after the delayed start at which the note stops (ECx). */
  cut?: number;
}

export function tickOffsets(cell: Readonly<XMCell>, tickDuration: number): TickOffsets {
  if (cell.effectType !== EFFECT_EXTENDED) {
    return { delay: 0 };
  }
  const command = cell.effectParam >> 4;
  const ticks = cell.effectParam & 0x0f;
  if (command === EXTENDED_NOTE_DELAY) {
    return { delay: ticks * tickDuration };
  }
  if (command === EXTENDED_NOTE_CUT) {
    return { delay: 0, cut: ticks * tickDuration };
  }
  return { delay: 0 };
}
