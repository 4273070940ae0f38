/**
 * Note code helpers for display. XM note 1 is C-0, note 49 is C-4.
 */
import { NOTE_EMPTY, NOTE_MAX, NOTE_OFF } from '../import/xm/xm.types.js';

const NOTE_NAMES = ['C-', 'C#', 'D-', 'D#', 'E-', 'F-', 'F#', 'G-', 'G#', 'A-', 'A#', 'B-'];

/** XM note code of C-4, the zero point for pitch offsets. */
export const MIDDLE_C = 49;

/**
 * Tracker-style note name: "C-4", "F#2", "---" (empty) or "===" (note-off).
 */
export function xmNoteToName(note: number): string {
  if (note === NOTE_EMPTY) return '---';
  if (note === NOTE_OFF) return '===';

  const octave = Math.floor((note - 1) / 12);
  return `${NOTE_NAMES[(note - 1) % 12]}${octave}`;
}

/**
 * Semitones relative to C-4; undefined for empty cells and note-offs.
 */
export function xmNoteToSemitones(note: number): number | undefined {
  if (note === NOTE_EMPTY || note === NOTE_OFF) {
    return undefined;
  }
  return note - MIDDLE_C;
}

/**
 * MIDI note number (C-4 → 60) for real pitches, otherwise undefined.
 */
export function xmNoteToMidi(note: number): number | undefined {
  if (note < 1 || note > NOTE_MAX) return undefined;
  return note + 11;
}
