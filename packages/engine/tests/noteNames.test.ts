import { describe, expect, test } from '@jest/globals';
import { xmNoteToMidi, xmNoteToName, xmNoteToSemitones } from '../src/song/noteNames';

describe('note names', () => {
  test('names pitches tracker style', () => {
    expect(xmNoteToName(1)).toBe('C-0');
    expect(xmNoteToName(49)).toBe('C-4');
    expect(xmNoteToName(62)).toBe('C#5');
    expect(xmNoteToName(96)).toBe('B-7');
  });

  test('empty and note-off have their own markers', () => {
    expect(xmNoteToName(0)).toBe('---');
    expect(xmNoteToName(97)).toBe('===');
  });

  test('semitones are relative to C-4', () => {
    expect(xmNoteToSemitones(49)).toBe(0);
    expect(xmNoteToSemitones(37)).toBe(-12);
    expect(xmNoteToSemitones(56)).toBe(7);
    expect(xmNoteToSemitones(0)).toBeUndefined();
    expect(xmNoteToSemitones(97)).toBeUndefined();
  });

  test('MIDI numbers put C-4 on 60', () => {
    expect(xmNoteToMidi(49)).toBe(60);
    expect(xmNoteToMidi(1)).toBe(12);
    expect(xmNoteToMidi(97)).toBeUndefined();
  });
});
