import { describe, expect, test } from '@jest/globals';
import { parseXM } from '../src/import/xm/xm.reader';
import { iterateNoteEvents, reconstructTimeline, songDuration } from '../src/timeline/reconstructor';
import type { NoteEvent } from '../src/timeline/types';
import { buildXM, type CellLayout, type ModuleLayout } from './helpers/xmBuilder';

// tempo 6, bpm 125: one row lasts 0.12s, one tick 0.02s
const ROW = 0.12;
const TICK = 0.02;

function timeline(layout: ModuleLayout): NoteEvent[] {
  return reconstructTimeline(parseXM(buildXM(layout)));
}

function oneChannel(cells: Omit<CellLayout, 'channel'>[], rows = 4): ModuleLayout {
  return { patterns: [{ rows, cells: cells.map(c => ({ channel: 0, ...c })) }] };
}

function expectTimes(ev: NoteEvent | undefined, start: number, end: number): void {
  expect(ev?.start).toBeCloseTo(start, 9);
  expect(ev?.end).toBeCloseTo(end, 9);
}

describe('timeline reconstruction', () => {
  test('a lone note lasts until the end of its pattern', () => {
    const events = timeline(oneChannel([{ row: 0, note: 49, instrument: 1 }]));
    expect(events.length).toBe(1);
    expect(events[0]).toMatchObject({ channel: 1, instrument: 1, note: 49, volume: 64, start: 0 });
    expect(events[0].end).toBeCloseTo(4 * ROW, 9);
  });

  test('a note-off ends the note at its row', () => {
    const events = timeline(oneChannel([{ row: 0, note: 49, instrument: 1 }, { row: 2, note: 97 }]));
    expect(events.length).toBe(1);
    expectTimes(events[0], 0, 2 * ROW);
  });

  test('a note-off on an idle channel does nothing', () => {
    expect(timeline(oneChannel([{ row: 1, note: 97 }]))).toEqual([]);
  });

  test('a new note closes the previous one', () => {
    const events = timeline(oneChannel([{ row: 0, note: 49, instrument: 1 }, { row: 2, note: 51 }]));
    expect(events.map(e => e.note)).toEqual([49, 51]);
    expectTimes(events[0], 0, 2 * ROW);
    expectTimes(events[1], 2 * ROW, 4 * ROW);
  });

  test('notes never outlive their pattern', () => {
    const events = timeline({
      patterns: [{ rows: 4, cells: [{ row: 0, channel: 0, note: 49, instrument: 1 }] }, { rows: 4 }],
    });
    expect(events.length).toBe(1);
    expectTimes(events[0], 0, 4 * ROW);
  });

  test('channels are numbered from 1', () => {
    const events = timeline({
      channels: 2,
      patterns: [{ rows: 2, cells: [{ row: 0, channel: 0, note: 49, instrument: 1 }, { row: 1, channel: 1, note: 61, instrument: 2 }] }],
    });
    expect(events.map(e => [e.channel, e.instrument])).toEqual([[1, 1], [2, 2]]);
    expectTimes(events[1], ROW, 2 * ROW);
  });

  describe('four-row reference pattern', () => {
    const note = { row: 0, note: 49, instrument: 1, volume: 0x30 };

    test('one note spans the whole pattern', () => {
      const events = timeline(oneChannel([note]));
      expect(events.length).toBe(1);
      expect(events[0]).toMatchObject({ channel: 1, instrument: 1, note: 49, volume: 32, start: 0 });
      expect(events[0].end).toBeCloseTo(0.48, 9);
    });

    test('F04 on row 2 shortens the last two rows', () => {
      const [ev] = timeline(oneChannel([note, { row: 2, effectType: 0xf, effectParam: 0x04 }]));
      expectTimes(ev, 0, 0.4);
    });

    test('a note-off on row 2 leaves the channel idle', () => {
      const events = timeline(oneChannel([note, { row: 2, note: 97 }]));
      expect(events.length).toBe(1);
      expectTimes(events[0], 0, 0.24);
    });
  });

  describe('instrument carry-over', () => {
    test('an empty instrument field reuses the channel instrument', () => {
      const events = timeline(oneChannel([{ row: 0, note: 49, instrument: 3 }, { row: 1, note: 50 }]));
      expect(events.map(e => e.instrument)).toEqual([3, 3]);
    });

    test('defaults to instrument 1 before any is given', () => {
      expect(timeline(oneChannel([{ row: 0, note: 49 }])).map(e => e.instrument)).toEqual([1]);
    });

    test('carries across patterns', () => {
      const events = timeline({
        patterns: [
          { rows: 2, cells: [{ row: 0, channel: 0, note: 49, instrument: 4 }] },
          { rows: 2, cells: [{ row: 0, channel: 0, note: 52 }] },
        ],
      });
      expect(events.map(e => e.instrument)).toEqual([4, 4]);
    });
  });

  describe('volume', () => {
    test.each([
      { fields: { volume: 0x30 }, expected: 32 },
      { fields: { volume: 0x10 }, expected: 0 },
      { fields: { volume: 0x50 }, expected: 64 },
      { fields: { volume: 0x60 }, expected: 64 },
      { fields: { effectType: 0xc, effectParam: 0x20 }, expected: 32 },
      { fields: { effectType: 0xc, effectParam: 0x50 }, expected: 64 },
      { fields: { volume: 0x20, effectType: 0xc, effectParam: 0x10 }, expected: 16 },
    ])('cell $fields gives volume $expected', ({ fields, expected }) => {
      const [ev] = timeline(oneChannel([{ row: 0, note: 49, instrument: 1, ...fields }]));
      expect(ev.volume).toBe(expected);
    });
  });

  describe('speed changes', () => {
    test('Fxx below 0x20 sets ticks per row from its row on', () => {
      const mod = parseXM(buildXM(oneChannel([{ row: 0, note: 49, instrument: 1 }, { row: 1, effectType: 0xf, effectParam: 3 }])));
      const [ev] = reconstructTimeline(mod);
      expectTimes(ev, 0, ROW + 3 * (ROW / 2));
      expect(songDuration(mod)).toBeCloseTo(0.3, 9);
    });

    test('Fxx from 0x20 sets BPM', () => {
      const mod = parseXM(buildXM(oneChannel([{ row: 0, effectType: 0xf, effectParam: 250 }])));
      expect(songDuration(mod)).toBeCloseTo(4 * (ROW / 2), 9);
    });

    test('F00 is ignored', () => {
      const mod = parseXM(buildXM(oneChannel([{ row: 0, effectType: 0xf, effectParam: 0 }])));
      expect(songDuration(mod)).toBeCloseTo(4 * ROW, 9);
    });

    test('speed persists into later patterns', () => {
      const mod = parseXM(buildXM({
        patterns: [{ rows: 4, cells: [{ row: 0, channel: 0, effectType: 0xf, effectParam: 3 }] }, { rows: 4 }],
      }));
      expect(songDuration(mod)).toBeCloseTo(8 * (ROW / 2), 9);
    });

    test('zero header tempo and BPM fall back to 6 and 125', () => {
      const mod = parseXM(buildXM({ tempo: 0, bpm: 0 }));
      expect(songDuration(mod)).toBeCloseTo(4 * ROW, 9);
    });
  });

  describe('note delay and cut', () => {
    test('EDx delays the note-on and the close of the previous note', () => {
      const events = timeline(oneChannel([
        { row: 0, note: 49, instrument: 1 },
        { row: 1, note: 50, effectType: 0xe, effectParam: 0xd3 },
      ]));
      expectTimes(events[0], 0, ROW + 3 * TICK);
      expectTimes(events[1], ROW + 3 * TICK, 4 * ROW);
    });

    test('ECx on the note cell cuts the note after x ticks', () => {
      const events = timeline(oneChannel([{ row: 0, note: 49, instrument: 1, effectType: 0xe, effectParam: 0xc2 }]));
      expect(events.length).toBe(1);
      expectTimes(events[0], 0, 2 * TICK);
    });

    test('ECx on an empty cell cuts the open note', () => {
      const events = timeline(oneChannel([
        { row: 0, note: 49, instrument: 1 },
        { row: 1, effectType: 0xe, effectParam: 0xc1 },
      ]));
      expectTimes(events[0], 0, ROW + TICK);
    });

    test('a cut note stays cut when a later note-off arrives', () => {
      const events = timeline(oneChannel([
        { row: 0, note: 49, instrument: 1, effectType: 0xe, effectParam: 0xc2 },
        { row: 3, note: 97 },
      ]));
      expectTimes(events[0], 0, 2 * TICK);
    });

    test('a later ECx on an empty cell never lengthens a cut note', () => {
      const events = timeline(oneChannel([
        { row: 0, note: 49, instrument: 1, effectType: 0xe, effectParam: 0xc1 },
        { row: 2, effectType: 0xe, effectParam: 0xc3 },
      ]));
      expect(events.length).toBe(1);
      expectTimes(events[0], 0, TICK);
    });

    test('a delay longer than the row is dropped when the next note arrives first', () => {
      const events = timeline(oneChannel([
        { row: 0, note: 49, instrument: 1, effectType: 0xe, effectParam: 0xd7 },
        { row: 1, note: 50 },
      ]));
      expect(events.map(e => e.note)).toEqual([50]);
      expectTimes(events[0], ROW, 4 * ROW);
    });

    test('EC0 on the note row leaves nothing to emit', () => {
      expect(timeline(oneChannel([{ row: 0, note: 49, instrument: 1, effectType: 0xe, effectParam: 0xc0 }]))).toEqual([]);
    });
  });

  test('order entries pointing at missing patterns are skipped without advancing time', () => {
    const mod = parseXM(buildXM({
      order: [0, 5, 0],
      patterns: [{ rows: 4, cells: [{ row: 0, channel: 0, note: 49, instrument: 1 }] }],
    }));
    const events = reconstructTimeline(mod);
    expect(events.length).toBe(2);
    expectTimes(events[0], 0, 4 * ROW);
    expectTimes(events[1], 4 * ROW, 8 * ROW);
    expect(songDuration(mod)).toBeCloseTo(8 * ROW, 9);
  });

  test('only the first songLength order entries are played', () => {
    const mod = parseXM(buildXM({ order: [0, 0, 0], songLength: 1 }));
    expect(songDuration(mod)).toBeCloseTo(4 * ROW, 9);
  });

  test('every event has a positive length and a 1-based channel', () => {
    const mod = parseXM(buildXM({
      channels: 3,
      patterns: [{
        rows: 8,
        cells: [
          { row: 0, channel: 0, note: 49 },
          { row: 0, channel: 1, note: 37, effectType: 0xe, effectParam: 0xc0 },
          { row: 1, channel: 2, note: 60, effectType: 0xe, effectParam: 0xd2 },
          { row: 2, channel: 0, note: 97 },
          { row: 3, channel: 0, note: 97 },
          { row: 5, channel: 1, note: 40, instrument: 2 },
        ],
      }],
    }));
    const events = [...iterateNoteEvents(mod)];
    expect(events.length).toBe(3);
    for (const ev of events) {
      expect(ev.end).toBeGreaterThan(ev.start);
      expect(ev.channel).toBeGreaterThanOrEqual(1);
      expect(ev.channel).toBeLessThanOrEqual(3);
      expect(ev.instrument).toBeGreaterThanOrEqual(1);
    }
    for (let ch = 1; ch <= 3; ch++) {
      const own = events.filter(e => e.channel === ch).sort((a, b) => a.start - b.start);
      for (let i = 1; i < own.length; i++) {
        expect(own[i].start).toBeGreaterThanOrEqual(own[i - 1].end);
      }
    }
  });
});
