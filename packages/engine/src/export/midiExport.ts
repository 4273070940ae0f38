/*
 * MIDI exporter for reconstructed note timelines.
 * - Writes a Type-1 SMF: a conductor track with a fixed 120 BPM tempo, then
 *   one track per XM channel that has events.
 * - At 480 PPQ and 120 BPM one second is exactly 960 ticks, so event times
 *   survive the conversion without a tempo map.
 */
import { writeFileSync } from 'fs';
import type { XMModule } from '../import/xm/xm.types.js';
import { xmNoteToMidi, xmNoteToName } from '../song/noteNames.js';
import { MAX_VOLUME } from '../timeline/channelState.js';
import { reconstructTimeline } from '../timeline/reconstructor.js';
import type { NoteEvent } from '../timeline/types.js';
import { createLogger } from '../util/logger.js';
import { selectChannels, type ExportOptions } from './options.js';

const log = createLogger('export');

export const TICKS_PER_QUARTER = 480;
const MICROSECONDS_PER_QUARTER = 500000; // 120 BPM
export const TICKS_PER_SECOND = TICKS_PER_QUARTER * (1000000 / MICROSECONDS_PER_QUARTER);

/** Variable-length quantity, MSB first. */
export function vlq(n: number): number[] {
  const parts: number[] = [];
  let v = n;
  parts.push(v & 0x7f);
  v >>= 7;
  while (v > 0) {
    parts.push((v & 0x7f) | 0x80);
    v >>= 7;
  }
  return parts.reverse();
}

function writeChunk(id: string, data: number[]): Buffer {
  const header = Buffer.from(id, 'ascii');
  const len = Buffer.alloc(4);
  len.writeUInt32BE(data.length, 0);
  const body = Buffer.from(data);
  return Buffer.concat([header, len, body]);
}

function metaText(type: number, text: string): number[] {
  const bytes = [...Buffer.from(text, 'latin1')];
  return [0xff, type, ...vlq(bytes.length), ...bytes];
}

export function secondsToTicks(seconds: number): number {
  return Math.round(seconds * TICKS_PER_SECOND);
}

export function volumeToVelocity(volume: number): number {
  return Math.max(1, Math.min(127, Math.round((volume / MAX_VOLUME) * 127)));
}

interface MidiMessage {
  tick: number;
  /** note-offs sort before note-ons on the same tick */
  order: 0 | 1;
  bytes: number[];
}

function channelTrack(channel: number, events: NoteEvent[]): number[] {
  const status = (channel - 1) % 16;
  const messages: MidiMessage[] = [];

  for (const ev of events) {
    const key = xmNoteToMidi(ev.note);
    if (key === undefined) continue;
    const on = secondsToTicks(ev.start);
    const off = Math.max(on + 1, secondsToTicks(ev.end));
    messages.push({ tick: on, order: 1, bytes: [0x90 | status, key, volumeToVelocity(ev.volume)] });
    messages.push({ tick: off, order: 0, bytes: [0x80 | status, key, 0] });
  }
  messages.sort((a, b) => a.tick - b.tick || a.order - b.order);

  const data: number[] = [0x00, ...metaText(0x03, `Ch ${String(channel).padStart(2, '0')}`)];
  let lastTick = 0;
  for (const msg of messages) {
    data.push(...vlq(msg.tick - lastTick), ...msg.bytes);
    lastTick = msg.tick;
  }
  data.push(0x00, 0xff, 0x2f, 0x00);
  return data;
}

/**
 * Encode note events as a Type-1 standard MIDI file.
 */
export function buildMidi(events: NoteEvent[], opts: ExportOptions & { title?: string } = {}): Buffer {
  const keep = selectChannels(opts.channels);
  const byChannel = new Map<number, NoteEvent[]>();
  for (const ev of events) {
    if (!keep(ev.channel)) continue;
    const list = byChannel.get(ev.channel) ?? [];
    list.push(ev);
    byChannel.set(ev.channel, list);
  }
  const channels = [...byChannel.keys()].sort((a, b) => a - b);

  const conductor: number[] = [];
  if (opts.title) conductor.push(0x00, ...metaText(0x03, opts.title));
  conductor.push(
    0x00, 0xff, 0x51, 0x03,
    (MICROSECONDS_PER_QUARTER >> 16) & 0xff, (MICROSECONDS_PER_QUARTER >> 8) & 0xff, MICROSECONDS_PER_QUARTER & 0xff,
    0x00, 0xff, 0x2f, 0x00,
  );

  const header = Buffer.alloc(14);
  header.write('MThd', 0, 4, 'ascii');
  header.writeUInt32BE(6, 4);
  header.writeUInt16BE(1, 8); // format 1
  header.writeUInt16BE(channels.length + 1, 10);
  header.writeUInt16BE(TICKS_PER_QUARTER, 12);

  const tracks = [writeChunk('MTrk', conductor)];
  for (const ch of channels) {
    tracks.push(writeChunk('MTrk', channelTrack(ch, byChannel.get(ch) ?? [])));
  }

  if (opts.debug) {
    log.debug(`MIDI: ${channels.length} channel tracks, ${events.length} events`);
  }
  return Buffer.concat([header, ...tracks]);
}

/**
 * Reconstruct the module's timeline and write it as a MIDI file.
 * Returns the path written.
 */
export function exportMIDI(module: XMModule, outPath: string = 'song.mid', opts: ExportOptions = {}): string {
  if (!/\.midi?$/i.test(outPath)) outPath = `${outPath}.mid`;

  const events = reconstructTimeline(module);
  const data = buildMidi(events, { ...opts, title: module.name || undefined });
  writeFileSync(outPath, data);

  if (opts.verbose) {
    const first = events[0];
    console.log(`Exporting to MIDI: ${outPath}`);
    console.log(`  ${events.length} notes${first ? `, first ${xmNoteToName(first.note)} at ${first.start.toFixed(3)}s` : ''}`);
  }
  return outPath;
}
