/**
 * Host-neutral arrangement plan: which tracks a timeline host should create
 * for a module and which item goes on which track.
 *
 * Every channel gets a track. A channel that sounds several instruments
 * becomes a folder with one child track per instrument; a channel with one
 * (or no) instrument carries its items itself.
 */
import { createLogger } from '../util/logger.js';
import type { XMModule } from '../import/xm/xm.types.js';
import { xmNoteToName, xmNoteToSemitones } from '../song/noteNames.js';
import { collectInstrumentUsage } from '../timeline/instrumentUsage.js';
import { reconstructTimeline } from '../timeline/reconstructor.js';
import { MAX_VOLUME } from '../timeline/channelState.js';
import type { ChannelInstruments, NoteEvent } from '../timeline/types.js';

const log = createLogger('arrange');

export interface RGB {
  r: number;
  g: number;
  b: number;
}

export interface InstrumentTrack {
  id: string;
  instrument: number;
  name: string;
  color: RGB;
}

export interface ChannelTrack {
  id: string;
  channel: number;
  name: string;
  /** -1 (left) .. 1 (right) */
  pan: number;
  /** Empty unless the channel is a folder. */
  children: InstrumentTrack[];
}

export interface PlannedItem {
  trackId: string;
  position: number;
  length: number;
  color: RGB;
  /** Short take label, e.g. "C-4 I01 V32". */
  label: string;
  /** Multi-line description for the item's notes field. */
  notes: string;
  /** Semitones from C-4. */
  pitch: number;
  /** 0..1 */
  gain: number;
  event: NoteEvent;
}

export interface Arrangement {
  tracks: ChannelTrack[];
  items: PlannedItem[];
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * Stable per-instrument colour.
 */
export function instrumentColor(instrument: number): RGB {
  return {
    r: (instrument * 37) % 256,
    g: (instrument * 73) % 256,
    b: (instrument * 113) % 256,
  };
}

/**
 * Classic Amiga LRRL panning for modules with four or more channels.
 */
export function channelPan(channel: number, channelCount: number): number {
  if (channelCount < 4) return 0;
  const slot = (channel - 1) % 4;
  return slot === 0 || slot === 3 ? -0.5 : 0.5;
}

export function channelTrackName(module: XMModule, channel: number): string {
  return `[${module.name.slice(0, 8)}] Ch ${pad2(channel)}`;
}

export function instrumentTrackName(module: XMModule, instrument: number): string {
  const name = module.instruments[instrument - 1]?.name || `Inst ${pad2(instrument)}`;
  return `I${pad2(instrument)}: ${name}`;
}

export function itemLabel(event: NoteEvent): string {
  return `${xmNoteToName(event.note)} I${pad2(event.instrument)} V${pad2(event.volume)}`;
}

export function itemNotes(event: NoteEvent): string {
  const semitones = xmNoteToSemitones(event.note) ?? 0;
  const sign = semitones >= 0 ? '+' : '';
  return [
    `Note: ${xmNoteToName(event.note)}`,
    `Instrument: ${event.instrument}`,
    `Pitch: ${sign}${semitones} st`,
    `Volume: ${event.volume}`,
  ].join('\n');
}

/**
 * Build the plan. Usage and events are computed from the module when not given.
 */
export function planArrangement(
  module: XMModule,
  events: NoteEvent[] = reconstructTimeline(module),
  usage: ChannelInstruments[] = collectInstrumentUsage(module),
): Arrangement {
  const tracks: ChannelTrack[] = [];
  // channel -> instrument -> track id
  const routes = new Map<number, Map<number, string>>();

  for (const { channel, instruments } of usage) {
    const id = `ch${pad2(channel)}`;
    const track: ChannelTrack = {
      id,
      channel,
      name: channelTrackName(module, channel),
      pan: channelPan(channel, module.channelCount),
      children: [],
    };
    const route = new Map<number, string>();

    if (instruments.length <= 1) {
      route.set(instruments[0] ?? 1, id);
    } else {
      for (const instrument of instruments) {
        const child: InstrumentTrack = {
          id: `${id}/i${pad2(instrument)}`,
          instrument,
          name: instrumentTrackName(module, instrument),
          color: instrumentColor(instrument),
        };
        track.children.push(child);
        route.set(instrument, child.id);
      }
    }

    tracks.push(track);
    routes.set(channel, route);
  }

  const items: PlannedItem[] = [];
  for (const event of events) {
    const trackId = routes.get(event.channel)?.get(event.instrument) ?? `ch${pad2(event.channel)}`;
    items.push({
      trackId,
      position: event.start,
      length: event.end - event.start,
      color: instrumentColor(event.instrument),
      label: itemLabel(event),
      notes: itemNotes(event),
      pitch: xmNoteToSemitones(event.note) ?? 0,
      gain: event.volume / MAX_VOLUME,
      event,
    });
  }

  log.debug(`${tracks.length} channel tracks, ${items.length} items`);
  return { tracks, items };
}
