/*
 * JSON export of a decoded module and its reconstructed note timeline.
 */
import { statSync, writeFileSync } from 'fs';
import { FrequencyTable, type XMModule } from '../import/xm/xm.types.js';
import { xmNoteToName, xmNoteToSemitones } from '../song/noteNames.js';
import { collectInstrumentUsage } from '../timeline/instrumentUsage.js';
import { reconstructTimeline, songDuration } from '../timeline/reconstructor.js';
import type { ChannelInstruments, NoteEvent } from '../timeline/types.js';
import { createLogger } from '../util/logger.js';
import { selectChannels, type ExportOptions } from './options.js';

const log = createLogger('export');

export interface TimelineDocumentEvent extends NoteEvent {
  name: string;
  semitones: number | null;
}

export interface TimelineDocument {
  version: 1;
  module: {
    name: string;
    trackerName: string;
    formatVersion: string;
    channels: number;
    patterns: number;
    instruments: number;
    songLength: number;
    restartPosition: number;
    defaultTempo: number;
    defaultBpm: number;
    frequencyTable: 'amiga' | 'linear';
    duration: number;
  };
  instruments: Array<{ number: number; name: string; samples: string[] }>;
  channels: ChannelInstruments[];
  events: TimelineDocumentEvent[];
  warnings: string[];
}

/**
 * Build the export document without touching the filesystem.
 */
export function buildTimelineDocument(module: XMModule, opts: ExportOptions = {}): TimelineDocument {
  const keep = selectChannels(opts.channels);
  const events = reconstructTimeline(module).filter(ev => keep(ev.channel));
  const usage = collectInstrumentUsage(module).filter(u => keep(u.channel));

  return {
    version: 1,
    module: {
      name: module.name,
      trackerName: module.trackerName.trim(),
      formatVersion: `${module.version.major}.${String(module.version.minor).padStart(2, '0')}`,
      channels: module.channelCount,
      patterns: module.patternCount,
      instruments: module.instrumentCount,
      songLength: module.songLength,
      restartPosition: module.restartPosition,
      defaultTempo: module.defaultTempo,
      defaultBpm: module.defaultBpm,
      frequencyTable: module.frequencyTable === FrequencyTable.LINEAR ? 'linear' : 'amiga',
      duration: songDuration(module),
    },
    instruments: module.instruments.map((inst, i) => ({
      number: i + 1,
      name: inst.name,
      samples: inst.samples.map(s => s.name),
    })),
    channels: usage,
    events: events.map(ev => ({
      ...ev,
      name: xmNoteToName(ev.note),
      semitones: xmNoteToSemitones(ev.note) ?? null,
    })),
    warnings: module.diagnostics.map(d => `@${d.offset}: ${d.message}`),
  };
}

/**
 * Write the timeline document to `outPath` (".json" is appended when missing).
 * Returns the path written.
 */
export function exportJSON(module: XMModule, outPath: string = 'song.json', opts: ExportOptions = {}): string {
  if (!outPath.toLowerCase().endsWith('.json')) outPath = `${outPath}.json`;

  if (opts.verbose) {
    console.log(`Exporting to JSON: ${outPath}`);
  }

  const doc = buildTimelineDocument(module, opts);
  const outObj = { exportedAt: new Date().toISOString(), ...doc };

  if (opts.debug) {
    log.debug(`JSON: version ${outObj.version}, ${doc.events.length} events, ${doc.channels.length} channels`);
  }

  writeFileSync(outPath, JSON.stringify(outObj, null, 2), 'utf8');

  if (opts.verbose) {
    const stats = statSync(outPath);
    const sizeKB = (stats.size / 1024).toFixed(2);
    console.log(`Export complete: ${stats.size.toLocaleString()} bytes (${sizeKB} KB) written`);
  }
  return outPath;
}
