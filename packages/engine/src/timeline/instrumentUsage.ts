/**
 * Which instruments each channel actually sounds, with the same carry-over
 * rule the reconstructor uses.
 */
import { createLogger } from '../util/logger.js';
import { cellAt, type XMModule } from '../import/xm/xm.types.js';
import { isNoteOn, resolveInstrument, songPositions } from './channelState.js';
import type { ChannelInstruments } from './types.js';

const log = createLogger('usage');

export function collectInstrumentUsage(module: XMModule): ChannelInstruments[] {
  const used: Set<number>[] = [];
  for (let ch = 0; ch < module.channelCount; ch++) {
    used.push(new Set<number>());
  }
  const lastInstrument: number[] = [];

  for (const { pattern } of songPositions(module)) {
    const channels = Math.min(pattern.channels, module.channelCount);
    for (let row = 0; row < pattern.rows; row++) {
      for (let ch = 0; ch < channels; ch++) {
        const cell = cellAt(pattern, row, ch);
        if (!isNoteOn(cell.note)) continue;
        used[ch].add(resolveInstrument(lastInstrument, ch, cell.instrument));
      }
    }
  }

  const result = used.map((set, ch) => ({
    channel: ch + 1,
    instruments: [...set].sort((a, b) => a - b),
  }));
  log.debug(result.map(r => `ch${r.channel}=[${r.instruments.join(',')}]`).join(' '));
  return result;
}
