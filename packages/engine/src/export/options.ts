export interface ExportOptions {
  /** 1-based channels to include; all when omitted or empty. */
  channels?: number[];
  debug?: boolean;
  verbose?: boolean;
}

export function selectChannels(channels?: number[]): (channel: number) => boolean {
  if (!channels || channels.length === 0) return () => true;
  const set = new Set(channels);
  return (channel: number) => set.has(channel);
}
