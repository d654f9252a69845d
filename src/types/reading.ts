export interface Reading {
  readonly voltage: number;
  readonly current: number;
  readonly power: number;
  readonly ipAddr: string;
  readonly timestamp: string;
}

export type ChannelKey = 'consumed' | 'generated';

export type ReadingPayload =
  | { readonly consumed: Reading }
  | { readonly generated: Reading };

export type SourceState = 'stopped' | 'running' | 'paused';

export interface IntervalBounds {
  readonly lower: number;
  readonly upper: number;
}

export interface ReadingSink {
  deliver(reading: Reading): void | Promise<void>;
}
