// src/core/eval/profile.ts
// Per-interpreter word counts and labelled timestamps

import { VArray, VFloat, VInt, VRecord, VStr, type RecordVal } from "./values";

export type WordCount = { word: string; count: number };
export type Timestamp = { label: string; timeMs: number };

export class Profiler {
  private active = false;
  private counts = new Map<string, number>();
  private stamps: Timestamp[] = [];

  constructor(private readonly clock: () => number = () => Date.now()) {}

  /** Clear previous data and open the window. */
  start(): void {
    this.active = true;
    this.counts = new Map();
    this.stamps = [];
  }

  stop(): void {
    this.active = false;
  }

  count(name: string): void {
    if (!this.active) return;
    this.counts.set(name, (this.counts.get(name) ?? 0) + 1);
  }

  timestamp(label: string): void {
    this.stamps.push({ label, timeMs: this.clock() });
  }

  /** Counts, highest first; ties keep first-seen order. */
  histogram(): WordCount[] {
    return Array.from(this.counts, ([word, count]) => ({ word, count })).sort((a, b) => b.count - a.count);
  }

  /**
   * `{word_counts: [{word, count}], timestamps: [{label, time_ms, delta}]}`;
   * delta is the gap to the previous timestamp (0 for the first).
   */
  toRecord(): RecordVal {
    const wordCounts = this.histogram().map(({ word, count }) =>
      VRecord([
        ["word", VStr(word)],
        ["count", VInt(count)],
      ])
    );
    const timestamps = this.stamps.map((stamp, i) =>
      VRecord([
        ["label", VStr(stamp.label)],
        ["time_ms", VFloat(stamp.timeMs)],
        ["delta", VFloat(i === 0 ? 0 : stamp.timeMs - this.stamps[i - 1].timeMs)],
      ])
    );
    return VRecord([
      ["word_counts", VArray(wordCounts)],
      ["timestamps", VArray(timestamps)],
    ]);
  }
}
