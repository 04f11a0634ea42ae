// src/core/eval/options.ts
// Keyword options built by `~>` from a flat [.key value ...] array

import { OptionsError } from "../errors";
import { formatValue, VRecord, type Val } from "./values";

export class WordOptions {
  private readonly entries: Map<string, Val>;

  constructor(entries: Iterable<[string, Val]> = []) {
    this.entries = new Map(entries);
  }

  /**
   * Build from alternating key/value items. Keys must be strings (dot
   * symbols push strings).
   */
  static fromFlatArray(items: Val[]): WordOptions {
    if (items.length % 2 !== 0) {
      throw new OptionsError(`Options must be key-value pairs (got ${items.length} items)`);
    }
    const entries: [string, Val][] = [];
    for (let i = 0; i < items.length; i += 2) {
      const key = items[i];
      if (key.tag !== "Str") {
        throw new OptionsError(`Option key must be a string (got ${key.tag} at index ${i})`);
      }
      entries.push([key.s, items[i + 1]]);
    }
    return new WordOptions(entries);
  }

  get(key: string): Val | undefined;
  get(key: string, fallback: Val): Val;
  get(key: string, fallback?: Val): Val | undefined {
    return this.entries.get(key) ?? fallback;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  keys(): string[] {
    return Array.from(this.entries.keys());
  }

  get size(): number {
    return this.entries.size;
  }

  toRecord(): Val {
    return VRecord(this.entries);
  }

  toString(): string {
    return Array.from(this.entries, ([k, v]) => `.${k} ${formatValue(v)}`).join(" ");
  }
}
