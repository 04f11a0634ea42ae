// src/core/eval/stack.ts
// Operand stack

import type { Val } from "./values";

export class Stack {
  private items: Val[];

  constructor(items: Val[] = []) {
    this.items = items;
  }

  push(v: Val): void {
    this.items.push(v);
  }

  pop(): Val | undefined {
    return this.items.pop();
  }

  peek(): Val | undefined {
    return this.items[this.items.length - 1];
  }

  /**
   * Remove the top `n` items, returned bottom-to-top (deepest first).
   * Returns undefined and leaves the stack alone if there are fewer than `n`.
   */
  popN(n: number): Val[] | undefined {
    if (n > this.items.length) return undefined;
    if (n === 0) return [];
    return this.items.splice(this.items.length - n, n);
  }

  /** Remove and return everything above `depth`. */
  popAbove(depth: number): Val[] {
    return this.items.splice(depth);
  }

  get length(): number {
    return this.items.length;
  }

  /** Snapshot, bottom first. */
  toArray(): Val[] {
    return this.items.slice();
  }

  replace(items: Val[]): void {
    this.items = items.slice();
  }

  clear(): void {
    this.items = [];
  }

  dup(): Stack {
    return new Stack(this.items.slice());
  }
}
