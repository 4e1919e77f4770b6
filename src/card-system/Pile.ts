/**
 * Draw pile for the SpireSmiths engine.
 *
 * A Pile is a stack whose top is the last element. Players draw from the
 * top; mulligans shuffle cards back in.
 */

import { shuffle, type Rng } from '../core-engine/Rng';

export class Pile<T> {
  private readonly items: T[];

  constructor(items: readonly T[] = []) {
    this.items = [...items];
  }

  /** Put items on top, the last one ending up topmost. */
  push(...newItems: T[]): void {
    this.items.push(...newItems);
  }

  /** Take the top item, or `undefined` when the pile has run out. */
  pop(): T | undefined {
    return this.items.pop();
  }

  /** Add items anywhere in the pile by reshuffling the whole of it. */
  shuffleIn(newItems: readonly T[], rng: Rng): void {
    this.items.push(...newItems);
    shuffle(this.items, rng);
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  size(): number {
    return this.items.length;
  }

  /** Copy of the contents, bottom to top. */
  toArray(): T[] {
    return [...this.items];
  }

  clear(): void {
    this.items.length = 0;
  }
}
