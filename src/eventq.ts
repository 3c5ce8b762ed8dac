// Copyright 2018-2024 the Deno authors. All rights reserved. MIT license.

// Modified version of @std/data-structures@^0.221.0
// Trimmed to the operations used for merging event streams

/** Compares its two arguments for ascending order using JavaScript's built in comparison operators. */
export function ascend<T>(a: T, b: T): -1 | 0 | 1 {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Returns the parent index for a child index. */
function getParentIndex(index: number) {
  return Math.floor((index + 1) / 2) - 1;
}

export class BinaryHeap<T> implements Iterable<T> {
  #data: T[] = [];

  constructor(private compare: (a: T, b: T) => number = ascend) {}

  /** The amount of values stored in the binary heap. */
  get length(): number {
    return this.#data.length;
  }

  /** Removes the first value from the binary heap and returns it, or undefined if it is empty. */
  pop(): T | undefined {
    const size: number = this.#data.length - 1;
    if (size < 0) return undefined;
    this.#swap(0, size);
    let parent = 0;
    let right: number = 2 * (parent + 1);
    let left: number = right - 1;
    while (left < size) {
      const smallestChild = right === size ||
          this.compare(this.#data[left], this.#data[right]) <= 0
        ? left
        : right;
      if (this.compare(this.#data[smallestChild], this.#data[parent]) < 0) {
        this.#swap(parent, smallestChild);
        parent = smallestChild;
      } else {
        break;
      }
      right = 2 * (parent + 1);
      left = right - 1;
    }
    return this.#data.pop();
  }

  /** Adds values to the binary heap. */
  push(...values: T[]): number {
    for (const value of values) {
      let index: number = this.#data.length;
      let parent: number = getParentIndex(index);
      this.#data.push(value);
      while (
        index !== 0 && this.compare(this.#data[index], this.#data[parent]) < 0
      ) {
        this.#swap(parent, index);
        index = parent;
        parent = getParentIndex(index);
      }
    }
    return this.#data.length;
  }

  /** Checks if the binary heap is empty. */
  isEmpty(): boolean {
    return this.#data.length === 0;
  }

  /** Returns an iterator for retrieving and removing values from the binary heap. */
  *drain(): IterableIterator<T> {
    let value = this.pop();
    while (value !== undefined) {
      yield value;
      value = this.pop();
    }
  }

  *[Symbol.iterator](): IterableIterator<T> {
    yield* this.drain();
  }

  #swap(a: number, b: number) {
    const a_value = this.#data[a];
    this.#data[a] = this.#data[b];
    this.#data[b] = a_value;
  }
}
