/**
 * RingBuffer - fixed-capacity, index-addressable double-ended queue.
 * Self-contained (no imports). Storage is allocated once; every operation but
 * clear() is O(1), and clear() releases the held entries without reallocating.
 */

export interface RingBuffer<T> {
  /** Append to the back. Throws when full. */
  push(value: T): void;

  /** Insert at the front. Throws when full. */
  unshift(value: T): void;

  /** Remove from the front. Throws when empty. */
  shift(): T;

  /** Remove from the back. Throws when empty. */
  pop(): T;

  /** Peek the front. Throws when empty. */
  first(): T;

  /** Peek the back. Throws when empty. */
  last(): T;

  /** Read by logical offset from the front. */
  at(offset: number): T;

  /** Overwrite by logical offset from the front. */
  set(offset: number, value: T): void;

  /** Remove the front entry if the buffer is non-empty and `test` accepts it. */
  popFirstIf(test: (value: T) => boolean): T | undefined;

  /** Remove the back entry if the buffer is non-empty and `test` accepts it. */
  popLastIf(test: (value: T) => boolean): T | undefined;

  clear(): void;

  fillDebugState(state: Partial<RingBufferDebugState>): void;

  readonly length: number;
  readonly capacity: number;

  /**
   * Absolute position of the front entry: entries shifted since the last
   * clear(), minus entries unshifted. `startIndex + offset` stays stable for an
   * entry while other entries leave the front.
   */
  readonly startIndex: number;
}

export interface RingBufferDebugState {
  length: number;
  capacity: number;
  startIndex: number;
  head: number;
}

export function createRingBuffer<T>(capacity: number, fill: T): RingBuffer<T> {
  if (!Number.isInteger(capacity) || capacity <= 0)
    throw new Error('RingBuffer: capacity must be a positive integer, got ' + capacity);

  const storage: T[] = new Array<T>(capacity).fill(fill);
  let head = 0;      // physical slot of the front entry
  let count = 0;
  let start = 0;     // absolute position of the front entry

  function slot(offset: number): number {
    return (head + offset) % capacity;
  }

  function push(value: T): void {
    if (count === capacity)
      throw new Error('RingBuffer: buffer is full (capacity ' + capacity + ')');
    storage[slot(count)] = value;
    count++;
  }

  function unshift(value: T): void {
    if (count === capacity)
      throw new Error('RingBuffer: buffer is full (capacity ' + capacity + ')');
    head = (head + capacity - 1) % capacity;
    storage[head] = value;
    count++;
    start--;
  }

  function shift(): T {
    if (count === 0)
      throw new Error('RingBuffer: buffer is empty');
    const value = storage[head];
    // drop the reference so shifted entries can be collected
    storage[head] = fill;
    head = (head + 1) % capacity;
    count--;
    start++;
    return value;
  }

  function pop(): T {
    if (count === 0)
      throw new Error('RingBuffer: buffer is empty');
    const index = slot(count - 1);
    const value = storage[index];
    storage[index] = fill;
    count--;
    return value;
  }

  function first(): T {
    if (count === 0)
      throw new Error('RingBuffer: buffer is empty');
    return storage[head];
  }

  function last(): T {
    if (count === 0)
      throw new Error('RingBuffer: buffer is empty');
    return storage[slot(count - 1)];
  }

  function checkOffset(offset: number): void {
    if (!Number.isInteger(offset) || offset < 0 || offset >= count)
      throw new Error('RingBuffer: offset out of range: ' + offset + ' (length ' + count + ')');
  }

  function at(offset: number): T {
    checkOffset(offset);
    return storage[slot(offset)];
  }

  function set(offset: number, value: T): void {
    checkOffset(offset);
    storage[slot(offset)] = value;
  }

  function popFirstIf(test: (value: T) => boolean): T | undefined {
    if (count === 0 || !test(storage[head])) return undefined;
    return shift();
  }

  function popLastIf(test: (value: T) => boolean): T | undefined {
    if (count === 0 || !test(storage[slot(count - 1)])) return undefined;
    return pop();
  }

  function clear(): void {
    // Release held entries as shift() does; storage itself is kept
    for (let i = 0; i < count; i++) storage[slot(i)] = fill;
    head = 0;
    count = 0;
    start = 0;
  }

  function fillDebugState(state: Partial<RingBufferDebugState>): void {
    state.length = count;
    state.capacity = capacity;
    state.startIndex = start;
    state.head = head;
  }

  return {
    push,
    unshift,
    shift,
    pop,
    first,
    last,
    at,
    set,
    popFirstIf,
    popLastIf,
    clear,
    fillDebugState,
    get length() { return count; },
    get capacity() { return capacity; },
    get startIndex() { return start; },
  };
}
