export interface Timer<K> {
  key: K;
  timestamp: number;
}

interface HeapEntry<K> extends Timer<K> {
  seq: number;
}

/**
 * Event-time timer schedule backed by a binary min-heap.
 * Timers fire only through advanceTo(), in timestamp order; equal timestamps
 * fire in registration order. Registering the same (key, timestamp) twice is a no-op.
 */
export class TimerService<K extends string | number> {
  private heap: HeapEntry<K>[] = [];
  private registered: Set<string> = new Set();
  private sequence = 0;

  register(key: K, timestamp: number): boolean {
    const id = this.timerId(key, timestamp);
    if (this.registered.has(id)) {
      return false;
    }

    this.registered.add(id);
    this.heap.push({ key, timestamp, seq: this.sequence++ });
    this.siftUp(this.heap.length - 1);
    return true;
  }

  /**
   * Pops every timer due at or before the given time
   */
  advanceTo(timestamp: number): Timer<K>[] {
    const due: Timer<K>[] = [];

    while (this.heap.length > 0 && this.heap[0].timestamp <= timestamp) {
      const entry = this.pop();
      this.registered.delete(this.timerId(entry.key, entry.timestamp));
      due.push({ key: entry.key, timestamp: entry.timestamp });
    }

    return due;
  }

  peek(): Timer<K> | undefined {
    if (this.heap.length === 0) return undefined;
    const { key, timestamp } = this.heap[0];
    return { key, timestamp };
  }

  get size(): number {
    return this.heap.length;
  }

  clear(): void {
    this.heap = [];
    this.registered.clear();
  }

  private timerId(key: K, timestamp: number): string {
    return `${typeof key}:${key}@${timestamp}`;
  }

  private pop(): HeapEntry<K> {
    const top = this.heap[0];
    const last = this.heap.pop();
    if (last !== undefined && this.heap.length > 0) {
      this.heap[0] = last;
      this.siftDown(0);
    }
    return top;
  }

  private before(a: HeapEntry<K>, b: HeapEntry<K>): boolean {
    return a.timestamp < b.timestamp || (a.timestamp === b.timestamp && a.seq < b.seq);
  }

  private siftUp(index: number): void {
    let child = index;
    while (child > 0) {
      const parent = Math.floor((child - 1) / 2);
      if (!this.before(this.heap[child], this.heap[parent])) break;
      this.swap(child, parent);
      child = parent;
    }
  }

  private siftDown(index: number): void {
    let parent = index;
    const length = this.heap.length;

    while (true) {
      const left = parent * 2 + 1;
      const right = left + 1;
      let smallest = parent;

      if (left < length && this.before(this.heap[left], this.heap[smallest])) {
        smallest = left;
      }
      if (right < length && this.before(this.heap[right], this.heap[smallest])) {
        smallest = right;
      }
      if (smallest === parent) break;

      this.swap(parent, smallest);
      parent = smallest;
    }
  }

  private swap(i: number, j: number): void {
    const tmp = this.heap[i];
    this.heap[i] = this.heap[j];
    this.heap[j] = tmp;
  }
}
