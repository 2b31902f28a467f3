/**
 * Keeps at most `capacity` items, always the largest seen so far under `compare`.
 * The smallest kept item sits at the root and is the one evicted.
 */
export class BoundedMinHeap<T> {
  private heap: T[] = [];

  constructor(private capacity: number, private compare: (a: T, b: T) => number) {}

  /** Returns false when the heap is full and `item` does not beat the minimum. */
  push(item: T): boolean {
    if (this.capacity <= 0) return false;
    if (this.heap.length < this.capacity) {
      this.heap.push(item);
      this.siftUp(this.heap.length - 1);
      return true;
    }
    if (this.compare(item, this.heap[0]) <= 0) return false;
    this.heap[0] = item;
    this.siftDown(0);
    return true;
  }

  peek(): T | undefined {
    return this.heap[0];
  }

  /** Heap order, not sorted. */
  toArray(): T[] {
    return this.heap.slice();
  }

  length(): number {
    return this.heap.length;
  }

  private siftUp(index: number): void {
    let child = index;
    while (child > 0) {
      const parent = (child - 1) >> 1;
      if (this.compare(this.heap[child], this.heap[parent]) >= 0) break;
      this.swap(child, parent);
      child = parent;
    }
  }

  private siftDown(index: number): void {
    const size = this.heap.length;
    let parent = index;
    for (;;) {
      const left = 2 * parent + 1;
      const right = left + 1;
      let smallest = parent;
      if (left < size && this.compare(this.heap[left], this.heap[smallest]) < 0) smallest = left;
      if (right < size && this.compare(this.heap[right], this.heap[smallest]) < 0) smallest = right;
      if (smallest === parent) return;
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
