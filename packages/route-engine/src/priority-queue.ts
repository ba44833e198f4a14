type HeapEntry<T> = {
  item: T;
  priority: number;
  sequence: number;
};

/**
 * Binary min-heap. Entries with equal priority come out in insertion order,
 * which keeps Dijkstra's tie-breaking reproducible.
 */
export class MinPriorityQueue<T> {
  private readonly entries: HeapEntry<T>[] = [];
  private pushed = 0;

  get size() {
    return this.entries.length;
  }

  push(item: T, priority: number) {
    this.entries.push({ item, priority, sequence: this.pushed++ });
    this.bubbleUp(this.entries.length - 1);
  }

  pop(): { item: T; priority: number } | undefined {
    const top = this.entries[0];
    const last = this.entries.pop();
    if (!top || !last) {
      return undefined;
    }
    if (this.entries.length > 0) {
      this.entries[0] = last;
      this.sinkDown(0);
    }
    return { item: top.item, priority: top.priority };
  }

  private before(a: HeapEntry<T>, b: HeapEntry<T>) {
    return a.priority < b.priority || (a.priority === b.priority && a.sequence < b.sequence);
  }

  private swap(i: number, j: number) {
    const held = this.entries[i];
    this.entries[i] = this.entries[j];
    this.entries[j] = held;
  }

  private bubbleUp(index: number) {
    let i = index;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (!this.before(this.entries[i], this.entries[parent])) {
        break;
      }
      this.swap(i, parent);
      i = parent;
    }
  }

  private sinkDown(index: number) {
    let i = index;
    const length = this.entries.length;
    for (;;) {
      const left = 2 * i + 1;
      const right = left + 1;
      let smallest = i;
      if (left < length && this.before(this.entries[left], this.entries[smallest])) {
        smallest = left;
      }
      if (right < length && this.before(this.entries[right], this.entries[smallest])) {
        smallest = right;
      }
      if (smallest === i) {
        return;
      }
      this.swap(i, smallest);
      i = smallest;
    }
  }
}
