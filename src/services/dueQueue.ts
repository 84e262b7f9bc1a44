interface Entry {
  id: string;
  dueAt: number;
}

/**
 * Min-heap of request ids keyed by the next time they need attention.
 * Rescheduling an id leaves its old entry in the heap; entries whose time no
 * longer matches the id's current due time are dropped when they surface.
 */
export class DueQueue {
  private heap: Entry[] = [];
  private readonly due = new Map<string, number>();

  get size(): number {
    return this.due.size;
  }

  schedule(id: string, dueAt: number): void {
    if (this.due.get(id) === dueAt) return;
    this.due.set(id, dueAt);
    this.heap.push({ id, dueAt });
    this.siftUp(this.heap.length - 1);
  }

  remove(id: string): void {
    this.due.delete(id);
  }

  /** Removes and returns every id due at or before `now`, earliest first. */
  takeDue(now: number): string[] {
    const ready: string[] = [];
    while (this.heap.length > 0 && this.heap[0].dueAt <= now) {
      const top = this.pop();
      if (this.due.get(top.id) !== top.dueAt) continue;
      this.due.delete(top.id);
      ready.push(top.id);
    }
    return ready;
  }

  private pop(): Entry {
    const top = this.heap[0];
    const last = this.heap.pop();
    if (last && this.heap.length > 0) {
      this.heap[0] = last;
      this.siftDown(0);
    }
    return top;
  }

  private siftUp(i: number): void {
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (this.heap[parent].dueAt <= this.heap[i].dueAt) break;
      [this.heap[parent], this.heap[i]] = [this.heap[i], this.heap[parent]];
      i = parent;
    }
  }

  private siftDown(i: number): void {
    const n = this.heap.length;
    while (true) {
      const left = 2 * i + 1;
      const right = left + 1;
      let smallest = i;
      if (left < n && this.heap[left].dueAt < this.heap[smallest].dueAt) smallest = left;
      if (right < n && this.heap[right].dueAt < this.heap[smallest].dueAt) smallest = right;
      if (smallest === i) return;
      [this.heap[smallest], this.heap[i]] = [this.heap[i], this.heap[smallest]];
      i = smallest;
    }
  }
}
