import { PRIORITY_RANK, type Priority } from "../coaching/types.js";
import { retryPenalty } from "../utils/backoff.js";

export interface QueueEntry {
  readonly promptId: string;
  readonly priority: Priority;
  readonly retryCount: number;
}

interface HeapNode {
  readonly entry: QueueEntry;
  readonly score: number;
  readonly seq: number;
}

/** Effective rank: lower dequeues first. Retries sink behind fresh work. */
export function effectiveRank(entry: QueueEntry): number {
  return PRIORITY_RANK[entry.priority] + retryPenalty(entry.retryCount);
}

/**
 * Bounded min-heap keyed by (effective rank, enqueue sequence). Equal ranks
 * leave in insertion order. A prompt id is held at most once.
 */
export class DeliveryQueue {
  private readonly heap: HeapNode[] = [];
  private readonly ids = new Set<string>();
  private seq = 0;

  constructor(private readonly capacity: number) {}

  get size(): number {
    return this.heap.length;
  }

  has(promptId: string): boolean {
    return this.ids.has(promptId);
  }

  /** Returns false when full or already queued. */
  push(entry: QueueEntry): boolean {
    if (this.ids.has(entry.promptId)) return false;
    if (this.heap.length >= this.capacity) return false;

    this.heap.push({ entry, score: effectiveRank(entry), seq: this.seq++ });
    this.ids.add(entry.promptId);
    this.siftUp(this.heap.length - 1);
    return true;
  }

  pop(): QueueEntry | undefined {
    const top = this.heap[0];
    if (!top) return undefined;
    const last = this.heap.pop();
    if (last && this.heap.length > 0) {
      this.heap[0] = last;
      this.siftDown(0);
    }
    this.ids.delete(top.entry.promptId);
    return top.entry;
  }

  clear(): void {
    this.heap.length = 0;
    this.ids.clear();
  }

  private less(a: HeapNode, b: HeapNode): boolean {
    return a.score !== b.score ? a.score < b.score : a.seq < b.seq;
  }

  private siftUp(i: number): void {
    const heap = this.heap;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (!this.less(heap[i], heap[parent])) break;
      [heap[i], heap[parent]] = [heap[parent], heap[i]];
      i = parent;
    }
  }

  private siftDown(i: number): void {
    const heap = this.heap;
    const n = heap.length;
    for (;;) {
      const left = 2 * i + 1;
      const right = left + 1;
      let smallest = i;
      if (left < n && this.less(heap[left], heap[smallest])) smallest = left;
      if (right < n && this.less(heap[right], heap[smallest])) smallest = right;
      if (smallest === i) return;
      [heap[i], heap[smallest]] = [heap[smallest], heap[i]];
      i = smallest;
    }
  }
}
