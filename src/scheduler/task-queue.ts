/* src/scheduler/task-queue.ts */

/**
 * Ready queue ordered by priority tier, then scheduled time, then creation
 * time, then arrival. Within a tier, scheduled tasks come before unscheduled
 * ones. Binary heap with an id index so reprioritizing or removing a task is
 * O(log n) without rebuilding.
 */

import { PRIORITY_RANK } from "../constants";
import type { TransferPriority } from "../core/types";

export interface QueueEntry {
  id: string;
  priority: TransferPriority;
  /** not-before time; null when unscheduled */
  scheduledAt: number | null;
  createdAt: number;
}

interface HeapNode extends QueueEntry {
  sequence: number;
}

function before(a: HeapNode, b: HeapNode): boolean {
  const tier = PRIORITY_RANK[a.priority] - PRIORITY_RANK[b.priority];
  if (tier !== 0) return tier < 0;
  if (a.scheduledAt !== null && b.scheduledAt !== null) {
    if (a.scheduledAt !== b.scheduledAt) return a.scheduledAt < b.scheduledAt;
  } else if (a.scheduledAt !== null || b.scheduledAt !== null) {
    return a.scheduledAt !== null;
  } else if (a.createdAt !== b.createdAt) {
    return a.createdAt < b.createdAt;
  }
  return a.sequence < b.sequence;
}

export class TaskQueue {
  private heap: HeapNode[] = [];
  private index = new Map<string, number>();
  private nextSequence = 0;

  get size(): number {
    return this.heap.length;
  }

  has(id: string): boolean {
    return this.index.has(id);
  }

  /**
   * Insert, or re-key an existing entry while keeping its arrival order
   */
  push(entry: QueueEntry): void {
    const position = this.index.get(entry.id);
    if (position !== undefined) {
      this.update(entry.id, entry);
      return;
    }

    this.heap.push({ ...entry, sequence: this.nextSequence++ });
    this.index.set(entry.id, this.heap.length - 1);
    this.siftUp(this.heap.length - 1);
  }

  update(id: string, changes: Partial<Omit<QueueEntry, "id">>): boolean {
    const position = this.index.get(id);
    if (position === undefined) return false;

    const node = this.heap[position];
    this.heap[position] = { ...node, ...changes, id };
    this.restore(position);
    return true;
  }

  remove(id: string): boolean {
    const position = this.index.get(id);
    if (position === undefined) return false;

    const last = this.heap.length - 1;
    this.swap(position, last);
    this.heap.pop();
    this.index.delete(id);
    if (position < this.heap.length) this.restore(position);
    return true;
  }

  peek(): QueueEntry | undefined {
    const head = this.heap[0];
    return head ? toEntry(head) : undefined;
  }

  pop(): QueueEntry | undefined {
    const head = this.heap[0];
    if (!head) return undefined;
    this.remove(head.id);
    return toEntry(head);
  }

  /**
   * Entries in dequeue order; the heap is not modified
   */
  toSortedArray(): QueueEntry[] {
    return [...this.heap].sort((a, b) => (before(a, b) ? -1 : before(b, a) ? 1 : 0)).map(toEntry);
  }

  clear(): void {
    this.heap = [];
    this.index.clear();
  }

  // ============================================================================
  // HEAP MAINTENANCE
  // ============================================================================

  private restore(position: number): void {
    if (position > 0 && before(this.heap[position], this.heap[(position - 1) >> 1])) {
      this.siftUp(position);
    } else {
      this.siftDown(position);
    }
  }

  private siftUp(position: number): void {
    let current = position;
    while (current > 0) {
      const parent = (current - 1) >> 1;
      if (!before(this.heap[current], this.heap[parent])) break;
      this.swap(current, parent);
      current = parent;
    }
  }

  private siftDown(position: number): void {
    let current = position;
    const length = this.heap.length;
    for (;;) {
      const left = current * 2 + 1;
      const right = left + 1;
      let best = current;
      if (left < length && before(this.heap[left], this.heap[best])) best = left;
      if (right < length && before(this.heap[right], this.heap[best])) best = right;
      if (best === current) return;
      this.swap(current, best);
      current = best;
    }
  }

  private swap(i: number, j: number): void {
    if (i === j) return;
    const a = this.heap[i];
    const b = this.heap[j];
    this.heap[i] = b;
    this.heap[j] = a;
    this.index.set(b.id, i);
    this.index.set(a.id, j);
  }
}

function toEntry(node: HeapNode): QueueEntry {
  return { id: node.id, priority: node.priority, scheduledAt: node.scheduledAt, createdAt: node.createdAt };
}
