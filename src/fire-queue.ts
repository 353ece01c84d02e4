/**
 * Fire Queue
 *
 * Indexed binary min-heap of pending fires. Ordered by fire instant, then by
 * insertion sequence, so two events due at the same instant fire in the order
 * they were queued. The id -> slot map makes upsert and remove O(log n).
 */

import type { EventId, Instant } from './types'

// ============================================================================
// Types
// ============================================================================

export type FireEntry = {
  id: EventId
  fireAt: Instant
  /** Record version the fire decision was made at */
  version: number
}

type Slot = FireEntry & { seq: number }

export type FireQueue = {
  /** Insert, or replace the entry already queued for this id. */
  push(entry: FireEntry): void
  peek(): FireEntry | null
  pop(): FireEntry | null
  /** Remove and return every entry with fireAt <= now, earliest first. */
  popDue(now: Instant): FireEntry[]
  remove(id: string): boolean
  has(id: string): boolean
  get(id: string): FireEntry | null
  size(): number
  clear(): void
  /** Snapshot in fire order; does not modify the queue. */
  entries(): FireEntry[]
}

// ============================================================================
// Implementation
// ============================================================================

function toEntry(slot: Slot): FireEntry {
  return { id: slot.id, fireAt: slot.fireAt, version: slot.version }
}

function before(a: Slot, b: Slot): boolean {
  return a.fireAt < b.fireAt || (a.fireAt === b.fireAt && a.seq < b.seq)
}

export function createFireQueue(): FireQueue {
  const heap: Slot[] = []
  const index = new Map<string, number>()
  let nextSeq = 0

  function place(i: number, slot: Slot) {
    heap[i] = slot
    index.set(slot.id, i)
  }

  function siftUp(i: number) {
    const slot = heap[i]
    if (!slot) return
    while (i > 0) {
      const parentIdx = (i - 1) >> 1
      const parent = heap[parentIdx]
      if (!parent || !before(slot, parent)) break
      place(i, parent)
      i = parentIdx
    }
    place(i, slot)
  }

  function siftDown(i: number) {
    const slot = heap[i]
    if (!slot) return
    const n = heap.length
    for (;;) {
      const l = 2 * i + 1
      const r = l + 1
      let smallest = i
      let best = slot
      const left = heap[l]
      if (l < n && left && before(left, best)) { smallest = l; best = left }
      const right = heap[r]
      if (r < n && right && before(right, best)) { smallest = r; best = right }
      if (smallest === i) break
      place(i, best)
      i = smallest
    }
    place(i, slot)
  }

  function removeAt(i: number): Slot | null {
    const target = heap[i]
    if (!target) return null
    index.delete(target.id)
    const last = heap.pop()
    if (last && i < heap.length) {
      place(i, last)
      siftDown(i)
      siftUp(index.get(last.id) ?? i)
    }
    return target
  }

  const queue: FireQueue = {
    push(entry) {
      const existing = index.get(entry.id)
      if (existing !== undefined) removeAt(existing)
      const slot: Slot = { ...entry, seq: nextSeq++ }
      heap.push(slot)
      siftUp(heap.length - 1)
    },

    peek() {
      const top = heap[0]
      return top ? toEntry(top) : null
    },

    pop() {
      const top = removeAt(0)
      return top ? toEntry(top) : null
    },

    popDue(now) {
      const due: FireEntry[] = []
      for (let top = heap[0]; top && top.fireAt <= now; top = heap[0]) {
        removeAt(0)
        due.push(toEntry(top))
      }
      return due
    },

    remove(id) {
      const i = index.get(id)
      if (i === undefined) return false
      removeAt(i)
      return true
    },

    has(id) {
      return index.has(id)
    },

    get(id) {
      const i = index.get(id)
      const slot = i === undefined ? undefined : heap[i]
      return slot ? toEntry(slot) : null
    },

    size() {
      return heap.length
    },

    clear() {
      heap.length = 0
      index.clear()
    },

    entries() {
      return [...heap].sort((a, b) => (before(a, b) ? -1 : 1)).map(toEntry)
    },
  }

  return queue
}
