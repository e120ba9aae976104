import type { MonotonicMs } from "@respkv/clock"
import createRBTree, { type Tree } from "functional-red-black-tree"

export type ExpirationEntry = {
  readonly deadlineMs: MonotonicMs
  readonly key: string
}

export function compareExpirations(a: ExpirationEntry, b: ExpirationEntry): number {
  if (a.deadlineMs !== b.deadlineMs) return a.deadlineMs < b.deadlineMs ? -1 : 1
  if (a.key === b.key) return 0

  return a.key < b.key ? -1 : 1
}

/**
 * Ordered set of `(deadline, key)` pairs, earliest deadline first, ties broken
 * by key.
 *
 * The tree is persistent; every mutation swaps in the new root.
 */
export class ExpirationIndex {
  private tree: Tree<ExpirationEntry, true> = createRBTree<ExpirationEntry, true>(compareExpirations)

  get size(): number {
    return this.tree.length
  }

  /** No-op if the pair is already present. */
  insert(entry: ExpirationEntry): void {
    if (this.tree.get(entry) !== undefined) return

    this.tree = this.tree.insert(entry, true)
  }

  remove(entry: ExpirationEntry): boolean {
    const it = this.tree.find(entry)
    if (!it.valid) return false

    this.tree = it.remove()

    return true
  }

  peek(): ExpirationEntry | undefined {
    return this.tree.begin.key
  }

  /** Remove and return every pair with `deadlineMs <= nowMs`, in order. */
  popDue(nowMs: MonotonicMs): ExpirationEntry[] {
    const due: ExpirationEntry[] = []

    for (let first = this.peek(); first && first.deadlineMs <= nowMs; first = this.peek()) {
      due.push(first)
      this.tree = this.tree.begin.remove()
    }

    return due
  }

  entries(): ExpirationEntry[] {
    return this.tree.keys
  }
}
