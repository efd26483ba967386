import type { Comparator } from './types.js'
import type { Indexed } from './tagging.js'

/**
 * Binary min-heap holding at most one pending element per source.
 *
 * Elements are ordered by `compare`, and elements that compare equal by ascending source index,
 * so the root is always the next element to emit and ties leave in source order.
 */
export class FrontierHeap<E extends Indexed> {
  private readonly items: E[]
  private readonly compare: Comparator<E>

  constructor(compare: Comparator<E>, initial: Iterable<E> = []) {
    this.compare = compare
    this.items = Array.from(initial)
    for (let i = (this.items.length >> 1) - 1; i >= 0; i -= 1) {
      this.bubbleDown(i)
    }
  }

  public push(item: E): void {
    this.items.push(item)
    this.bubbleUp(this.items.length - 1)
  }

  public pop(): E | undefined {
    const last = this.items.pop()
    if (last === undefined || this.items.length === 0) return last

    const min = this.items[0]
    this.items[0] = last
    this.bubbleDown(0)
    return min
  }

  public peek(): E | undefined {
    return this.items[0]
  }

  public size(): number {
    return this.items.length
  }

  public isEmpty(): boolean {
    return this.items.length === 0
  }

  private less(i: number, j: number): boolean {
    const a = this.items[i]
    const b = this.items[j]
    if (a === undefined || b === undefined) return false

    const c = this.compare(a, b)
    if (c !== 0) return c < 0
    return a.index < b.index
  }

  private swap(i: number, j: number): void {
    const a = this.items[i]
    const b = this.items[j]
    if (a === undefined || b === undefined) return
    this.items[i] = b
    this.items[j] = a
  }

  private bubbleUp(index: number): void {
    while (index > 0) {
      const parent = (index - 1) >> 1
      if (!this.less(index, parent)) break
      this.swap(index, parent)
      index = parent
    }
  }

  private bubbleDown(index: number): void {
    const length = this.items.length

    while (true) {
      const left = 2 * index + 1
      const right = left + 1
      let smallest = index

      if (left < length && this.less(left, smallest)) smallest = left
      if (right < length && this.less(right, smallest)) smallest = right
      if (smallest === index) break

      this.swap(index, smallest)
      index = smallest
    }
  }
}
