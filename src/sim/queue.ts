import type { Structures } from './types'

export interface FifoQueue<T> extends Iterable<T> {
  readonly size: number
  push(item: T): void
  peek(): T | undefined
  shift(): T | undefined
}

// Array backed; the consumed prefix is compacted once it outgrows the live part.
export class ArrayQueue<T> implements FifoQueue<T> {
  private items: T[] = []
  private head = 0

  get size() {
    return this.items.length - this.head
  }

  push(item: T) {
    this.items.push(item)
  }

  peek(): T | undefined {
    return this.head < this.items.length ? this.items[this.head] : undefined
  }

  shift(): T | undefined {
    if (this.head >= this.items.length) return undefined
    const item = this.items[this.head++]
    if (this.head > 16 && this.head * 2 > this.items.length) {
      this.items = this.items.slice(this.head)
      this.head = 0
    }
    return item
  }

  *[Symbol.iterator](): Iterator<T> {
    for (let i = this.head; i < this.items.length; i++) yield this.items[i]
  }
}

interface Node<T> {
  value: T
  next: Node<T> | null
}

export class LinkedQueue<T> implements FifoQueue<T> {
  private first: Node<T> | null = null
  private last: Node<T> | null = null
  private count = 0

  get size() {
    return this.count
  }

  push(item: T) {
    const node: Node<T> = { value: item, next: null }
    if (this.last) this.last.next = node
    else this.first = node
    this.last = node
    this.count++
  }

  peek(): T | undefined {
    return this.first?.value
  }

  shift(): T | undefined {
    const node = this.first
    if (!node) return undefined
    this.first = node.next
    if (!this.first) this.last = null
    this.count--
    return node.value
  }

  *[Symbol.iterator](): Iterator<T> {
    for (let node = this.first; node; node = node.next) yield node.value
  }
}

export function createQueue<T>(structures: Structures): FifoQueue<T> {
  return structures === 'linked' ? new LinkedQueue<T>() : new ArrayQueue<T>()
}
