/**
 * Binary min-heap over an explicit comparator. `compare(a, b) < 0` means `a`
 * leaves the heap before `b`.
 */
export class MinHeap<T> {
  private readonly _items: T[] = [];

  constructor(private readonly _compare: (a: T, b: T) => number) {}

  get size(): number {
    return this._items.length;
  }

  push(item: T): void {
    this._items.push(item);
    this.siftUp(this._items.length - 1);
  }

  peek(): T | undefined {
    return this._items[0];
  }

  /**
   * Removes and returns the smallest item
   * @throws RangeError when the heap is empty
   */
  pop(): T {
    const items = this._items;
    if (items.length === 0) {
      throw new RangeError("Cannot pop from an empty heap");
    }

    const top = items[0];
    const last = items.pop();
    if (items.length > 0 && last !== undefined) {
      items[0] = last;
      this.siftDown(0);
    }
    return top;
  }

  private siftUp(index: number): void {
    const items = this._items;
    let i = index;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (this._compare(items[i], items[parent]) >= 0) break;
      this.swap(i, parent);
      i = parent;
    }
  }

  private siftDown(index: number): void {
    const items = this._items;
    const n = items.length;
    let i = index;
    while (true) {
      const left = 2 * i + 1;
      const right = left + 1;
      let smallest = i;
      if (left < n && this._compare(items[left], items[smallest]) < 0) {
        smallest = left;
      }
      if (right < n && this._compare(items[right], items[smallest]) < 0) {
        smallest = right;
      }
      if (smallest === i) return;
      this.swap(i, smallest);
      i = smallest;
    }
  }

  private swap(a: number, b: number): void {
    const items = this._items;
    const tmp = items[a];
    items[a] = items[b];
    items[b] = tmp;
  }
}
