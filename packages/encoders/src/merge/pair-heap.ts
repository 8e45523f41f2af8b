/**
 * Binary min-heap of pair candidates over parallel typed arrays.
 *
 * Entries are `(rank, position, generation)` ordered by rank, then by
 * position so equal ranks pop leftmost first. There is no decrease-key:
 * callers push fresh entries and discard stale ones when popped.
 */
export class PairHeap {
  private readonly _rank: Int32Array;
  private readonly _pos: Int32Array;
  private readonly _gen: Uint32Array;
  private _size = 0;

  constructor(capacity: number) {
    const cap = Math.max(1, capacity);
    this._rank = new Int32Array(cap);
    this._pos = new Int32Array(cap);
    this._gen = new Uint32Array(cap);
  }

  get size(): number {
    return this._size;
  }

  /** Rank of the entry popped last. */
  topRank = 0;
  /** Position of the entry popped last. */
  topPos = 0;
  /** Generation of the entry popped last. */
  topGen = 0;

  push(rank: number, pos: number, gen: number): void {
    if (this._size >= this._rank.length) {
      throw new RangeError(`PairHeap capacity ${this._rank.length} exceeded`);
    }
    let i = this._size++;
    this._rank[i] = rank;
    this._pos[i] = pos;
    this._gen[i] = gen;
    // Bubble up
    while (i > 0) {
      const p = (i - 1) >> 1;
      if (!this._less(i, p)) break;
      this._swap(i, p);
      i = p;
    }
  }

  /** Remove the minimum into `topRank`/`topPos`/`topGen`. Returns false when empty. */
  pop(): boolean {
    if (this._size === 0) return false;
    this.topRank = this._rank[0];
    this.topPos = this._pos[0];
    this.topGen = this._gen[0];
    this._size--;
    if (this._size > 0) {
      this._rank[0] = this._rank[this._size];
      this._pos[0] = this._pos[this._size];
      this._gen[0] = this._gen[this._size];
      // Sink down
      let i = 0;
      while (true) {
        let s = i;
        const l = 2 * i + 1;
        const r = 2 * i + 2;
        if (l < this._size && this._less(l, s)) s = l;
        if (r < this._size && this._less(r, s)) s = r;
        if (s === i) break;
        this._swap(s, i);
        i = s;
      }
    }
    return true;
  }

  private _less(a: number, b: number): boolean {
    const ra = this._rank[a];
    const rb = this._rank[b];
    return ra < rb || (ra === rb && this._pos[a] < this._pos[b]);
  }

  private _swap(a: number, b: number): void {
    const tr = this._rank[a]; this._rank[a] = this._rank[b]; this._rank[b] = tr;
    const tp = this._pos[a]; this._pos[a] = this._pos[b]; this._pos[b] = tp;
    const tg = this._gen[a]; this._gen[a] = this._gen[b]; this._gen[b] = tg;
  }
}
