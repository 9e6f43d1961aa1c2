/**
 * Immutable, concatenation-efficient ordered container used while a network is assembled.
 *
 * The builder performs many small appends (runs of node indices, single operations) and flattens
 * each sequence exactly once when the structure is finalized. A concatenation tree makes every
 * append O(1) and keeps older snapshots valid, so a failed layer construction can simply keep the
 * previous sequence.
 *
 * Shape:
 *  - nil  : the empty sequence (identity of `concat`)
 *  - leaf : a frozen array of one or more items
 *  - run  : `count` copies of one value stored in O(1)
 *  - cat  : left ++ right with the combined size cached
 *
 * No balancing is performed on append; the tree is only walked front to back. Walks use an
 * explicit stack so left-deep trees produced by long append chains do not exhaust the call stack.
 * `map`, `splitAt`, `reverse` and `concatAll` rebuild a balanced tree from the leaves they visit.
 */

type SequenceNode<T> =
  | { readonly kind: 'nil' }
  | { readonly kind: 'leaf'; readonly items: readonly T[] }
  | { readonly kind: 'run'; readonly value: T; readonly count: number }
  | {
      readonly kind: 'cat';
      readonly size: number;
      readonly left: SequenceNode<T>;
      readonly right: SequenceNode<T>;
    };

type SequenceLeaf<T> = Exclude<SequenceNode<T>, { kind: 'nil' } | { kind: 'cat' }>;

const NIL: { readonly kind: 'nil' } = Object.freeze({ kind: 'nil' });

function nodeSize<T>(node: SequenceNode<T>): number {
  switch (node.kind) {
    case 'nil':
      return 0;
    case 'leaf':
      return node.items.length;
    case 'run':
      return node.count;
    case 'cat':
      return node.size;
  }
}

function cat<T>(left: SequenceNode<T>, right: SequenceNode<T>): SequenceNode<T> {
  if (left.kind === 'nil') return right;
  if (right.kind === 'nil') return left;
  return { kind: 'cat', size: nodeSize(left) + nodeSize(right), left, right };
}

/** Pairwise concatenation producing a tree of logarithmic depth. */
function balanced<T>(nodes: readonly SequenceNode<T>[]): SequenceNode<T> {
  if (nodes.length === 0) return NIL;
  let level = nodes.slice();
  while (level.length > 1) {
    const next: SequenceNode<T>[] = [];
    for (let i = 0; i < level.length; i += 2) {
      next.push(i + 1 < level.length ? cat(level[i], level[i + 1]) : level[i]);
    }
    level = next;
  }
  return level[0];
}

/** Visit non-empty leaves left to right. */
function walkLeaves<T>(
  root: SequenceNode<T>,
  visit: (leaf: SequenceLeaf<T>) => void
): void {
  const stack: SequenceNode<T>[] = [root];
  while (stack.length > 0) {
    const node = stack.pop();
    if (node === undefined || node.kind === 'nil') continue;
    if (node.kind === 'cat') {
      // right pushed first so the left subtree is visited first
      stack.push(node.right, node.left);
      continue;
    }
    visit(node);
  }
}

function leafOf<T>(items: readonly T[]): SequenceNode<T> {
  return items.length === 0 ? NIL : { kind: 'leaf', items: Object.freeze(items.slice()) };
}

export class AppendSequence<T> implements Iterable<T> {
  private constructor(private readonly root: SequenceNode<T>) {}

  /** The empty sequence. */
  static empty<T>(): AppendSequence<T> {
    return new AppendSequence<T>(NIL);
  }

  /** Sequence holding the given values in order (one value = singleton). */
  static of<T>(...values: T[]): AppendSequence<T> {
    return new AppendSequence<T>(leafOf(values));
  }

  /** Copies `values`; later mutation of the source array is not observed. */
  static fromArray<T>(values: readonly T[]): AppendSequence<T> {
    return new AppendSequence<T>(leafOf(values));
  }

  /** `count` copies of `value`, stored in constant space. */
  static replicate<T>(value: T, count: number): AppendSequence<T> {
    if (!Number.isInteger(count) || count < 0) {
      throw new RangeError(`Run length must be a non-negative integer, got ${count}`);
    }
    if (count === 0) return AppendSequence.empty<T>();
    return new AppendSequence<T>({ kind: 'run', value, count });
  }

  /** Consecutive integers `start, start + 1, ..., start + count - 1`. */
  static range(start: number, count: number): AppendSequence<number> {
    const values: number[] = [];
    for (let i = 0; i < count; i++) values.push(start + i);
    return AppendSequence.fromArray(values);
  }

  /** N-ary concatenation, balanced. */
  static concatAll<T>(sequences: Iterable<AppendSequence<T>>): AppendSequence<T> {
    const roots: SequenceNode<T>[] = [];
    for (const seq of sequences) if (seq.root.kind !== 'nil') roots.push(seq.root);
    return new AppendSequence<T>(balanced(roots));
  }

  /** Number of elements; cached at every tree node. */
  get size(): number {
    return nodeSize(this.root);
  }

  get isEmpty(): boolean {
    return this.root.kind === 'nil';
  }

  concat(other: AppendSequence<T>): AppendSequence<T> {
    if (other.root.kind === 'nil') return this;
    if (this.root.kind === 'nil') return other;
    return new AppendSequence<T>(cat(this.root, other.root));
  }

  /** Append a single value. */
  append(value: T): AppendSequence<T> {
    return this.concat(AppendSequence.of(value));
  }

  /** Flatten, preserving append order. */
  toArray(): T[] {
    const out: T[] = new Array<T>(this.size);
    let cursor = 0;
    walkLeaves(this.root, (leaf) => {
      if (leaf.kind === 'leaf') {
        for (const item of leaf.items) out[cursor++] = item;
      } else {
        for (let i = 0; i < leaf.count; i++) out[cursor++] = leaf.value;
      }
    });
    return out;
  }

  /** In-order traversal with effects. */
  forEach(fn: (value: T, index: number) => void): void {
    let index = 0;
    walkLeaves(this.root, (leaf) => {
      if (leaf.kind === 'leaf') {
        for (const item of leaf.items) fn(item, index++);
      } else {
        for (let i = 0; i < leaf.count; i++) fn(leaf.value, index++);
      }
    });
  }

  reduce<A>(fn: (acc: A, value: T, index: number) => A, initial: A): A {
    let acc = initial;
    this.forEach((value, index) => {
      acc = fn(acc, value, index);
    });
    return acc;
  }

  /**
   * Apply `fn` to every element. A run is mapped by a single call whose result is replicated,
   * so `fn` should be pure.
   */
  map<U>(fn: (value: T) => U): AppendSequence<U> {
    const mapped: SequenceNode<U>[] = [];
    walkLeaves(this.root, (leaf) => {
      if (leaf.kind === 'leaf') mapped.push(leafOf(leaf.items.map((item) => fn(item))));
      else mapped.push({ kind: 'run', value: fn(leaf.value), count: leaf.count });
    });
    return new AppendSequence<U>(balanced(mapped));
  }

  /**
   * Split into the first `offset` elements and the rest. Offsets past the end give
   * `[this, empty]`; offsets at or below zero give `[empty, this]`.
   * @throws RangeError when `offset` is not an integer.
   */
  splitAt(offset: number): [AppendSequence<T>, AppendSequence<T>] {
    if (!Number.isInteger(offset)) {
      throw new RangeError(`Split offset must be an integer, got ${offset}`);
    }
    if (offset <= 0) return [AppendSequence.empty<T>(), this];
    if (offset >= this.size) return [this, AppendSequence.empty<T>()];
    const left: SequenceNode<T>[] = [];
    const right: SequenceNode<T>[] = [];
    let remaining = offset;
    walkLeaves(this.root, (leaf) => {
      const size = nodeSize(leaf);
      if (remaining >= size) {
        left.push(leaf);
        remaining -= size;
        return;
      }
      if (remaining === 0) {
        right.push(leaf);
        return;
      }
      if (leaf.kind === 'leaf') {
        left.push(leafOf(leaf.items.slice(0, remaining)));
        right.push(leafOf(leaf.items.slice(remaining)));
      } else {
        left.push({ kind: 'run', value: leaf.value, count: remaining });
        right.push({ kind: 'run', value: leaf.value, count: leaf.count - remaining });
      }
      remaining = 0;
    });
    return [
      new AppendSequence<T>(balanced(left)),
      new AppendSequence<T>(balanced(right)),
    ];
  }

  reverse(): AppendSequence<T> {
    const leaves: SequenceNode<T>[] = [];
    walkLeaves(this.root, (leaf) => {
      leaves.push(leaf.kind === 'leaf' ? leafOf(leaf.items.slice().reverse()) : leaf);
    });
    leaves.reverse();
    return new AppendSequence<T>(balanced(leaves));
  }

  /** Element-wise equality; independent of how either tree was assembled. */
  equals(
    other: AppendSequence<T>,
    eq: (a: T, b: T) => boolean = Object.is
  ): boolean {
    if (this.size !== other.size) return false;
    const mine = this[Symbol.iterator]();
    for (const theirs of other) {
      const next = mine.next();
      if (next.done || !eq(next.value, theirs)) return false;
    }
    return true;
  }

  *[Symbol.iterator](): Iterator<T> {
    const stack: SequenceNode<T>[] = [this.root];
    while (stack.length > 0) {
      const node = stack.pop();
      if (node === undefined || node.kind === 'nil') continue;
      if (node.kind === 'cat') {
        stack.push(node.right, node.left);
      } else if (node.kind === 'leaf') {
        yield* node.items;
      } else {
        for (let i = 0; i < node.count; i++) yield node.value;
      }
    }
  }

  /** Debug rendering: `[1, 2, 0 * 4]`, runs longer than one printed as `value * count`. */
  toString(): string {
    const parts: string[] = [];
    walkLeaves(this.root, (leaf) => {
      if (leaf.kind === 'leaf') {
        for (const item of leaf.items) parts.push(String(item));
      } else if (leaf.count === 1) {
        parts.push(String(leaf.value));
      } else {
        parts.push(`${String(leaf.value)} * ${leaf.count}`);
      }
    });
    return `[${parts.join(', ')}]`;
  }
}
