import { ChoiceSetError } from './errors';
import type { Cursor, SizedIterable } from './types';

/**
 * Wrap a fixed list of choices as a SizedIterable.
 */
export function choiceSet<T>(items: readonly T[]): SizedIterable<T> {
  return {
    size: () => items.length,
    [Symbol.iterator]: () => items[Symbol.iterator](),
  };
}

/**
 * One dimension of a product space, linked to its neighbours in connection order.
 */
export class ChainNode<T> {
  previous: ChainNode<T> | undefined;
  next: ChainNode<T> | undefined;

  constructor(readonly choices: SizedIterable<T>) {}

  /** Link `node` directly after this one. */
  connect(node: ChainNode<T>): void {
    this.next = node;
    node.previous = this;
  }

  size(): number {
    return this.choices.size();
  }
}

/**
 * Cartesian product of an ordered chain of choice sets.
 *
 * Combinations are produced lazily in mixed-radix order: the first connected
 * dimension is the most significant digit, the last one cycles fastest.
 */
export class ProductSpace<T> implements SizedIterable<T[]> {
  private head: ChainNode<T> | undefined;
  private tail: ChainNode<T> | undefined;
  private length = 0;

  /** Append a dimension to the end of the chain. */
  connect(choices: SizedIterable<T>): ChainNode<T> {
    const node = new ChainNode(choices);
    if (this.tail) {
      this.tail.connect(node);
    } else {
      this.head = node;
    }
    this.tail = node;
    this.length++;
    return node;
  }

  get dimensions(): number {
    return this.length;
  }

  /** Connected nodes, first to last. */
  nodes(): ChainNode<T>[] {
    const nodes: ChainNode<T>[] = [];
    for (let node = this.head; node; node = node.next) {
      nodes.push(node);
    }
    return nodes;
  }

  /**
   * Number of combinations: 0 for an empty chain, otherwise the product of
   * every node's size. Computed in doubles, so very large spaces are
   * approximate rather than exact.
   */
  size(): number {
    if (!this.head) return 0;
    let total = 1;
    for (let node: ChainNode<T> | undefined = this.head; node; node = node.next) {
      const size = node.size();
      if (size === 0) return 0;
      total *= size;
    }
    return total;
  }

  /** A new cursor positioned before the first combination. */
  traverse(): ProductIterator<T> {
    return new ProductIterator(this.nodes());
  }

  *[Symbol.iterator](): Iterator<T[]> {
    yield* this.traverse();
  }
}

/** Live position within one node's sequence, with one value of lookahead. */
class Digit<T> {
  private iterator: Iterator<T>;
  private upcoming: IteratorResult<T>;
  private current: { value: T } | undefined;

  constructor(private readonly node: ChainNode<T>) {
    this.iterator = node.choices[Symbol.iterator]();
    this.upcoming = this.iterator.next();
  }

  hasNext(): boolean {
    return !this.upcoming.done;
  }

  advance(): void {
    const result = this.upcoming;
    if (result.done) {
      throw new ChoiceSetError(
        `Choice set of size ${this.node.size()} yielded no value after restart`,
      );
    }
    this.current = { value: result.value };
    this.upcoming = this.iterator.next();
  }

  /** Back to the start of the sequence; the caller advances to take the first value. */
  restart(): void {
    this.iterator = this.node.choices[Symbol.iterator]();
    this.upcoming = this.iterator.next();
  }

  value(): T {
    if (!this.current) {
      throw new ChoiceSetError('Digit read before its first value was taken');
    }
    return this.current.value;
  }
}

/**
 * Odometer over a product space. Each `next()` returns one full combination,
 * a value per dimension in chain order. Not shareable between traversals;
 * get a new one from `ProductSpace.traverse()`.
 */
export class ProductIterator<T> implements Cursor<T[]>, Iterable<T[]> {
  private readonly digits: Digit<T>[];
  private started = false;
  private exhausted: boolean;

  constructor(nodes: ChainNode<T>[]) {
    this.digits = nodes.map((node) => new Digit(node));
    this.exhausted = this.digits.length === 0 || this.digits.some((d) => !d.hasNext());
  }

  hasNext(): boolean {
    if (this.exhausted) return false;
    if (!this.started) return true;
    return this.digits.some((d) => d.hasNext());
  }

  /**
   * The next combination, or null once every combination has been returned.
   */
  next(): T[] | null {
    if (!this.hasNext()) return null;

    if (!this.started) {
      for (const digit of this.digits) digit.advance();
      this.started = true;
      return this.combination();
    }

    for (let i = this.digits.length - 1; i >= 0; i--) {
      const digit = this.digits[i];
      if (digit.hasNext()) {
        digit.advance();
        return this.combination();
      }
      // carry: this digit wraps to its first value, the next one up increments
      digit.restart();
      digit.advance();
    }

    this.exhausted = true;
    return null;
  }

  *[Symbol.iterator](): Iterator<T[]> {
    for (let combination = this.next(); combination !== null; combination = this.next()) {
      yield combination;
    }
  }

  private combination(): T[] {
    return this.digits.map((d) => d.value());
  }
}
