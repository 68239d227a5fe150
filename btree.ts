import type { ITree } from './interfaces';
import { BNode, BNodeInternal, BTreeNodeHost, NotFound, maxKeysFor, minKeysFor } from './internal/nodes';
import { iterator, levelOrder, postorder, preorder } from './internal/traversal';
import { check } from './internal/assert';
import { EmptyTreeError, InvalidBranchingFactorError, MinBranchingFactor } from './errors';

export type { ITree, ITreeSource, ITreeSink } from './interfaces';
export { BTreeError, EmptyTreeError, InvalidBranchingFactorError, MinBranchingFactor } from './errors';
export { maxKeysFor, minKeysFor } from './internal/nodes';

/** Branching factor used when none is given to the constructor */
export const DefaultBranchingFactor = 5;

/**
 * Types that BTree supports by default
 */
export type DefaultComparable = number | string | boolean | Date | null | undefined |
               { valueOf: () => number | string };

/**
 * Compares DefaultComparables to form a strict partial ordering.
 *
 * Handles +/-0 and NaN like Map: NaN is equal to NaN, and -0 is equal to +0.
 * NaN is ordered before all other numbers.
 *
 * Values of different types are ordered by type name. Two objects with equal
 * valueOf compare the same, but compare unequal to primitives that have the
 * same value.
 */
export function defaultComparator(a: DefaultComparable, b: DefaultComparable): number {
  // Special case finite numbers first for performance.
  if (typeof a === 'number' && typeof b === 'number' && Number.isFinite(a) && Number.isFinite(b))
    return a - b;

  const ta = typeof a, tb = typeof b;
  if (ta !== tb)
    return ta < tb ? -1 : 1;

  if (typeof a === 'object' && typeof b === 'object') {
    // standardized JavaScript bug: null is not an object, but typeof says it is
    if (a === null)
      return b === null ? 0 : -1;
    else if (b === null)
      return 1;
    return comparePrimitives(a.valueOf(), b.valueOf());
  }
  return comparePrimitives(a, b);
}

function comparePrimitives(a: unknown, b: unknown): number {
  if (typeof a === 'string' && typeof b === 'string')
    return a < b ? -1 : a > b ? 1 : 0;
  if (typeof a === 'number' && typeof b === 'number') {
    if (a < b) return -1;
    if (a > b) return 1;
    if (a === b) return 0;
    // Order NaN less than other numbers
    if (Number.isNaN(a))
      return Number.isNaN(b) ? 0 : -1;
    return 1;
  }
  if (typeof a === 'boolean' && typeof b === 'boolean')
    return a === b ? 0 : a ? 1 : -1;
  if (a === undefined && b === undefined)
    return 0;
  // Deal with two valueOf()s producing different types
  const ta = typeof a, tb = typeof b;
  return ta === tb ? Number.NaN : ta < tb ? -1 : 1;
}

/**
 * Compares items using the < and > operators. This function is probably slightly
 * faster than the defaultComparator for Dates and strings. Unlike
 * defaultComparator, this comparator doesn't support mixed types correctly,
 * i.e. use it with `BTree<string>` or `BTree<number>` but not `BTree<string|number>`.
 *
 * NaN is not supported.
 */
export function simpleComparator(a: string, b: string): number;
export function simpleComparator(a: number, b: number): number;
export function simpleComparator(a: Date, b: Date): number;
export function simpleComparator(a: string | number | Date, b: string | number | Date): number {
  return a > b ? 1 : a < b ? -1 : 0;
}

/**
 * An ordered set of keys stored in a B-tree: a balanced search tree in
 * which every node holds up to M-1 sorted keys and every internal node has
 * one more child than it has keys. M, the branching factor, is chosen when
 * the tree is constructed and cannot be changed afterward.
 *
 * All leaves are always at the same depth, so `height` is O(log_M size),
 * and so is the cost of `add`, `remove`, `find` and `contains`. Every node
 * except the root holds at least ceil(M/2)-1 keys.
 *
 * When a node overflows during `add`, a key is first rotated into an
 * adjacent sibling that has room (left sibling first, then right); only if
 * neither has room is the node split around its middle key. Likewise, when
 * a node underflows during `remove`, a key is borrowed from a sibling that
 * can spare one (left first, then right) before resorting to a merge. The
 * shape of a tree therefore depends on the order of insertions: two trees
 * holding the same keys can have different shapes.
 *
 * Out of the box, BTree supports keys that are numbers, strings, booleans,
 * Date, and objects that have a valueOf() method returning a number or
 * string. Other data types require a custom comparator, which you must pass
 * as the second argument to the constructor.
 *
 * @example
 *     const tree = new BTree<number>(3);
 *     for (const k of [12, 20, 10, 30, 11, 40])
 *       tree.add(k);
 *     tree.getRoot();             // 30
 *     [...tree.levelOrder()];     // [12, 30, 10, 11, 20, 40]
 *     tree.remove(20);            // 20
 *     tree.remove(21);            // undefined
 *
 * @description
 * Iterators returned by the traversal methods are lazy. They are only valid
 * until the tree is next modified.
 */
export default class BTree<K = DefaultComparable> implements ITree<K>, BTreeNodeHost<K>
{
  private _root: BNode<K> | undefined = undefined;
  private _size = 0;
  private _height = 0;
  private readonly _branchingFactor: number;
  /** @internal */
  readonly _maxKeys: number;
  /** @internal */
  readonly _minKeys: number;

  /**
   * provides a total order over keys (and a strict partial order over the type K)
   * @returns a negative value if a < b, 0 if a === b and a positive value if a > b
   */
  readonly _compare: (a: K, b: K) => number;

  /**
   * Copies a tree node by node, with the same branching factor and
   * comparator. The copy shares no nodes with `other`; it has the same
   * size, height and shape, so `copy.equals(other)` holds.
   * @description Computational complexity: O(size)
   */
  public constructor(other: BTree<K>);
  /**
   * Initializes an empty B-tree.
   * @param branchingFactor Maximum number of children per node (default: 5).
   *   Must be an integer of at least 3.
   * @param compare Custom function to compare keys. If not specified,
   *   defaultComparator will be used, which is valid as long as K extends DefaultComparable.
   * @throws InvalidBranchingFactorError if branchingFactor is invalid
   */
  public constructor(branchingFactor?: number, compare?: (a: K, b: K) => number);
  public constructor(source: number | BTree<K> = DefaultBranchingFactor, compare?: (a: K, b: K) => number) {
    if (source instanceof BTree) {
      this._branchingFactor = source._branchingFactor;
      this._compare = source._compare;
    } else {
      if (!Number.isInteger(source) || source < MinBranchingFactor)
        throw new InvalidBranchingFactorError(source);
      this._branchingFactor = source;
      this._compare = compare || defaultComparator as unknown as (a: K, b: K) => number;
    }
    this._maxKeys = maxKeysFor(this._branchingFactor);
    this._minKeys = minKeysFor(this._branchingFactor);
    if (source instanceof BTree && source._root !== undefined) {
      this._root = source._root.clone();
      this._size = source._size;
      this._height = source._height;
    }
  }

  /////////////////////////////////////////////////////////////////////////////
  // Size & shape /////////////////////////////////////////////////////////////

  /** Gets the number of keys in the tree. */
  get size(): number { return this._size; }
  /** Gets the number of node levels from the root to the leaves, or 0 if the tree is empty. */
  get height(): number { return this._height; }
  /** Returns true iff the tree contains no keys. */
  get isEmpty(): boolean { return this._size === 0; }
  /** Gets the maximum number of children per node. */
  get branchingFactor(): number { return this._branchingFactor; }

  /** Releases all nodes so that the tree is empty. */
  clear(): void {
    this._root = undefined;
    this._size = 0;
    this._height = 0;
  }

  /////////////////////////////////////////////////////////////////////////////
  // Lookup ///////////////////////////////////////////////////////////////////

  /**
   * Returns true if the tree contains a key equal to `key`.
   * Unlike find(), this does not throw when the tree is empty.
   * @description Computational complexity: O(log size)
   */
  contains(key: K): boolean {
    return this._root !== undefined && this._root.search(key, this) !== NotFound;
  }

  /**
   * Finds a key in the tree.
   * @returns the stored key that compares equal to `key`, or undefined if there is none.
   * @throws EmptyTreeError if the tree is empty
   * @description Computational complexity: O(log size)
   */
  find(key: K): K | undefined {
    const result = this.rootOrThrow('find').search(key, this);
    return result === NotFound ? undefined : result;
  }

  /** Gets the lowest key in the tree. Complexity: O(height) */
  getMin(): K {
    return this.rootOrThrow('getMin').minKey();
  }

  /** Gets the highest key in the tree. Complexity: O(height) */
  getMax(): K {
    return this.rootOrThrow('getMax').maxKey();
  }

  /** The root can hold several keys; by convention this returns the middle one. */
  getRoot(): K {
    return this.rootOrThrow('getRoot').middleKey();
  }

  /////////////////////////////////////////////////////////////////////////////
  // Mutators /////////////////////////////////////////////////////////////////

  /**
   * Adds a key to the tree. If an equal key is already present, it is
   * replaced by `key` and the size does not change.
   * @returns true if the key was not already present.
   * @description Computational complexity: O(log size)
   */
  add(key: K): boolean {
    const root = this._root;
    if (root === undefined) {
      this._root = new BNode<K>([key]);
      this._height = 1;
    } else {
      if (!root.add(key, this))
        return false;
      if (root.overflows(this)) {
        // Root node has split, so create a new root node.
        const [middleKey, rightSibling] = root.splitOffRightSide();
        this._root = new BNodeInternal<K>([root, rightSibling], [middleKey]);
        this._height++;
      }
    }
    this._size++;
    return true;
  }

  /**
   * Removes a key from the tree.
   * @returns the stored key that was removed, or undefined if no equal key was found.
   * @description Computational complexity: O(log size)
   */
  remove(key: K): K | undefined {
    const root = this._root;
    if (root === undefined)
      return undefined;
    const removed = root.remove(key, this);
    if (removed === NotFound)
      return undefined;
    if (root.keys.length === 0) {
      // The root is the only node allowed to become empty. If it still has
      // a child (after a merge) that child becomes the root.
      this._root = root.isInternal() ? root.children[0] : undefined;
      this._height--;
    }
    this._size--;
    return removed;
  }

  /////////////////////////////////////////////////////////////////////////////
  // Traversals ///////////////////////////////////////////////////////////////

  /** Visits key i of each node before the subtree at child i.
   *  @throws EmptyTreeError if the tree is empty */
  preorder(): IterableIterator<K> {
    return preorder(this.rootOrThrow('preorder'));
  }

  /** For B-trees, inorder traversal is defined to be the same as preorder.
   *  Use keys() to iterate in ascending order.
   *  @throws EmptyTreeError if the tree is empty */
  inOrder(): IterableIterator<K> {
    return preorder(this.rootOrThrow('inOrder'));
  }

  /** Visits the subtree at child i of each node before key i.
   *  @throws EmptyTreeError if the tree is empty */
  postOrder(): IterableIterator<K> {
    return postorder(this.rootOrThrow('postOrder'));
  }

  /** Visits nodes breadth-first, and the keys of each node in order.
   *  @throws EmptyTreeError if the tree is empty */
  levelOrder(): IterableIterator<K> {
    return levelOrder(this.rootOrThrow('levelOrder'));
  }

  /** Iterates the keys in level order, or nothing if the tree is empty. */
  [Symbol.iterator](): IterableIterator<K> {
    return this._root === undefined ? iterator<K>() : levelOrder(this._root);
  }

  /** Returns an iterator over the keys in ascending order (empty if the tree is empty). */
  keys(): IterableIterator<K> {
    // the postorder of a search tree is its sort order
    return this._root === undefined ? iterator<K>() : postorder(this._root);
  }

  /** Gets an array of all keys, sorted */
  toArray(): K[] {
    return Array.from(this.keys());
  }

  /** Gets a string representing the tree's data based on toArray(). */
  toString(): string {
    return this.toArray().toString();
  }

  /////////////////////////////////////////////////////////////////////////////
  // Additional methods ///////////////////////////////////////////////////////

  /**
   * Two trees are equal if they have the same size, height and branching
   * factor, and their level-order traversals produce equal keys. The shape
   * of the nodes is not compared.
   */
  equals(other: BTree<K>): boolean {
    if (this === other)
      return true;
    if (this._size !== other._size || this._height !== other._height ||
        this._branchingFactor !== other._branchingFactor)
      return false;
    const mine = this[Symbol.iterator](), theirs = other[Symbol.iterator]();
    for (;;) {
      const a = mine.next(), b = theirs.next();
      if (a.done || b.done)
        return a.done === b.done;
      if (this._compare(a.value, b.value) !== 0)
        return false;
    }
  }

  /** Scans the tree for signs of serious bugs (e.g. a node with too few or
   *  too many keys, leaves at different depths, keys out of order, or a
   *  size or height that doesn't match the nodes).
   *  Computational complexity: O(size log size) */
  checkValid(): void {
    const root = this._root;
    if (root === undefined) {
      check(this._size === 0 && this._height === 0, "tree without root has size", this._size, "and height", this._height);
      return;
    }
    const [size, height] = root.checkValid(0, this);
    check(size === this._size, "size mismatch: counted", size, "but stored", this._size);
    check(height === this._height, "height mismatch: measured", height, "but stored", this._height);
  }

  private rootOrThrow(operation: string): BNode<K> {
    if (this._root === undefined)
      throw new EmptyTreeError(operation);
    return this._root;
  }
}
