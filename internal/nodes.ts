import { check } from './assert';

type index = number;

/** @internal */
export interface BTreeNodeHost<K> {
  _compare: (a: K, b: K) => number;
  /** Maximum number of keys in any node (branching factor - 1) */
  _maxKeys: number;
  /** Minimum number of keys in any node except the root */
  _minKeys: number;
}

/** Returned by `search` and `remove` when the key is not in the subtree.
 *  (`undefined` can't be used for this, since it is a legal key.) */
export const NotFound: unique symbol = Symbol('NotFound');
export type NotFound = typeof NotFound;

/** A node split in two: the key promoted into the parent, and the new node
 *  holding the keys (and children) that were to the right of it. */
export type Split<K> = [middleKey: K, rightSibling: BNode<K>];

/** Maximum number of keys per node for a given branching factor. */
export function maxKeysFor(branchingFactor: number): number {
  return branchingFactor - 1;
}

/** Minimum number of keys per non-root node for a given branching factor,
 *  i.e. ceil(M/2)-1. For odd M this is (M-1)/2 and for even M it is M/2-1;
 *  either way, a node with one key too few plus a sibling with no key to
 *  spare plus their separator fit in a single node (2*min <= M-1). */
export function minKeysFor(branchingFactor: number): number {
  return Math.ceil(branchingFactor / 2) - 1;
}

/** Leaf node / base class. **************************************************/
export class BNode<K> {
  keys: K[];

  get isLeaf(): boolean { return !this.isInternal(); }

  constructor(keys: K[] = []) {
    this.keys = keys;
  }

  isInternal(): this is BNodeInternal<K> {
    return false;
  }

  /** Copies the node and, for internal nodes, its whole subtree. No node
   *  of the copy is shared with the original. */
  clone(): BNode<K> {
    return new BNode<K>(this.keys.slice(0));
  }

  ///////////////////////////////////////////////////////////////////////////
  // Shared methods /////////////////////////////////////////////////////////

  overflows(host: BTreeNodeHost<K>): boolean {
    return this.keys.length > host._maxKeys;
  }

  underflows(host: BTreeNodeHost<K>): boolean {
    return this.keys.length < host._minKeys;
  }

  /** True if a rotation cannot move another key into this node */
  isFull(host: BTreeNodeHost<K>): boolean {
    return this.keys.length >= host._maxKeys;
  }

  /** True if a rotation can move a key out of this node without underflow */
  canSpareKey(host: BTreeNodeHost<K>): boolean {
    return this.keys.length > host._minKeys;
  }

  middleKey(): K {
    return this.keys[this.keys.length >> 1];
  }

  // If key not found, returns i^failXor where i is the insertion index.
  // Callers that don't care whether there was a match will set failXor=0.
  indexOf(key: K, failXor: number, cmp: (a: K, b: K) => number): index {
    const keys = this.keys;
    let lo = 0, hi = keys.length, mid = hi >> 1;
    while (lo < hi) {
      const c = cmp(keys[mid], key);
      if (c < 0)
        lo = mid + 1;
      else if (c > 0) // key < keys[mid]
        hi = mid;
      else if (c === 0)
        return mid;
      else {
        // c is NaN or otherwise invalid
        if (key === key) // at least the search key is not NaN
          return keys.length ^ failXor;
        else
          throw new Error("BTree: NaN was used as a key");
      }
      mid = (lo + hi) >> 1;
    }
    return mid ^ failXor;
  }

  /////////////////////////////////////////////////////////////////////////////
  // Leaf Node: misc //////////////////////////////////////////////////////////

  minKey(): K {
    return this.keys[0];
  }

  maxKey(): K {
    return this.keys[this.keys.length - 1];
  }

  search(key: K, host: BTreeNodeHost<K>): K | NotFound {
    const i = this.indexOf(key, -1, host._compare);
    return i < 0 ? NotFound : this.keys[i];
  }

  /** Scans the subtree for broken invariants.
   *  @returns the number of keys in the subtree and its height */
  checkValid(depth: number, host: BTreeNodeHost<K>): [size: number, height: number] {
    this.checkKeys(depth, host);
    return [this.keys.length, 1];
  }

  protected checkKeys(depth: number, host: BTreeNodeHost<K>): void {
    const k = this.keys, kL = k.length;
    check(kL > 0, "empty node at depth", depth);
    check(kL <= host._maxKeys, "too many keys (", kL, ") at depth", depth, "max:", host._maxKeys);
    check(depth === 0 || kL >= host._minKeys, "too few keys (", kL, ") at depth", depth, "min:", host._minKeys);
    for (let i = 1; i < kL; i++)
      if (!(host._compare(k[i-1], k[i]) < 0))
        check(false, "sort violation at depth", depth, "index", i, "keys", k[i-1], k[i]);
  }

  /////////////////////////////////////////////////////////////////////////////
  // Leaf Node: insertion & node splitting ////////////////////////////////////

  /** Inserts `key`, or replaces the stored key that compares equal to it.
   *  The node may be left overflowing; the parent (or tree) deals with that.
   *  @returns true if the key was not already present */
  add(key: K, host: BTreeNodeHost<K>): boolean {
    const i = this.indexOf(key, -1, host._compare);
    if (i >= 0) {
      this.keys[i] = key;
      return false;
    }
    this.keys.splice(~i, 0, key);
    return true;
  }

  /**
   * Split this node around its middle key.
   * Modifies this to keep the keys before the middle key, and returns the
   * middle key with a new node holding the keys after it.
   */
  splitOffRightSide(): Split<K> {
    const half = this.keys.length >> 1, keys = this.keys.splice(half);
    const middle = keys[0];
    keys.shift();
    return [middle, new BNode<K>(keys)];
  }

  // Rotations: the parent passes in its separator key and stores the
  // returned key in its place.

  /** Appends `separator` and returns the first key of `rhs`, removing it */
  takeFromRight(rhs: BNode<K>, separator: K): K {
    const key = rhs.keys[0];
    rhs.keys.shift();
    this.keys.push(separator);
    return key;
  }

  /** Prepends `separator` and returns the last key of `lhs`, removing it */
  takeFromLeft(lhs: BNode<K>, separator: K): K {
    const key = lhs.keys[lhs.keys.length - 1];
    lhs.keys.pop();
    this.keys.unshift(separator);
    return key;
  }

  /** Adds `separator` and the entire contents of the right-hand sibling
   *  (the sibling is left unchanged, and is dropped by the caller) */
  mergeSibling(rhs: BNode<K>, separator: K): void {
    this.keys.push(separator);
    this.keys.push.apply(this.keys, rhs.keys);
  }

  /////////////////////////////////////////////////////////////////////////////
  // Leaf Node: deletions /////////////////////////////////////////////////////

  /** Removes the key that compares equal to `key` and returns it. The node
   *  may be left underflowing; the parent (or tree) deals with that. */
  remove(key: K, host: BTreeNodeHost<K>): K | NotFound {
    const i = this.indexOf(key, -1, host._compare);
    if (i < 0)
      return NotFound;
    const removed = this.keys[i];
    this.keys.splice(i, 1);
    return removed;
  }

  /** Removes and returns the smallest key in the subtree. No comparisons
   *  are made, so this cannot throw on a well-formed subtree. */
  removeMin(_: BTreeNodeHost<K>): K {
    const key = this.keys[0];
    this.keys.shift();
    return key;
  }
}

/** Internal node (non-leaf node) ********************************************/
export class BNodeInternal<K> extends BNode<K> {
  // children[i] holds the keys below keys[i], and children[i+1] the keys
  // above it, so there is always one more child than there are keys.
  children: BNode<K>[];

  constructor(children: BNode<K>[], keys: K[]) {
    super(keys);
    this.children = children;
  }

  isInternal(): this is BNodeInternal<K> {
    return true;
  }

  clone(): BNode<K> {
    const children = this.children.slice(0);
    for (let i = 0; i < children.length; i++)
      children[i] = children[i].clone();
    return new BNodeInternal<K>(children, this.keys.slice(0));
  }

  minKey(): K {
    return this.children[0].minKey();
  }

  maxKey(): K {
    return this.children[this.children.length - 1].maxKey();
  }

  search(key: K, host: BTreeNodeHost<K>): K | NotFound {
    const i = this.indexOf(key, -1, host._compare);
    return i >= 0 ? this.keys[i] : this.children[~i].search(key, host);
  }

  checkValid(depth: number, host: BTreeNodeHost<K>): [size: number, height: number] {
    const k = this.keys, c = this.children, kL = k.length, cL = c.length;
    check(cL === kL + 1, "keys/children length mismatch: depth", depth, "lengths", kL, cL);
    this.checkKeys(depth, host);
    let size = kL, height = 0;
    for (let i = 0; i < cL; i++) {
      const child = c[i];
      const [childSize, childHeight] = child.checkValid(depth + 1, host);
      size += childSize;
      if (i === 0)
        height = childHeight;
      else
        check(childHeight === height, "leaves at different depths below depth", depth, "index", i);
      if (i > 0 && !(host._compare(k[i-1], child.minKey()) < 0))
        check(false, "keys[", i-1, "] =", k[i-1], "is not below child", i, "at depth", depth);
      if (i < kL && !(host._compare(child.maxKey(), k[i]) < 0))
        check(false, "keys[", i, "] =", k[i], "is not above child", i, "at depth", depth);
    }
    return [size, height + 1];
  }

  /////////////////////////////////////////////////////////////////////////////
  // Internal Node: insertion & node splitting ////////////////////////////////

  add(key: K, host: BTreeNodeHost<K>): boolean {
    const i = this.indexOf(key, -1, host._compare);
    if (i >= 0) {
      this.keys[i] = key;
      return false;
    }
    const c = ~i, child = this.children[c];
    if (!child.add(key, host))
      return false;
    if (child.overflows(host)) {
      // Shifting a key to the left or right sibling may avoid a split.
      const children = this.children;
      if (c > 0 && !children[c-1].isFull(host))
        this.rotateLeft(c);
      else if (c + 1 < children.length && !children[c+1].isFull(host))
        this.rotateRight(c);
      else
        this.splitChild(c);
    }
    return true;
  }

  splitOffRightSide(): Split<K> {
    const half = this.keys.length >> 1;
    const children = this.children.splice(half + 1);
    const keys = this.keys.splice(half);
    const middle = keys[0];
    keys.shift();
    return [middle, new BNodeInternal<K>(children, keys)];
  }

  /** Splits children[i], promoting its middle key into this node */
  splitChild(i: index): void {
    const [middle, right] = this.children[i].splitOffRightSide();
    this.keys.splice(i, 0, middle);
    this.children.splice(i + 1, 0, right);
  }

  /** Moves one key from children[i] into children[i-1] through keys[i-1] */
  rotateLeft(i: index): void {
    const c = this.children;
    this.keys[i-1] = c[i-1].takeFromRight(c[i], this.keys[i-1]);
  }

  /** Moves one key from children[i] into children[i+1] through keys[i] */
  rotateRight(i: index): void {
    const c = this.children;
    this.keys[i] = c[i+1].takeFromLeft(c[i], this.keys[i]);
  }

  takeFromRight(rhs: BNode<K>, separator: K): K {
    check(rhs.isInternal(), "right sibling of an internal node is a leaf");
    this.children.push(rhs.children[0]);
    rhs.children.shift();
    return super.takeFromRight(rhs, separator);
  }

  takeFromLeft(lhs: BNode<K>, separator: K): K {
    check(lhs.isInternal(), "left sibling of an internal node is a leaf");
    this.children.unshift(lhs.children[lhs.children.length - 1]);
    lhs.children.pop();
    return super.takeFromLeft(lhs, separator);
  }

  mergeSibling(rhs: BNode<K>, separator: K): void {
    check(rhs.isInternal(), "right sibling of an internal node is a leaf");
    super.mergeSibling(rhs, separator);
    this.children.push.apply(this.children, rhs.children);
  }

  /////////////////////////////////////////////////////////////////////////////
  // Internal Node: deletions /////////////////////////////////////////////////

  remove(key: K, host: BTreeNodeHost<K>): K | NotFound {
    const i = this.indexOf(key, -1, host._compare);
    let c: index, removed: K | NotFound;
    if (i >= 0) {
      // The key is replaced by its inorder successor, which is removed from
      // the right subtree. Past this point nothing can throw.
      removed = this.keys[i];
      c = i + 1;
      this.keys[i] = this.children[c].removeMin(host);
    } else {
      c = ~i;
      removed = this.children[c].remove(key, host);
      if (removed === NotFound)
        return NotFound;
    }
    if (this.children[c].underflows(host))
      this.fixUnderflow(c, host);
    return removed;
  }

  removeMin(host: BTreeNodeHost<K>): K {
    const key = this.children[0].removeMin(host);
    if (this.children[0].underflows(host))
      this.fixUnderflow(0, host);
    return key;
  }

  /** Restores the key count of children[i] by borrowing from the left
   *  sibling, else from the right sibling, else by merging with a sibling.
   *  A merge may leave this node underflowing in turn. */
  fixUnderflow(i: index, host: BTreeNodeHost<K>): void {
    const c = this.children;
    if (i > 0 && c[i-1].canSpareKey(host))
      this.rotateRight(i - 1);
    else if (i + 1 < c.length && c[i+1].canSpareKey(host))
      this.rotateLeft(i + 1);
    else
      this.mergeChildren(i > 0 ? i - 1 : i);
  }

  /** Merges children[i+1] and keys[i] into children[i] */
  mergeChildren(i: index): void {
    const c = this.children;
    c[i].mergeSibling(c[i+1], this.keys[i]);
    this.keys.splice(i, 1);
    c.splice(i + 1, 1);
  }
}
