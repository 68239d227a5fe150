/** Read-only operations of a balanced search tree of keys.
 *  Iterating the tree itself visits its keys in level order. */
export interface ITreeSource<K> extends Iterable<K> {
  /** Returns the number of keys in the tree. */
  readonly size: number;
  /** Returns the number of node levels from the root to the leaves (0 if empty). */
  readonly height: number;
  /** Returns true iff the tree contains no keys. */
  readonly isEmpty: boolean;
  /** Returns true if a key that compares equal to `key` is in the tree. */
  contains(key: K): boolean;
  /** Returns the stored key that compares equal to `key`, or undefined. */
  find(key: K): K | undefined;
  getMin(): K;
  getMax(): K;
  /** Returns a representative key of the root node. */
  getRoot(): K;
  preorder(): IterableIterator<K>;
  inOrder(): IterableIterator<K>;
  postOrder(): IterableIterator<K>;
  levelOrder(): IterableIterator<K>;
}

/** Write-only operations of a set of keys. */
export interface ITreeSink<K> {
  /** Adds a key, replacing an equal key if there is one.
   *  @returns true if the key was not already present. */
  add(key: K): boolean;
  /** Removes the key that compares equal to `key`.
   *  @returns the key that was removed, or undefined if none was found. */
  remove(key: K): K | undefined;
  /** Removes all keys. */
  clear(): void;
}

/** A balanced search tree of keys that can be modified. */
export interface ITree<K> extends ITreeSource<K>, ITreeSink<K> {}
