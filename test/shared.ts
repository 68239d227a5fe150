import BTree from '../btree';
import SortedArray from '../sorted-array';
import type { ITreeSink } from '../interfaces';
import type { BNode } from '../internal/nodes';
import MersenneTwister from 'mersenne-twister';

const rand = new MersenneTwister(1234);

export const compareNumbers = (a: number, b: number) => a - b;

export function randInt(max: number): number {
  return rand.random_int() % max;
}

export const randomInt = (rng: MersenneTwister, maxExclusive: number) =>
  Math.floor(rng.random() * maxExclusive);

export function expectTreeEqualTo<K>(tree: BTree<K>, list: SortedArray<K>): void {
  tree.checkValid();
  expect(tree.size).toBe(list.size);
  expect(tree.toArray()).toEqual(list.getArray());
}

export function addToBoth<K>(a: ITreeSink<K>, b: ITreeSink<K>, k: K): void {
  expect(a.add(k)).toEqual(b.add(k));
}

export function removeFromBoth<K>(a: ITreeSink<K>, b: ITreeSink<K>, k: K): void {
  expect(a.remove(k)).toEqual(b.remove(k));
}

/** Builds a tree by adding `keys` in the order given. */
export function treeOf(branchingFactor: number, keys: number[]): BTree<number> {
  const tree = new BTree<number>(branchingFactor, compareNumbers);
  for (const k of keys)
    tree.add(k);
  return tree;
}

/** Distinct keys spaced 1..spacing apart, optionally shuffled. */
export function makeArray(size: number, randomOrder: boolean, spacing = 10, rng?: MersenneTwister): number[] {
  const randomIntWithMax = (max: number) => rng === undefined ? randInt(max) : randomInt(rng, max);
  const keys: number[] = [];
  let current = 0;
  for (let i = 0; i < size; i++) {
    current += 1 + randomIntWithMax(spacing);
    keys[i] = current;
  }
  if (randomOrder) {
    for (let i = 0; i < size; i++)
      swap(keys, i, randomIntWithMax(size));
  }
  return keys;
}

/** The keys of each node, level by level (for asserting the exact shape of small trees). */
export function nodeKeys<K>(tree: BTree<K>): K[][][] {
  const root: BNode<K> | undefined = tree['_root'];
  const levels: K[][][] = [];
  let level = root === undefined ? [] : [root];
  while (level.length !== 0) {
    levels.push(level.map(node => node.keys.slice()));
    const next: BNode<K>[] = [];
    for (const node of level)
      if (node.isInternal())
        next.push(...node.children);
    level = next;
  }
  return levels;
}

function swap<T>(keys: T[], i: number, j: number) {
  const tmp = keys[i];
  keys[i] = keys[j];
  keys[j] = tmp;
}
