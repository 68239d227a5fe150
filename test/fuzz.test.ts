import BTree from '../btree';
import SortedArray from '../sorted-array';
import MersenneTwister from 'mersenne-twister';
import {
  addToBoth, compareNumbers, expectTreeEqualTo, makeArray, nodeKeys, randomInt, removeFromBoth
} from './shared';

describe('B-tree fuzz tests against a sorted array', () =>
{
  const rng = new MersenneTwister(1234);
  const branchingFactors = [3, 4, 5, 6, 7, 8, 16];
  const sizes = [5, 50, 500];

  for (const m of branchingFactors) {
    describe(`branching factor ${m}`, () => {
      for (const size of sizes) {
        test(`${size} random adds and removes`, () => {
          const tree = new BTree<number>(m, compareNumbers);
          const list = new SortedArray<number>(undefined, compareNumbers);
          const range = size * 2;
          for (let i = 0; i < size * 4; i++) {
            const k = randomInt(rng, range);
            if (randomInt(rng, 3) === 0)
              removeFromBoth(tree, list, k);
            else
              addToBoth(tree, list, k);
            if (i % 32 === 0)
              expectTreeEqualTo(tree, list);
          }
          expectTreeEqualTo(tree, list);
          if (list.size > 0) {
            expect(tree.getMin()).toBe(list.minKey());
            expect(tree.getMax()).toBe(list.maxKey());
          }
        });

        test(`${size} keys added, then removed in random order`, () => {
          const keys = makeArray(size, true, 10, rng);
          const tree = new BTree<number>(m, compareNumbers);
          for (const k of keys)
            expect(tree.add(k)).toBe(true);
          expect(tree.size).toBe(size);
          tree.checkValid();
          // the height never exceeds the bound for the minimum fill
          expect(tree.height).toBeLessThanOrEqual(
            1 + Math.floor(1e-9 + Math.log((size + 1) / 2) / Math.log(Math.ceil(m / 2))));

          for (let i = 0; i < keys.length; i++) {
            const j = i + randomInt(rng, keys.length - i);
            [keys[i], keys[j]] = [keys[j], keys[i]];
            expect(tree.remove(keys[i])).toBe(keys[i]);
            expect(tree.contains(keys[i])).toBe(false);
            if (i % 16 === 0)
              tree.checkValid();
          }
          expect(tree.isEmpty).toBe(true);
          expect(tree.height).toBe(0);
          tree.checkValid();
        });
      }

      test('every key is found, and nothing else is', () => {
        const keys = makeArray(300, true, 10, rng);
        const tree = new BTree<number>(m, compareNumbers);
        keys.forEach(k => tree.add(k));
        const present = new Set(keys);
        const max = Math.max(...keys);
        for (let k = 0; k <= max + 1; k++) {
          expect(tree.contains(k)).toBe(present.has(k));
          expect(tree.find(k)).toBe(present.has(k) ? k : undefined);
        }
      });

      test('traversals visit every key once', () => {
        const keys = makeArray(200, true, 3, rng);
        const tree = new BTree<number>(m, compareNumbers);
        keys.forEach(k => tree.add(k));
        const sorted = keys.slice().sort(compareNumbers);
        expect([...tree.postOrder()]).toEqual(sorted);
        expect([...tree.preorder()].sort(compareNumbers)).toEqual(sorted);
        expect([...tree.levelOrder()].sort(compareNumbers)).toEqual(sorted);
        expect(tree.toArray()).toEqual(sorted);
      });

      test('copies of trees thinned by removals keep their height', () => {
        for (let trial = 0; trial < 40; trial++) {
          const tree = new BTree<number>(m, compareNumbers);
          const keys = makeArray(20 + randomInt(rng, 200), true, 5, rng);
          keys.forEach(k => tree.add(k));
          for (const k of keys)
            if (randomInt(rng, 3) !== 0)
              tree.remove(k);
          const copy = new BTree<number>(tree);
          copy.checkValid();
          expect(copy.height).toBe(tree.height);
          expect(copy.size).toBe(tree.size);
          expect(nodeKeys(copy)).toEqual(nodeKeys(tree));
          expect(copy.equals(tree)).toBe(true);
        }
      });

      test('a copy holds the same keys and is independent', () => {
        const tree = new BTree<number>(m, compareNumbers);
        makeArray(150, true, 5, rng).forEach(k => tree.add(k));
        const copy = new BTree<number>(tree);
        copy.checkValid();
        expect(copy.toArray()).toEqual(tree.toArray());
        expect(copy.size).toBe(tree.size);
        const first = copy.getMin();
        copy.remove(first);
        expect(tree.contains(first)).toBe(true);
        expect(copy.size).toBe(tree.size - 1);
      });
    });
  }
});
