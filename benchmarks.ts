import BTree from './btree';
import SortedArray from './sorted-array';
// Note: The `bintrees` package also includes a `BinTree` type which turned
// out to be an unbalanced binary tree. It is faster than `RBTree` for
// randomized data, but it becomes extremely slow when filled with sorted
// data, so it's not usually a good choice.
import { RBTree } from 'bintrees';

type Log = (...args: unknown[]) => void;

class Timer {
  start = Date.now();
  ms() { return Date.now() - this.start; }
  restart() { const ms = this.ms(); this.start += ms; return ms; }
}

function randInt(max: number) { return Math.random() * max | 0; }

function swap(keys: number[], i: number, j: number) {
  const tmp = keys[i];
  keys[i] = keys[j];
  keys[j] = tmp;
}

function makeArray(size: number, randomOrder: boolean, spacing = 10) {
  const keys: number[] = [];
  for (let i = 0, n = 0; i < size; i++, n += 1 + randInt(spacing))
    keys[i] = n;
  if (randomOrder)
    for (let i = 0; i < size; i++)
      swap(keys, i, randInt(size));
  return keys;
}

function measure<T = void>(message: (t: T) => string, callback: () => T, minMillisec = 600, log: Log = console.log) {
  const timer = new Timer();
  let counter = 0, ms: number, result: T;
  do {
    result = callback();
    counter++;
  } while ((ms = timer.ms()) < minMillisec);
  ms /= counter;
  log((Math.round(ms * 10) / 10) + "\t" + message(result));
  return result;
}

const compare = (a: number, b: number) => a - b;
const quiet: Log = () => {};

console.log("Benchmark results (milliseconds with integer keys)");
console.log("--------------------------------------------------");

console.log();
console.log("### Insertions at random locations: BTree vs the competition ###");

for (const size of [1000, 10000, 100000, 1000000]) {
  console.log();
  const keys = makeArray(size, true);

  measure(tree => `Insert ${tree.size} keys in BTree (M=5)`, () => {
    const tree = new BTree<number>();
    for (const k of keys)
      tree.add(k);
    return tree;
  });
  measure(tree => `Insert ${tree.size} keys in BTree (M=32) with custom comparator`, () => {
    const tree = new BTree<number>(32, compare);
    for (const k of keys)
      tree.add(k);
    return tree;
  });
  measure(set => `Insert ${set.size} keys in bintrees' RBTree`, () => {
    const set = new RBTree<number>(compare);
    for (const k of keys)
      set.insert(k);
    return set;
  });
  if (size <= 100000) {
    measure(list => `Insert ${list.size} keys in sorted array`, () => {
      const list = new SortedArray<number>(undefined, compare);
      for (const k of keys)
        list.add(k);
      return list;
    });
  } else {
    console.log(`SLOW!\tInsert ${size} keys in sorted array`);
  }
}

console.log();
console.log("### Insert in order, find, delete: BTree vs the competition ###");

for (const size of [9999, 1000, 10000, 100000, 1000000]) {
  const log = (size === 9999 ? quiet : console.log);
  log();
  const keys = makeArray(size, false);

  const tree = measure(tree => `Insert ${tree.size} sorted keys in BTree`, () => {
    const tree = new BTree<number>(5, compare);
    for (const k of keys)
      tree.add(k);
    return tree;
  }, 600, log);
  const rbTree = measure(set => `Insert ${set.size} sorted keys in bintrees' RBTree`, () => {
    const set = new RBTree<number>(compare);
    for (const k of keys)
      set.insert(k);
    return set;
  }, 600, log);

  measure(found => `Find ${found} keys in BTree`, () => {
    let found = 0;
    for (const k of keys)
      if (tree.contains(k))
        found++;
    return found;
  }, 600, log);
  measure(found => `Find ${found} keys in bintrees' RBTree`, () => {
    let found = 0;
    for (const k of keys)
      if (rbTree.find(k) !== null)
        found++;
    return found;
  }, 600, log);

  measure(sum => `Sum of all keys with keys() in BTree: ${sum}`, () => {
    let sum = 0;
    for (const k of tree.keys())
      sum += k;
    return sum;
  }, 600, log);
  measure(sum => `Sum of all keys with levelOrder() in BTree: ${sum}`, () => {
    let sum = 0;
    for (const k of tree.levelOrder())
      sum += k;
    return sum;
  }, 600, log);
  measure(sum => `Sum of all keys with each() in bintrees' RBTree: ${sum}`, () => {
    let sum = 0;
    rbTree.each(k => { sum += k; });
    return sum;
  }, 600, log);

  // Deletions can't be repeated, so they are timed once
  const timer = new Timer();
  for (let i = 0; i < keys.length; i += 2)
    tree.remove(keys[i]);
  log(`${timer.restart()}\tDelete every second key in BTree`);
  for (let i = 0; i < keys.length; i += 2)
    rbTree.remove(keys[i]);
  log(`${timer.restart()}\tDelete every second key in bintrees' RBTree`);
}

console.log();
console.log("### Measure effect of branching factor ###");
for (const M of [3, 4, 5, 8, 16, 32, 64, 128, 256]) {
  console.log();
  const keys = makeArray(100000, true);
  const timer = new Timer();
  for (let trial = 0; trial < 10; trial++) {
    const tree = new BTree<number>(M, compare);
    for (const k of keys)
      tree.add(k);
    if (trial === 9)
      console.log(`${timer.restart()}\tInsert ${tree.size} keys in BTree 10 times with branching factor ${M} (height ${tree.height})`);
  }
  const tree = new BTree<number>(M, compare);
  keys.forEach(k => tree.add(k));
  timer.restart();
  for (const k of keys)
    tree.remove(k);
  console.log(`${timer.restart()}\tRemove ${keys.length} keys from BTree with branching factor ${M}`);
}
