import BTree from '../btree';
import MersenneTwister from 'mersenne-twister';

describe('Stress test', () =>
{
  const count = 1000000;

  test(`adds and then removes ${count} pseudo-random integers`, () => {
    const rng = new MersenneTwister(4321);
    const keys: number[] = [];
    for (let i = 0; i < count; i++)
      keys.push(rng.random_int());

    const tree = new BTree<number>();
    let added = 0;
    for (const k of keys)
      if (tree.add(k))
        added++;
    expect(tree.size).toBe(added);
    expect(tree.height).toBeGreaterThan(1);
    tree.checkValid();

    // remove in a different order than they were added
    keys.reverse();
    let removed = 0;
    for (let i = 0; i < keys.length; i++) {
      if (tree.remove(keys[i]) !== undefined)
        removed++;
      if (i === keys.length >> 1)
        tree.checkValid();
    }
    expect(removed).toBe(added);
    expect(tree.size).toBe(0);
    expect(tree.height).toBe(0);
    expect(tree.isEmpty).toBe(true);
    tree.checkValid();
  }, 120000);
});
