import type { BNode } from './nodes';

// The traversals below are lazy: each call to next() does a bounded amount
// of work on an explicit stack (or queue) instead of recursing. An iterator
// is valid only until the next edit to the tree it came from; after that it
// yields unspecified keys, but it does not throw.

/** Creates an IterableIterator from a next() function (or an empty one). */
export function iterator<T>(next: () => IteratorResult<T> = (() => ({ done: true, value: undefined }))): IterableIterator<T> {
  const result: IterableIterator<T> = {
    next,
    [Symbol.iterator]() { return this; }
  };
  return result;
}

type Frame<K> = { node: BNode<K>, index: number, descended: boolean };

function frame<K>(node: BNode<K>): Frame<K> {
  return { node, index: 0, descended: false };
}

// After an edit, a node on the stack may have lost keys and children, so
// a child index can be out of range; that child is skipped.
function pushChild<K>(stack: Frame<K>[], node: BNode<K>, i: number): void {
  if (node.isInternal() && i < node.children.length)
    stack.push(frame(node.children[i]));
}

/**
 * Visits key i of a node and then child i, for each key in turn; after the
 * last key, the final child.
 */
export function preorder<K>(root: BNode<K>): IterableIterator<K> {
  const stack: Frame<K>[] = [frame(root)];
  return iterator<K>(() => {
    for (;;) {
      const top = stack[stack.length - 1];
      if (top === undefined)
        return { done: true, value: undefined };
      const node = top.node, i = top.index++;
      if (i < node.keys.length) {
        pushChild(stack, node, i);
        return { done: false, value: node.keys[i] };
      }
      stack.pop();
      pushChild(stack, node, i);
    }
  });
}

/**
 * Visits child i of a node and then key i, for each key in turn; after the
 * last key, the final child. In a search tree this is ascending order.
 */
export function postorder<K>(root: BNode<K>): IterableIterator<K> {
  const stack: Frame<K>[] = [frame(root)];
  return iterator<K>(() => {
    for (;;) {
      const top = stack[stack.length - 1];
      if (top === undefined)
        return { done: true, value: undefined };
      const node = top.node;
      if (!top.descended) {
        top.descended = true;
        pushChild(stack, node, top.index);
        continue;
      }
      if (top.index < node.keys.length) {
        top.descended = false;
        return { done: false, value: node.keys[top.index++] };
      }
      stack.pop();
    }
  });
}

/** Breadth-first: all keys of a node, in order, then the next node in the queue. */
export function levelOrder<K>(root: BNode<K>): IterableIterator<K> {
  const queue: BNode<K>[] = [root];
  let head = 0, node: BNode<K> | undefined, i = 0;
  return iterator<K>(() => {
    while (node === undefined || i >= node.keys.length) {
      if (head >= queue.length)
        return { done: true, value: undefined };
      node = queue[head++];
      i = 0;
      if (node.isInternal())
        queue.push.apply(queue, node.children);
    }
    return { done: false, value: node.keys[i++] };
  });
}
