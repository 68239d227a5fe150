/** @internal */
export function check(fact: boolean, ...args: unknown[]): asserts fact {
  if (!fact) {
    args.unshift('B-tree'); // at beginning of message
    throw new Error(args.join(' '));
  }
}
