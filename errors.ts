/** Smallest branching factor for which a split leaves two non-empty halves. */
export const MinBranchingFactor = 3;

export const emptyTreeErrorMsg = 'tree is empty';
export const branchingFactorErrorMsg = `Branching factor must be an integer >= ${MinBranchingFactor}`;

/** Base class of the errors thrown by `BTree`, so both kinds can be caught at once. */
export class BTreeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BTreeError';
  }
}

/**
 * Thrown by operations that only make sense on a non-empty tree
 * (`find`, `getMin`, `getMax`, `getRoot` and the traversals).
 * The tree is left as it was.
 */
export class EmptyTreeError extends BTreeError {
  /** Name of the method that was called on the empty tree. */
  readonly operation: string;

  constructor(operation: string) {
    super(`${operation}(): ${emptyTreeErrorMsg}`);
    this.name = 'EmptyTreeError';
    this.operation = operation;
  }
}

/** Thrown by the `BTree` constructor when the requested branching factor is unusable. */
export class InvalidBranchingFactorError extends BTreeError {
  readonly branchingFactor: number;

  constructor(branchingFactor: number) {
    super(`${branchingFactorErrorMsg} (got ${branchingFactor})`);
    this.name = 'InvalidBranchingFactorError';
    this.branchingFactor = branchingFactor;
  }
}
