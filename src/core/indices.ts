/**
 * Position helpers shared by vectors and matrices.
 *
 * An index of `null` means "every position of the backing storage, in order".
 */

export type Index = Int32Array | null;

export function identityIndex(length: number): Int32Array {
  const out = new Int32Array(length);
  for (let i = 0; i < length; i++) out[i] = i;
  return out;
}

/**
 * Maps `selection` (positions relative to a view) onto positions of the
 * backing storage.
 */
export function composeIndex(base: Index, selection: Index): Index {
  if (selection === null) return base;
  if (base === null) return selection;
  const out = new Int32Array(selection.length);
  for (let i = 0; i < selection.length; i++) {
    out[i] = base[selection[i]];
  }
  return out;
}

/**
 * Resolves an index to concrete positions.
 */
export function materializeIndex(index: Index, length: number): Int32Array {
  return index === null ? identityIndex(length) : index;
}

export function indicesEqual(a: ArrayLike<number>, b: ArrayLike<number>): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}
