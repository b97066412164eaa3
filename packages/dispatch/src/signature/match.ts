/**
 * Signature compatibility
 */

import type { Signature } from "./types.js";

/**
 * Whether a callable with this signature can be called with
 * `positionalCount` positional arguments and the given named keys.
 */
export const matchesSignature = (
  signature: Signature,
  positionalCount: number,
  namedKeys: Iterable<string>
): boolean => {
  if (
    positionalCount > signature.params.length &&
    !signature.variadicPositional
  ) {
    return false;
  }

  const remaining = new Set(signature.params.slice(positionalCount));
  const supplied = new Set(namedKeys);

  // Unexpected names are only allowed with a named rest
  if (!signature.variadicNamed) {
    for (const key of supplied) {
      if (!remaining.has(key)) return false;
    }
  }

  for (const param of remaining) {
    if (!supplied.has(param) && !signature.defaulted.has(param)) {
      return false;
    }
  }

  return true;
};
