/**
 * Argument binding
 *
 * bindArguments produces the default-materialized positional list used by
 * type constraints. spreadArguments produces the argument list actually
 * passed to a handler or condition, leaving omitted defaults to the callee.
 */

import { MissingArgumentError, UnsupportedSignatureError } from "../errors.js";
import type { DefaultValue, NamedArguments, Signature } from "./types.js";

const materializeDefault = (defaultValue: DefaultValue): unknown => {
  switch (defaultValue.kind) {
    case "value":
      return defaultValue.value;
    case "literal":
      // Each call evaluates a literal initializer afresh
      return structuredClone(defaultValue.value);
    case "opaque":
      return undefined;
  }
};

/**
 * Turn positional and named arguments into one positional list, in formal
 * parameter order, with omitted or undefined defaults filled in.
 *
 * @throws UnsupportedSignatureError for variadic signatures
 * @throws MissingArgumentError when a required parameter has no value
 */
export const bindArguments = (
  signature: Signature,
  args: readonly unknown[],
  named: NamedArguments,
  callableName = "<callable>"
): unknown[] => {
  if (signature.variadicPositional || signature.variadicNamed) {
    throw new UnsupportedSignatureError(callableName, signature);
  }

  const bound: unknown[] = [];
  for (const [index, param] of signature.params.entries()) {
    const positional = index < args.length;
    const supplied = positional || Object.hasOwn(named, param);
    const value = positional ? args[index] : named[param];

    // An explicit undefined takes the default, as it does in a real call
    const defaultValue = signature.defaults.get(param);
    if (defaultValue && value === undefined) {
      bound.push(materializeDefault(defaultValue));
      continue;
    }
    if (!supplied) {
      throw new MissingArgumentError(callableName, param);
    }
    bound.push(value);
  }
  bound.push(...args.slice(signature.params.length));
  return bound;
};

/**
 * Arrange a call's arguments for a callable that only takes positional
 * arguments.
 *
 * Named values go to their formal slot. Unfilled slots before the last
 * filled one are undefined so the callee applies its own default; trailing
 * unfilled slots are dropped. A variadic-named callable receives the
 * unmatched named values as one record right after its formal slots,
 * followed by any extra positional arguments.
 */
export const spreadArguments = (
  signature: Signature,
  args: readonly unknown[],
  named: NamedArguments
): unknown[] => {
  const formalCount = signature.params.length;
  let filled = Math.min(args.length, formalCount);

  const slots = signature.params.map((param, index) => {
    if (index < args.length) return args[index];
    if (Object.hasOwn(named, param)) {
      filled = index + 1;
      return named[param];
    }
    return undefined;
  });

  const extraPositional = args.slice(formalCount);

  if (!signature.variadicNamed) {
    return [...slots.slice(0, filled), ...extraPositional];
  }

  const consumed = new Set(signature.params.slice(args.length));
  const extraNamed = Object.fromEntries(
    Object.entries(named).filter(([key]) => !consumed.has(key))
  );
  return [...slots, extraNamed, ...extraPositional];
};
