/**
 * Signature model shared by the introspector, binder and matcher
 */

/**
 * Anything that can be registered as a handler or condition.
 *
 * Parameters are typed `never` so that a function with any parameter list
 * is assignable; arguments are only ever delivered through
 * `spreadArguments`.
 */
export type Callable = (...args: never) => unknown;

/** Named arguments of a call, keyed by formal parameter name */
export type NamedArguments = Readonly<Record<string, unknown>>;

/**
 * How a defaulted parameter materializes when the binder fills it in.
 *
 * - value: supplied by a declared descriptor, used as is
 * - literal: a literal initializer read from source, copied per bind
 * - opaque: an initializer that cannot be evaluated outside the callable
 */
export type DefaultValue =
  | { readonly kind: "value"; readonly value: unknown }
  | { readonly kind: "literal"; readonly value: unknown }
  | { readonly kind: "opaque"; readonly text: string };

export type Signature = {
  /** Formal parameter names in declaration order (rest parameters excluded) */
  readonly params: readonly string[];
  readonly defaulted: ReadonlySet<string>;
  readonly defaults: ReadonlyMap<string, DefaultValue>;
  readonly variadicPositional: boolean;
  readonly variadicNamed: boolean;
};

/**
 * Parameter entry of a declared descriptor.
 * A parameter is defaulted when `defaultValue` is present, even if undefined.
 */
export type ParamDescriptor = {
  readonly name: string;
  readonly defaultValue?: unknown;
};

export type SignatureDescriptor = {
  readonly params: readonly (string | ParamDescriptor)[];
  readonly variadicPositional?: boolean;
  readonly variadicNamed?: boolean;
};

const sameSet = (a: ReadonlySet<string>, b: ReadonlySet<string>): boolean =>
  a.size === b.size && [...a].every((name) => b.has(name));

/**
 * Structural equality of the parts that decide dispatch:
 * names and order, defaulted set, variadic flags.
 * Default values themselves are not compared.
 */
export const sameSignature = (a: Signature, b: Signature): boolean =>
  a.params.length === b.params.length &&
  a.params.every((name, index) => b.params[index] === name) &&
  sameSet(a.defaulted, b.defaulted) &&
  a.variadicPositional === b.variadicPositional &&
  a.variadicNamed === b.variadicNamed;

/**
 * Render a signature for messages, e.g. `(x, y?, ...args)`
 */
export const formatSignature = (signature: Signature): string => {
  const parts = signature.params.map((name) =>
    signature.defaulted.has(name) ? `${name}?` : name
  );
  if (signature.variadicPositional) {
    parts.push("...args");
  }
  if (signature.variadicNamed) {
    parts.push("...named");
  }
  return `(${parts.join(", ")})`;
};
