/**
 * Type constraints
 *
 * A constraint is either a constructor, checked nominally, or a capability
 * predicate, checked structurally.
 */

export type Constructor = abstract new (...args: never[]) => unknown;

export type Capability = {
  readonly kind: "capability";
  readonly name: string;
  readonly test: (value: unknown) => boolean;
};

export type TypeConstraint = Constructor | Capability;

/**
 * Create a structural constraint from a predicate
 */
export const capability = (
  name: string,
  test: (value: unknown) => boolean
): Capability => ({ kind: "capability", name, test });

const isCapability = (constraint: TypeConstraint): constraint is Capability =>
  typeof constraint !== "function";

// Wrapper constructors also accept their primitive values
const PRIMITIVE_TYPES: ReadonlyMap<Constructor, string> = new Map<
  Constructor,
  string
>([
  [String, "string"],
  [Number, "number"],
  [Boolean, "boolean"],
  [Function, "function"],
]);

export const satisfies = (
  value: unknown,
  constraint: TypeConstraint
): boolean => {
  if (isCapability(constraint)) {
    return constraint.test(value);
  }
  if (constraint === Object) {
    return true;
  }
  if (constraint === Array) {
    return Array.isArray(value);
  }
  const primitive = PRIMITIVE_TYPES.get(constraint);
  if (primitive !== undefined && typeof value === primitive) {
    return true;
  }
  return value instanceof constraint;
};

/**
 * Check bound arguments positionally against a (possibly shorter) list of
 * constraints. Arguments past the last constraint are unchecked.
 */
export const matchesTypes = (
  bound: readonly unknown[],
  constraints: readonly TypeConstraint[]
): boolean =>
  constraints
    .slice(0, bound.length)
    .every((constraint, index) => satisfies(bound[index], constraint));

export const describeConstraint = (constraint: TypeConstraint): string => {
  if (isCapability(constraint)) {
    return constraint.name;
  }
  return constraint.name === "" ? "<anonymous class>" : constraint.name;
};

// Common capabilities

export const iterable = capability(
  "iterable",
  (value) =>
    value !== null &&
    value !== undefined &&
    typeof Object(value)[Symbol.iterator] === "function"
);

export const bigint = capability(
  "bigint",
  (value) => typeof value === "bigint"
);

export const symbol = capability(
  "symbol",
  (value) => typeof value === "symbol"
);
