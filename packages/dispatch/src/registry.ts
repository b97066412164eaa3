/**
 * Conditional dispatch registry
 *
 * Routes one call to the first registered handler whose signature accepts
 * the call shape, whose type constraints accept the bound arguments, and
 * whose condition holds. Unconditioned handlers act as the else branch for
 * their signature and are only considered after every conditioned one.
 */

import {
  type DispatchError,
  NoMatchingSignatureError,
  NoSatisfiedConditionError,
  SignatureMismatchError,
} from "./errors.js";
import { type TypeConstraint, matchesTypes } from "./constraints.js";
import {
  type Callable,
  type NamedArguments,
  type Signature,
  bindArguments,
  callableName,
  introspect,
  matchesSignature,
  sameSignature,
  spreadArguments,
} from "./signature/index.js";
import { type Result, ok, error, map, unwrapOrThrow } from "./types/result.js";

export type Handler<R> = (...args: never) => R;

/** Conditions are evaluated for truthiness */
export type Condition = Callable;

type EntryBase<R> = {
  readonly handler: Handler<R>;
  readonly signature: Signature;
  readonly types: readonly TypeConstraint[] | undefined;
};

export type ConditionedEntry<R> = EntryBase<R> & {
  readonly kind: "conditioned";
  readonly condition: Condition;
};

export type UnconditionedEntry<R> = EntryBase<R> & {
  readonly kind: "unconditioned";
};

export type RegistryEntry<R> = ConditionedEntry<R> | UnconditionedEntry<R>;

export type Selection<R> = {
  readonly entry: RegistryEntry<R>;
  /** Position within the entry's own list (conditioned or unconditioned) */
  readonly index: number;
};

export type DispatchTraceEvent = {
  readonly outcome:
    | "signature-rejected"
    | "types-rejected"
    | "condition-rejected"
    | "selected";
  readonly dispatch: string;
  readonly handler: string;
  readonly kind: RegistryEntry<unknown>["kind"];
  readonly index: number;
};

export type DispatchOptions = {
  /** Name used in error messages and trace events */
  readonly name?: string;
  readonly trace?: (event: DispatchTraceEvent) => void;
};

const callWith = (
  fn: Callable,
  signature: Signature,
  args: readonly unknown[],
  named: NamedArguments
): unknown => Reflect.apply(fn, undefined, spreadArguments(signature, args, named));

export class ConditionalDispatch<R> {
  readonly name: string;
  private readonly trace: ((event: DispatchTraceEvent) => void) | undefined;
  private readonly conditioned: ConditionedEntry<R>[] = [];
  private readonly unconditioned: UnconditionedEntry<R>[] = [];

  constructor(options: DispatchOptions = {}) {
    this.name = options.name ?? "dispatch";
    this.trace = options.trace;
  }

  /**
   * Add a handler. Without a condition it runs for every call matching its
   * signature (and types) that no conditioned handler took. A condition
   * must declare exactly the handler's parameters.
   *
   * @throws IntrospectionError when either signature cannot be determined
   * @throws SignatureMismatchError when the condition's signature differs
   */
  register<A extends unknown[]>(
    handler: (...args: A) => R,
    condition?: (...args: NoInfer<A>) => unknown,
    types?: readonly TypeConstraint[]
  ): void {
    const signature = introspect(handler);

    if (condition === undefined) {
      this.unconditioned.push({
        kind: "unconditioned",
        handler,
        signature,
        types,
      });
      return;
    }

    const conditionSignature = introspect(condition);
    if (!sameSignature(signature, conditionSignature)) {
      throw new SignatureMismatchError(
        callableName(handler),
        signature,
        conditionSignature
      );
    }

    this.conditioned.push({
      kind: "conditioned",
      handler,
      condition,
      signature,
      types,
    });
  }

  /**
   * Decorator form of register(): registers the handler under `condition`
   * and returns it unchanged.
   */
  registerDecorator<A extends unknown[]>(
    condition: (...args: A) => unknown
  ): <F extends (...args: A) => R>(handler: F) => F {
    return (handler) => {
      this.register(handler, condition);
      return handler;
    };
  }

  /** Alias of registerDecorator() */
  when<A extends unknown[]>(
    condition: (...args: A) => unknown
  ): <F extends (...args: A) => R>(handler: F) => F {
    return this.registerDecorator(condition);
  }

  get size(): number {
    return this.conditioned.length + this.unconditioned.length;
  }

  /** Entries in the order they are considered */
  entries(): readonly RegistryEntry<R>[] {
    return [...this.conditioned, ...this.unconditioned];
  }

  /**
   * Select the handler for a call without running it.
   * Conditions are evaluated; errors they throw propagate.
   */
  resolve(
    args: readonly unknown[],
    named: NamedArguments = {}
  ): Result<Selection<R>, DispatchError> {
    const namedKeys = Object.keys(named);
    let anySignatureMatched = false;

    for (const [index, entry] of this.conditioned.entries()) {
      if (!this.passesGates(entry, index, args, named, namedKeys)) continue;
      anySignatureMatched = true;

      if (!callWith(entry.condition, entry.signature, args, named)) {
        this.emit("condition-rejected", entry, index);
        continue;
      }

      this.emit("selected", entry, index);
      return ok({ entry, index });
    }

    for (const [index, entry] of this.unconditioned.entries()) {
      if (!this.passesGates(entry, index, args, named, namedKeys)) continue;
      this.emit("selected", entry, index);
      return ok({ entry, index });
    }

    return error(
      anySignatureMatched
        ? new NoSatisfiedConditionError(this.name, args.length, namedKeys)
        : new NoMatchingSignatureError(this.name, args.length, namedKeys)
    );
  }

  /**
   * Run the selected handler with the call's original arguments and return
   * its result. Handler errors propagate unchanged.
   *
   * @throws NoMatchingSignatureError when no entry accepts the call shape
   * @throws NoSatisfiedConditionError when shapes match but no condition holds
   */
  invoke(args: readonly unknown[], named: NamedArguments = {}): R {
    return unwrapOrThrow(this.tryInvoke(args, named));
  }

  /**
   * Like invoke(), but a call no handler accepts is returned as an error
   * instead of thrown. Handler errors still propagate.
   */
  tryInvoke(
    args: readonly unknown[],
    named: NamedArguments = {}
  ): Result<R, DispatchError> {
    return map(this.resolve(args, named), ({ entry }): R =>
      Reflect.apply(
        entry.handler,
        undefined,
        spreadArguments(entry.signature, args, named)
      )
    );
  }

  /** Positional-only call */
  call(...args: unknown[]): R {
    return this.invoke(args);
  }

  /** A plain function forwarding positional calls to this registry */
  toFunction(): (...args: unknown[]) => R {
    return (...args) => this.invoke(args);
  }

  private passesGates(
    entry: RegistryEntry<R>,
    index: number,
    args: readonly unknown[],
    named: NamedArguments,
    namedKeys: readonly string[]
  ): boolean {
    if (!matchesSignature(entry.signature, args.length, namedKeys)) {
      this.emit("signature-rejected", entry, index);
      return false;
    }
    if (
      entry.types !== undefined &&
      !matchesTypes(
        bindArguments(
          entry.signature,
          args,
          named,
          callableName(entry.handler)
        ),
        entry.types
      )
    ) {
      this.emit("types-rejected", entry, index);
      return false;
    }
    return true;
  }

  private emit(
    outcome: DispatchTraceEvent["outcome"],
    entry: RegistryEntry<R>,
    index: number
  ): void {
    this.trace?.({
      outcome,
      dispatch: this.name,
      handler: callableName(entry.handler),
      kind: entry.kind,
      index,
    });
  }
}
