/**
 * Signature introspection
 *
 * A callable's signature comes from, in order of precedence:
 * 1. a descriptor attached with declareSignature()
 * 2. the binding recorded by bindReceiver() (target minus consumed params)
 * 3. its own source text, parsed with the TypeScript parser
 */

import * as ts from "typescript";
import { IntrospectionError } from "../errors.js";
import { evaluateLiteral } from "./literals.js";
import type {
  Callable,
  DefaultValue,
  Signature,
  SignatureDescriptor,
} from "./types.js";

type ReceiverBinding = {
  readonly target: Callable;
  readonly consumed: number;
};

const declaredSignatures = new WeakMap<Callable, Signature>();
const receiverBindings = new WeakMap<Callable, ReceiverBinding>();
// Source text of a function never changes, so reflection is done once
const reflectedSignatures = new WeakMap<Callable, Signature>();

const NATIVE_CODE = /\{\s*\[native code\]\s*\}\s*$/;
const CLASS_SOURCE = /^class\b/;

export const callableName = (fn: Callable): string =>
  fn.name === "" ? "<anonymous>" : fn.name;

const buildSignature = (
  name: string,
  params: readonly string[],
  defaults: ReadonlyMap<string, DefaultValue>,
  variadicPositional: boolean,
  variadicNamed: boolean
): Signature => {
  const seen = new Set<string>();
  for (const param of params) {
    if (seen.has(param)) {
      throw new IntrospectionError(name, `duplicate parameter '${param}'`);
    }
    seen.add(param);
  }
  return {
    params,
    defaulted: new Set(defaults.keys()),
    defaults,
    variadicPositional,
    variadicNamed,
  };
};

const fromDescriptor = (
  name: string,
  descriptor: SignatureDescriptor
): Signature => {
  const params: string[] = [];
  const defaults = new Map<string, DefaultValue>();
  for (const param of descriptor.params) {
    if (typeof param === "string") {
      params.push(param);
      continue;
    }
    params.push(param.name);
    if (Object.hasOwn(param, "defaultValue")) {
      defaults.set(param.name, { kind: "value", value: param.defaultValue });
    }
  }
  return buildSignature(
    name,
    params,
    defaults,
    descriptor.variadicPositional ?? false,
    descriptor.variadicNamed ?? false
  );
};

/**
 * Attach an explicit signature to a callable.
 * Declared signatures take precedence over reflection.
 */
export const declareSignature = <F extends Callable>(
  fn: F,
  descriptor: SignatureDescriptor
): F => {
  declaredSignatures.set(fn, fromDescriptor(callableName(fn), descriptor));
  return fn;
};

/**
 * Bind a callable to a receiver (its `this`) and optional leading
 * arguments. The returned callable introspects as the target with the
 * leading parameters removed.
 */
export const bindReceiver = <R>(
  fn: (...args: never) => R,
  receiver: unknown,
  ...leading: readonly unknown[]
): ((...args: unknown[]) => R) => {
  const bound = (...args: unknown[]): R =>
    Reflect.apply(fn, receiver, [...leading, ...args]);
  Object.defineProperty(bound, "name", { value: `bound ${callableName(fn)}` });
  receiverBindings.set(bound, { target: fn, consumed: leading.length });
  return bound;
};

const SOURCE_WRAPPERS: readonly ((source: string) => string)[] = [
  // function and arrow expressions
  (source) => `(${source});`,
  // method shorthand, accessors, generator and async methods
  (source) => `({${source}\n});`,
];

const findFunctionLike = (
  sourceFile: ts.SourceFile
): ts.SignatureDeclaration | undefined => {
  if (sourceFile.statements.length !== 1) return undefined;
  const [statement] = sourceFile.statements;
  if (!statement || !ts.isExpressionStatement(statement)) return undefined;

  let expression = statement.expression;
  while (ts.isParenthesizedExpression(expression)) {
    expression = expression.expression;
  }

  if (ts.isArrowFunction(expression) || ts.isFunctionExpression(expression)) {
    return expression;
  }

  if (
    ts.isObjectLiteralExpression(expression) &&
    expression.properties.length === 1
  ) {
    const [member] = expression.properties;
    if (
      member &&
      (ts.isMethodDeclaration(member) ||
        ts.isGetAccessorDeclaration(member) ||
        ts.isSetAccessorDeclaration(member))
    ) {
      return member;
    }
  }

  return undefined;
};

const parseSource = (
  source: string
):
  | {
      readonly node: ts.SignatureDeclaration;
      readonly sourceFile: ts.SourceFile;
    }
  | undefined => {
  for (const wrap of SOURCE_WRAPPERS) {
    const sourceFile = ts.createSourceFile(
      "callable.js",
      wrap(source),
      ts.ScriptTarget.Latest,
      true,
      ts.ScriptKind.JS
    );
    const node = findFunctionLike(sourceFile);
    if (node) {
      return { node, sourceFile };
    }
  }
  return undefined;
};

const reflect = (fn: Callable): Signature => {
  const name = callableName(fn);
  const source = Function.prototype.toString.call(fn);

  if (NATIVE_CODE.test(source)) {
    throw new IntrospectionError(name, "native or bound function");
  }
  if (CLASS_SOURCE.test(source)) {
    throw new IntrospectionError(name, "class constructors are not callable");
  }

  const parsed = parseSource(source);
  if (!parsed) {
    throw new IntrospectionError(name, "source text is not a function");
  }

  const params: string[] = [];
  const defaults = new Map<string, DefaultValue>();
  let variadicPositional = false;

  parsed.node.parameters.forEach((parameter, index) => {
    if (!ts.isIdentifier(parameter.name)) {
      throw new IntrospectionError(
        name,
        `parameter ${index + 1} is destructured and has no name`
      );
    }
    if (parameter.dotDotDotToken) {
      variadicPositional = true;
      return;
    }

    const paramName = parameter.name.text;
    params.push(paramName);

    if (parameter.initializer) {
      const literal = evaluateLiteral(parameter.initializer, parsed.sourceFile);
      defaults.set(
        paramName,
        literal.ok
          ? { kind: "literal", value: literal.value }
          : { kind: "opaque", text: literal.error }
      );
    }
  });

  return buildSignature(name, params, defaults, variadicPositional, false);
};

const stripLeading = (
  fn: Callable,
  binding: ReceiverBinding
): Signature => {
  const target = introspect(binding.target);
  if (
    binding.consumed > target.params.length &&
    !target.variadicPositional
  ) {
    throw new IntrospectionError(
      callableName(fn),
      `binds ${binding.consumed} arguments to a callable taking ${target.params.length}`
    );
  }

  const params = target.params.slice(binding.consumed);
  const defaults = new Map(
    [...target.defaults].filter(([param]) => params.includes(param))
  );
  return buildSignature(
    callableName(fn),
    params,
    defaults,
    target.variadicPositional,
    target.variadicNamed
  );
};

/**
 * Determine the formal signature of a callable.
 *
 * @throws IntrospectionError when no signature can be determined
 */
export const introspect = (fn: Callable): Signature => {
  const declared = declaredSignatures.get(fn);
  if (declared) return declared;

  const binding = receiverBindings.get(fn);
  if (binding) return stripLeading(fn, binding);

  const cached = reflectedSignatures.get(fn);
  if (cached) return cached;

  const signature = reflect(fn);
  reflectedSignatures.set(fn, signature);
  return signature;
};
