/**
 * Dispatch error classes
 *
 * Every failure raised by the dispatcher itself carries a Diagnostic.
 * Errors thrown by handlers or conditions are never wrapped in these.
 */

import {
  type Diagnostic,
  type DiagnosticCode,
  createDiagnostic,
  formatDiagnostic,
} from "./types/diagnostic.js";
import { type Signature, formatSignature } from "./signature/types.js";

export class DispatchError extends Error {
  readonly diagnostic: Diagnostic;

  constructor(diagnostic: Diagnostic) {
    super(diagnostic.message);
    this.name = "DispatchError";
    this.diagnostic = diagnostic;
  }

  get code(): DiagnosticCode {
    return this.diagnostic.code;
  }

  format(): string {
    return formatDiagnostic(this.diagnostic);
  }
}

export class IntrospectionError extends DispatchError {
  readonly callableName: string;
  readonly reason: string;

  constructor(callableName: string, reason: string) {
    super(
      createDiagnostic(
        "SIG1001",
        `Cannot determine the signature of '${callableName}': ${reason}`,
        callableName,
        "Attach an explicit descriptor with declareSignature()"
      )
    );
    this.name = "IntrospectionError";
    this.callableName = callableName;
    this.reason = reason;
  }
}

export class SignatureMismatchError extends DispatchError {
  readonly handlerSignature: Signature;
  readonly conditionSignature: Signature;

  constructor(
    handlerName: string,
    handlerSignature: Signature,
    conditionSignature: Signature
  ) {
    super(
      createDiagnostic(
        "SIG1002",
        `Signature of condition ${formatSignature(conditionSignature)} must match signature of handler '${handlerName}' ${formatSignature(handlerSignature)}`,
        handlerName
      )
    );
    this.name = "SignatureMismatchError";
    this.handlerSignature = handlerSignature;
    this.conditionSignature = conditionSignature;
  }
}

export class UnsupportedSignatureError extends DispatchError {
  constructor(callableName: string, signature: Signature) {
    super(
      createDiagnostic(
        "SIG2001",
        `Cannot bind arguments for '${callableName}' ${formatSignature(signature)}: variadic signatures have no finite parameter list`,
        callableName,
        "Drop the type constraints of variadic handlers"
      )
    );
    this.name = "UnsupportedSignatureError";
  }
}

export class MissingArgumentError extends DispatchError {
  readonly paramName: string;

  constructor(callableName: string, paramName: string) {
    super(
      createDiagnostic(
        "SIG2002",
        `Missing value for required parameter '${paramName}' of '${callableName}'`,
        callableName
      )
    );
    this.name = "MissingArgumentError";
    this.paramName = paramName;
  }
}

/**
 * Describe a call by its shape, e.g.
 * `2 positional arguments and named arguments [pattern]`
 */
export const describeCallShape = (
  positionalCount: number,
  namedKeys: readonly string[]
): string => {
  const positional = `${positionalCount} positional argument${positionalCount === 1 ? "" : "s"}`;
  return namedKeys.length === 0
    ? positional
    : `${positional} and named arguments [${namedKeys.join(", ")}]`;
};

export class NoMatchingSignatureError extends DispatchError {
  readonly positionalCount: number;
  readonly namedKeys: readonly string[];

  constructor(
    dispatchName: string,
    positionalCount: number,
    namedKeys: readonly string[]
  ) {
    super(
      createDiagnostic(
        "SIG3001",
        `No handler registered on '${dispatchName}' matches a call with ${describeCallShape(positionalCount, namedKeys)}`,
        dispatchName
      )
    );
    this.name = "NoMatchingSignatureError";
    this.positionalCount = positionalCount;
    this.namedKeys = namedKeys;
  }
}

export class NoSatisfiedConditionError extends DispatchError {
  readonly positionalCount: number;
  readonly namedKeys: readonly string[];

  constructor(
    dispatchName: string,
    positionalCount: number,
    namedKeys: readonly string[]
  ) {
    super(
      createDiagnostic(
        "SIG3002",
        `A call with ${describeCallShape(positionalCount, namedKeys)} on '${dispatchName}' did not satisfy the condition of any handler`,
        dispatchName
      )
    );
    this.name = "NoSatisfiedConditionError";
    this.positionalCount = positionalCount;
    this.namedKeys = namedKeys;
  }
}
