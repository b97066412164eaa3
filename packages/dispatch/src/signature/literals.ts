/**
 * Evaluation of literal default-parameter initializers.
 *
 * Only expressions whose value is fully determined by their text are
 * evaluated; anything that would need the callable's scope is reported as
 * an error so the caller can record the default as opaque.
 */

import * as ts from "typescript";
import { type Result, ok, error } from "../types/result.js";

const IDENTIFIER_VALUES: ReadonlyMap<string, unknown> = new Map<
  string,
  unknown
>([
  ["undefined", undefined],
  ["NaN", Number.NaN],
  ["Infinity", Number.POSITIVE_INFINITY],
]);

const propertyKey = (name: ts.PropertyName): string | undefined =>
  ts.isIdentifier(name) || ts.isStringLiteral(name) || ts.isNumericLiteral(name)
    ? name.text
    : undefined;

const evaluateArray = (
  node: ts.ArrayLiteralExpression,
  sourceFile: ts.SourceFile
): Result<unknown, string> => {
  const values: unknown[] = [];
  for (const element of node.elements) {
    const value = evaluateLiteral(element, sourceFile);
    if (!value.ok) return value;
    values.push(value.value);
  }
  return ok(values);
};

const evaluateObject = (
  node: ts.ObjectLiteralExpression,
  sourceFile: ts.SourceFile
): Result<unknown, string> => {
  const record: Record<string, unknown> = {};
  for (const property of node.properties) {
    if (!ts.isPropertyAssignment(property)) {
      return error(property.getText(sourceFile));
    }
    const key = propertyKey(property.name);
    if (key === undefined) {
      return error(property.getText(sourceFile));
    }
    const value = evaluateLiteral(property.initializer, sourceFile);
    if (!value.ok) return value;
    record[key] = value.value;
  }
  return ok(record);
};

/**
 * Evaluate a literal initializer.
 * The error side carries the initializer's source text.
 */
export const evaluateLiteral = (
  node: ts.Expression,
  sourceFile: ts.SourceFile
): Result<unknown, string> => {
  if (ts.isParenthesizedExpression(node)) {
    return evaluateLiteral(node.expression, sourceFile);
  }
  if (ts.isNumericLiteral(node)) {
    return ok(Number(node.text));
  }
  if (ts.isBigIntLiteral(node)) {
    return ok(BigInt(node.text.slice(0, -1)));
  }
  if (ts.isStringLiteral(node) || ts.isNoSubstitutionTemplateLiteral(node)) {
    return ok(node.text);
  }

  switch (node.kind) {
    case ts.SyntaxKind.TrueKeyword:
      return ok(true);
    case ts.SyntaxKind.FalseKeyword:
      return ok(false);
    case ts.SyntaxKind.NullKeyword:
      return ok(null);
  }

  if (ts.isIdentifier(node) && IDENTIFIER_VALUES.has(node.text)) {
    return ok(IDENTIFIER_VALUES.get(node.text));
  }

  if (
    ts.isPrefixUnaryExpression(node) &&
    (node.operator === ts.SyntaxKind.MinusToken ||
      node.operator === ts.SyntaxKind.PlusToken)
  ) {
    const operand = evaluateLiteral(node.operand, sourceFile);
    if (operand.ok && typeof operand.value === "number") {
      return ok(
        node.operator === ts.SyntaxKind.MinusToken
          ? -operand.value
          : operand.value
      );
    }
    return error(node.getText(sourceFile));
  }

  if (ts.isArrayLiteralExpression(node)) {
    return evaluateArray(node, sourceFile);
  }
  if (ts.isObjectLiteralExpression(node)) {
    return evaluateObject(node, sourceFile);
  }

  return error(node.getText(sourceFile));
};
