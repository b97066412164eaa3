/**
 * Tests for signature compatibility
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { matchesSignature } from "./match.js";
import { declareSignature, introspect } from "./introspect.js";

const required = introspect((x: number, y: number) => [x, y]);
const trailingDefault = introspect((x: number, y = 10) => [x, y]);
const rest = introspect((x: number, ...others: number[]) => [x, others]);
const namedRest = introspect(
  declareSignature((x: unknown, options: unknown) => [x, options], {
    params: ["x"],
    variadicNamed: true,
  })
);

describe("Signature matching", () => {
  it("should accept an exact positional call", () => {
    expect(matchesSignature(required, 2, [])).to.equal(true);
  });

  it("should reject too many positional arguments", () => {
    expect(matchesSignature(required, 3, [])).to.equal(false);
  });

  it("should accept surplus positional arguments with a rest parameter", () => {
    expect(matchesSignature(rest, 5, [])).to.equal(true);
  });

  it("should reject fewer required arguments than declared", () => {
    expect(matchesSignature(required, 1, [])).to.equal(false);
  });

  it("should accept a missing required argument supplied by name", () => {
    expect(matchesSignature(required, 1, ["y"])).to.equal(true);
    expect(matchesSignature(required, 0, ["y", "x"])).to.equal(true);
  });

  it("should accept omitting a defaulted parameter", () => {
    expect(matchesSignature(trailingDefault, 1, [])).to.equal(true);
    expect(matchesSignature(trailingDefault, 0, ["x"])).to.equal(true);
  });

  it("should reject unknown named arguments", () => {
    expect(matchesSignature(trailingDefault, 1, ["z"])).to.equal(false);
  });

  it("should reject a named argument already supplied positionally", () => {
    expect(matchesSignature(trailingDefault, 1, ["x"])).to.equal(false);
  });

  it("should accept unknown named arguments with a named rest", () => {
    expect(matchesSignature(namedRest, 1, ["z", "w"])).to.equal(true);
  });

  it("should still require formal parameters with a named rest", () => {
    expect(matchesSignature(namedRest, 0, ["z"])).to.equal(false);
  });

  it("should accept a call with no arguments when all parameters are defaulted", () => {
    const allDefaults = introspect((a = 1, b = 2) => a + b);
    expect(matchesSignature(allDefaults, 0, [])).to.equal(true);
  });
});
