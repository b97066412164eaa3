/**
 * Tests for argument binding
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { bindArguments, spreadArguments } from "./bind.js";
import { declareSignature, introspect } from "./introspect.js";
import { MissingArgumentError, UnsupportedSignatureError } from "../errors.js";

const pair = (x: number, y = 10) => [x, y];
const triple = (a: number, b = 2, c = 3) => [a, b, c];

describe("Argument binding", () => {
  describe("bindArguments", () => {
    it("should keep positional arguments in order", () => {
      expect(bindArguments(introspect(pair), [1, 2], {})).to.deep.equal([
        1, 2,
      ]);
    });

    it("should materialize omitted defaults", () => {
      expect(bindArguments(introspect(pair), [1], {})).to.deep.equal([1, 10]);
    });

    it("should place named arguments in formal order", () => {
      expect(
        bindArguments(introspect(triple), [], { c: 30, a: 10 })
      ).to.deep.equal([10, 2, 30]);
    });

    it("should materialize a default for an explicit undefined", () => {
      expect(
        bindArguments(introspect(pair), [1], { y: undefined })
      ).to.deep.equal([1, 10]);
      expect(bindArguments(introspect(pair), [1, undefined], {})).to.deep.equal(
        [1, 10]
      );
    });

    it("should keep an explicit undefined for a required parameter", () => {
      expect(bindArguments(introspect(pair), [undefined], {})).to.deep.equal([
        undefined,
        10,
      ]);
    });

    it("should copy literal defaults on every bind", () => {
      const tagged = (name: string, tags = ["raw"]) => [name, tags];
      const signature = introspect(tagged);

      const first = bindArguments(signature, ["a"], {});
      const second = bindArguments(signature, ["b"], {});
      expect(first[1]).to.deep.equal(["raw"]);
      expect(second[1]).to.deep.equal(["raw"]);
      expect(first[1]).to.not.equal(second[1]);
    });

    it("should use declared default values as given", () => {
      const marker = { id: 1 };
      const handler = declareSignature((value: unknown) => value, {
        params: [{ name: "value", defaultValue: marker }],
      });

      const [bound] = bindArguments(introspect(handler), [], {});
      expect(bound).to.equal(marker);
    });

    it("should materialize opaque defaults as undefined", () => {
      const stamp = (label: string, at = Date.now()) => `${label}@${at}`;
      expect(bindArguments(introspect(stamp), ["x"], {})).to.deep.equal([
        "x",
        undefined,
      ]);
    });

    it("should keep surplus positional arguments", () => {
      const unary = (value: number) => value;
      expect(bindArguments(introspect(unary), [1, 2], {})).to.deep.equal([
        1, 2,
      ]);
    });

    it("should reject a missing required argument", () => {
      expect(() =>
        bindArguments(introspect(triple), [], { b: 1 }, "triple")
      ).to.throw(
        MissingArgumentError,
        "Missing value for required parameter 'a' of 'triple'"
      );
    });

    it("should reject variadic positional signatures", () => {
      const collect = (...items: number[]) => items;
      expect(() =>
        bindArguments(introspect(collect), [1], {}, "collect")
      ).to.throw(
        UnsupportedSignatureError,
        "Cannot bind arguments for 'collect' (...args): variadic signatures have no finite parameter list"
      );
    });

    it("should reject variadic named signatures", () => {
      const handler = declareSignature((source: unknown) => source, {
        params: ["source"],
        variadicNamed: true,
      });
      expect(() => bindArguments(introspect(handler), [1], {})).to.throw(
        UnsupportedSignatureError
      );
    });
  });

  describe("spreadArguments", () => {
    it("should leave omitted trailing defaults to the callee", () => {
      expect(spreadArguments(introspect(triple), [1], {})).to.deep.equal([1]);
    });

    it("should pad skipped defaults with undefined", () => {
      expect(
        spreadArguments(introspect(triple), [1], { c: 9 })
      ).to.deep.equal([1, undefined, 9]);
    });

    it("should let the callee apply its own defaults", () => {
      const args = spreadArguments(introspect(triple), [1], { c: 9 });
      expect(Reflect.apply(triple, undefined, args)).to.deep.equal([1, 2, 9]);
    });

    it("should pass extra positional arguments to a rest parameter", () => {
      const collect = (first: number, ...others: number[]) => [
        first,
        others,
      ];
      expect(
        spreadArguments(introspect(collect), [1, 2, 3], {})
      ).to.deep.equal([1, 2, 3]);
    });

    it("should collect unmatched named arguments for a named rest", () => {
      const handler = declareSignature(
        (a: unknown, b: unknown, extra: unknown) => [a, b, extra],
        { params: ["a", "b"], variadicNamed: true }
      );

      expect(
        spreadArguments(introspect(handler), [], { b: 2, z: 3 })
      ).to.deep.equal([undefined, 2, { z: 3 }]);
    });

    it("should pass an empty record when no named arguments are left", () => {
      const handler = declareSignature(
        (a: unknown, extra: unknown) => [a, extra],
        { params: ["a"], variadicNamed: true }
      );

      expect(spreadArguments(introspect(handler), [1], {})).to.deep.equal([
        1,
        {},
      ]);
    });
  });
});
