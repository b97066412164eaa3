/**
 * Tests for dispatch error classes
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  DispatchError,
  NoMatchingSignatureError,
  NoSatisfiedConditionError,
  SignatureMismatchError,
  describeCallShape,
} from "./errors.js";
import { introspect } from "./signature/introspect.js";

describe("Dispatch errors", () => {
  describe("describeCallShape", () => {
    it("should describe positional-only calls", () => {
      expect(describeCallShape(1, [])).to.equal("1 positional argument");
      expect(describeCallShape(0, [])).to.equal("0 positional arguments");
    });

    it("should list named keys", () => {
      expect(describeCallShape(2, ["pattern", "sort"])).to.equal(
        "2 positional arguments and named arguments [pattern, sort]"
      );
    });
  });

  it("should render the signatures of a mismatch", () => {
    const error = new SignatureMismatchError(
      "load",
      introspect((x: number, y = 1) => x + y),
      introspect((x: number) => x > 0)
    );

    expect(error).to.be.instanceOf(DispatchError);
    expect(error.name).to.equal("SignatureMismatchError");
    expect(error.message).to.equal(
      "Signature of condition (x) must match signature of handler 'load' (x, y?)"
    );
    expect(error.code).to.equal("SIG1002");
  });

  it("should keep the two invocation failures apart", () => {
    const none = new NoMatchingSignatureError("create", 3, []);
    const rejected = new NoSatisfiedConditionError("create", 1, ["pattern"]);

    expect(none.code).to.equal("SIG3001");
    expect(none.message).to.equal(
      "No handler registered on 'create' matches a call with 3 positional arguments"
    );
    expect(rejected.code).to.equal("SIG3002");
    expect(rejected.message).to.equal(
      "A call with 1 positional argument and named arguments [pattern] on 'create' did not satisfy the condition of any handler"
    );
    expect(rejected).to.not.be.instanceOf(NoMatchingSignatureError);
  });

  it("should format through the diagnostic", () => {
    const error = new NoMatchingSignatureError("create", 0, []);
    expect(error.format()).to.equal(
      "[create] SIG3001: No handler registered on 'create' matches a call with 0 positional arguments"
    );
  });
});
