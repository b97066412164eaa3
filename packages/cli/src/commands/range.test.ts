/**
 * Tests for the range command
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  createMemoryEnvironment,
  createSourceRouter,
} from "@signet/sources";
import { rangeCommand } from "./range.js";

const router = createSourceRouter(
  { baseUrl: "http://archive.test/callisto", sortBy: "name" },
  createMemoryEnvironment([])
);

describe("range command", () => {
  it("should plan one directory per day", () => {
    expect(
      rangeCommand(router, ["2011-09-22 10:00", "2011-09-22 12:00"], "BIR")
    ).to.deep.equal({
      ok: true,
      value: {
        kind: "range",
        instrument: "BIR",
        start: "2011-09-22T10:00:00.000Z",
        end: "2011-09-22T12:00:00.000Z",
        directories: [
          {
            url: "http://archive.test/callisto/2011/09/22/",
            prefix: "BIR_20110922",
          },
        ],
      },
    });
  });

  it("should require exactly two times", () => {
    expect(rangeCommand(router, ["2011-09-22"], "BIR")).to.deep.equal({
      ok: false,
      error: "range requires <start> <end>",
    });
  });

  it("should require an instrument", () => {
    expect(
      rangeCommand(router, ["2011-09-22", "2011-09-23"], undefined)
    ).to.deep.equal({
      ok: false,
      error: "range requires an instrument (--instrument or signet.json)",
    });
  });

  it("should report a reversed range", () => {
    expect(
      rangeCommand(router, ["2011-09-23", "2011-09-22"], "BIR")
    ).to.deep.equal({
      ok: false,
      error:
        "A call with 3 positional arguments on 'sources' did not satisfy the condition of any handler",
    });
  });
});
