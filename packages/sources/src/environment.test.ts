/**
 * Tests for source environments
 */

import { describe, it, before, after } from "mocha";
import { expect } from "chai";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  createMemoryEnvironment,
  createNodeEnvironment,
} from "./environment.js";

describe("Source environments", () => {
  describe("createNodeEnvironment", () => {
    const env = createNodeEnvironment();
    let dir: string;

    before(() => {
      dir = mkdtempSync(join(tmpdir(), "signet-sources-"));
      writeFileSync(join(dir, "b.fit"), "");
      writeFileSync(join(dir, "a.fit"), "");
      writeFileSync(join(dir, "notes.txt"), "");
      mkdirSync(join(dir, "nested"));
    });

    after(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it("should tell files from directories", () => {
      expect(env.isFile(join(dir, "a.fit"))).to.equal(true);
      expect(env.isDirectory(join(dir, "a.fit"))).to.equal(false);
      expect(env.isDirectory(join(dir, "nested"))).to.equal(true);
      expect(env.isFile(join(dir, "nested"))).to.equal(false);
    });

    it("should report missing paths as neither", () => {
      expect(env.isFile(join(dir, "missing.fit"))).to.equal(false);
      expect(env.isDirectory(join(dir, "missing"))).to.equal(false);
    });

    it("should list directory entries", () => {
      expect([...env.listDirectory(dir)].sort()).to.deep.equal([
        "a.fit",
        "b.fit",
        "nested",
        "notes.txt",
      ]);
    });

    it("should expand globs to sorted files", () => {
      expect(env.expandGlob(join(dir, "*.fit"))).to.deep.equal([
        join(dir, "a.fit"),
        join(dir, "b.fit"),
      ]);
    });
  });

  describe("createMemoryEnvironment", () => {
    const env = createMemoryEnvironment([
      "root/one.fit",
      "root/deeper/two.fit",
      "other.fit",
    ]);

    it("should imply directories from file paths", () => {
      expect(env.isDirectory("root")).to.equal(true);
      expect(env.isDirectory("root/deeper")).to.equal(true);
      expect(env.isDirectory("root/one.fit")).to.equal(false);
      expect(env.isFile("other.fit")).to.equal(true);
    });

    it("should list direct children once", () => {
      expect(env.listDirectory("root")).to.deep.equal(["one.fit", "deeper"]);
    });

    it("should accept directories with a trailing slash", () => {
      expect(env.isDirectory("root/")).to.equal(true);
      expect(env.listDirectory("root/")).to.deep.equal(["one.fit", "deeper"]);
    });

    it("should match a star within one path segment", () => {
      expect(env.expandGlob("root/*.fit")).to.deep.equal(["root/one.fit"]);
      expect(env.expandGlob("*/*/*.fit")).to.deep.equal([
        "root/deeper/two.fit",
      ]);
    });
  });
});
