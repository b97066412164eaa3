/**
 * Source environments
 */

import { readdirSync, statSync } from "node:fs";
import { posix } from "node:path";
import { globSync } from "glob";
import type { SourceEnvironment } from "./types.js";

const stat = (path: string) => statSync(path, { throwIfNoEntry: false });

/**
 * Environment backed by the local file system
 */
export const createNodeEnvironment = (): SourceEnvironment => ({
  isFile: (path) => stat(path)?.isFile() ?? false,
  isDirectory: (path) => stat(path)?.isDirectory() ?? false,
  listDirectory: (path) => readdirSync(path),
  expandGlob: (pattern) => globSync(pattern, { nodir: true }).sort(),
});

const trimTrailingSlashes = (path: string): string =>
  path.length > 1 ? path.replace(/\/+$/, "") : path;

const escapeRegExp = (text: string): string =>
  text.replace(/[.+?^${}()|[\]\\]/g, "\\$&");

const globToRegExp = (pattern: string): RegExp =>
  new RegExp(
    `^${pattern
      .split("*")
      .map(escapeRegExp)
      .join("[^/]*")}$`
  );

/**
 * Environment over a fixed list of POSIX file paths, for dry runs and
 * tests. Directories are implied by the file paths; globs support `*`
 * within one path segment.
 */
export const createMemoryEnvironment = (
  files: readonly string[]
): SourceEnvironment => {
  const fileSet = new Set(files);
  const directories = new Set(
    files.flatMap((file) => {
      const parents: string[] = [];
      for (
        let dir = posix.dirname(file);
        dir !== "." && dir !== "/";
        dir = posix.dirname(dir)
      ) {
        parents.push(dir);
      }
      return parents;
    })
  );

  return {
    isFile: (path) => fileSet.has(path),
    isDirectory: (path) => directories.has(trimTrailingSlashes(path)),
    listDirectory: (path) => {
      const dir = trimTrailingSlashes(path);
      const names = new Set<string>();
      for (const file of files) {
        if (!file.startsWith(`${dir}/`)) continue;
        const [name] = file.slice(dir.length + 1).split("/");
        if (name) names.add(name);
      }
      return [...names];
    },
    expandGlob: (pattern) => {
      const matcher = globToRegExp(pattern);
      return files.filter((file) => matcher.test(file)).sort();
    },
  };
};
