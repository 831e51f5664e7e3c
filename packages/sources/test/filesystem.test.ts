import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import * as path from "node:path";
import type { Completer, Completion } from "@completers/core";
import { FsCompleter, FsCompletion, parentDirectory } from "../src/filesystem.js";

// =============================================================================
// Fixture
//
//   root/
//     b.txt
//     a/z.txt
//     a/.hidden
//     .git/config
//     c/d/e/f/g/deep.txt
// =============================================================================

let root: string;

beforeAll(async () => {
  root = await mkdtemp(path.join(tmpdir(), "completers-fs-"));
  await writeFile(path.join(root, "b.txt"), "");
  await mkdir(path.join(root, "a"));
  await writeFile(path.join(root, "a", "z.txt"), "");
  await writeFile(path.join(root, "a", ".hidden"), "");
  await mkdir(path.join(root, ".git"));
  await writeFile(path.join(root, ".git", "config"), "");
  await mkdir(path.join(root, "c", "d", "e", "f", "g"), { recursive: true });
  await writeFile(path.join(root, "c", "d", "e", "f", "g", "deep.txt"), "");
});

afterAll(async () => {
  await rm(root, { recursive: true, force: true });
});

async function drain(completer: Completer): Promise<Completion[]> {
  const all: Completion[] = [];
  while (!completer.fetchingFinished()) {
    all.push(...(await completer.fetchCompletions()));
  }
  return all;
}

function relative(completions: Completion[]): string[] {
  return completions.map((c) => path.relative(root, c.resultString()));
}

// =============================================================================
// Walk
// =============================================================================

describe("FsCompleter", () => {
  it("walks breadth-first, sorted per directory, skipping hidden entries", async () => {
    const completer = new FsCompleter(root);
    const found = await drain(completer);

    expect(relative(found)).toEqual([
      "a",
      "b.txt",
      "c",
      path.join("a", "z.txt"),
      path.join("c", "d"),
      path.join("c", "d", "e"),
      path.join("c", "d", "e", "f"),
      // g is listed but not entered: depth limit
      path.join("c", "d", "e", "f", "g"),
    ]);
  });

  it("marks directories", async () => {
    const found = await drain(new FsCompleter(root));
    const styles = found.slice(0, 3).map((c) => c.displayStyle);
    expect(styles).toEqual(["directory", "plain", "directory"]);
  });

  it("returns nothing more once the walk is done", async () => {
    const completer = new FsCompleter(root);
    await drain(completer);
    expect(await completer.fetchCompletions()).toEqual([]);
  });

  it("finishes empty for a missing directory", async () => {
    const completer = new FsCompleter(path.join(root, "missing"));
    expect(await drain(completer)).toEqual([]);
    expect(completer.fetchingFinished()).toBe(true);
  });

  it("stops walking when disposed", async () => {
    const completer = new FsCompleter(root);
    completer.dispose();
    expect(completer.fetchingFinished()).toBe(true);
    expect(await completer.fetchCompletions()).toEqual([]);
  });
});

// =============================================================================
// Navigation
// =============================================================================

describe("FsCompleter navigation", () => {
  it("descends into a directory entry", async () => {
    const completer = new FsCompleter(root);
    const child = completer.descend(new FsCompletion(path.join(root, "a"), "directory"));

    expect(child).toBeInstanceOf(FsCompleter);
    expect(child ? relative(await drain(child)) : []).toEqual([path.join("a", "z.txt")]);
    completer.dispose();
  });

  it("does not descend into files or foreign completions", () => {
    const completer = new FsCompleter(root);
    expect(completer.descend(new FsCompletion(path.join(root, "b.txt"), "file"))).toBeUndefined();
    expect(completer.descend({ resultString: () => path.join(root, "a") })).toBeUndefined();
    completer.dispose();
  });

  it("ascends to the parent directory", () => {
    const completer = new FsCompleter(path.join(root, "a"));
    const parent = completer.ascend();

    expect(parent instanceof FsCompleter && parent.directory).toBe(root);
    completer.dispose();
    parent?.dispose?.();
  });
});

describe("parentDirectory", () => {
  const cwd = "/home/user/project";

  it("keeps relative spellings relative", () => {
    expect(parentDirectory(".", cwd)).toBe("..");
    expect(parentDirectory("..", cwd)).toBe(path.join("..", ".."));
    expect(parentDirectory("src", cwd)).toBe(".");
  });

  it("spells the root as the root", () => {
    expect(parentDirectory(path.join("..", ".."), cwd)).toBe("/");
    expect(parentDirectory("/home", cwd)).toBe("/");
  });

  it("takes the dirname of absolute paths", () => {
    expect(parentDirectory("/home/user", cwd)).toBe("/home");
  });

  it("has nothing above the root", () => {
    expect(parentDirectory("/", cwd)).toBeUndefined();
  });
});
