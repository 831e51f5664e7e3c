import { describe, it, expect } from "vitest";
import { FsCompleter, GitBranchCompleter } from "@completers/sources";
import { getCompleters } from "../src/completers.js";

describe("getCompleters", () => {
  it("walks the working directory for a relative query, then lists refs", () => {
    const completers = getCompleters("src/ma");
    try {
      expect(completers.map((c) => c.name())).toEqual(["fs", "br"]);
      const [fs, br] = completers;
      expect(fs instanceof FsCompleter && fs.directory).toBe(".");
      expect(br).toBeInstanceOf(GitBranchCompleter);
    } finally {
      for (const c of completers) c.dispose?.();
    }
  });

  it("walks from an absolute query", () => {
    const completers = getCompleters("/etc");
    try {
      const [fs] = completers;
      expect(fs instanceof FsCompleter && fs.directory).toBe("/etc");
    } finally {
      for (const c of completers) c.dispose?.();
    }
  });

  it("offers only numbers when asked to", () => {
    expect(getCompleters("x", { numbers: 3 }).map((c) => c.name())).toEqual(["num"]);
  });
});
