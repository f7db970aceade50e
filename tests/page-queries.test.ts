import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { DEFAULT_PAGE_QUERIES, loadPageQueries, mergePageQueries } from "../src/lib/pageQueries.js";

const tempDirs: string[] = [];

afterEach(async () => {
  for (const dir of tempDirs.splice(0)) {
    await rm(dir, { recursive: true, force: true });
  }
});

describe("mergePageQueries", () => {
  it("returns the defaults for a non-object", () => {
    expect(mergePageQueries(null)).toEqual(DEFAULT_PAGE_QUERIES);
    expect(mergePageQueries(["SELECT 1"])).toEqual(DEFAULT_PAGE_QUERIES);
  });

  it("overrides known keys only", () => {
    const merged = mergePageQueries({
      allPages: "  SELECT Name FROM Pages ORDER BY Name  ",
      dropEverything: "DROP TABLE Pages",
      getPage: 42,
      savePage: "   "
    });

    expect(merged.allPages).toBe("SELECT Name FROM Pages ORDER BY Name");
    expect(merged.getPage).toBe(DEFAULT_PAGE_QUERIES.getPage);
    expect(merged.savePage).toBe(DEFAULT_PAGE_QUERIES.savePage);
    expect(Object.keys(merged)).not.toContain("dropEverything");
  });
});

describe("loadPageQueries", () => {
  it("returns the defaults without a path", async () => {
    await expect(loadPageQueries(null)).resolves.toEqual(DEFAULT_PAGE_QUERIES);
  });

  it("reads overrides from a json file", async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), "wiki-queries-"));
    tempDirs.push(dir);
    const file = path.join(dir, "queries.json");
    await writeFile(file, JSON.stringify({ deletePage: "DELETE FROM Pages WHERE Id = ? AND 1 = 1" }), "utf8");

    const queries = await loadPageQueries(file);
    expect(queries.deletePage).toBe("DELETE FROM Pages WHERE Id = ? AND 1 = 1");
    expect(queries.createPage).toBe(DEFAULT_PAGE_QUERIES.createPage);
  });

  it("rejects a configured file that does not exist", async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), "wiki-queries-"));
    tempDirs.push(dir);

    await expect(loadPageQueries(path.join(dir, "missing.json"))).rejects.toThrow();
  });
});
