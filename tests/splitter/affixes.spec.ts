import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import {
  AffixTables,
  clearAffixCache,
  getDefaultAffixTables,
  loadAffixTables,
} from "../../src/splitter/affixes.js";

const cleanups: Array<() => Promise<void>> = [];

afterEach(async () => {
  clearAffixCache();
  for (const cleanup of cleanups.splice(0, cleanups.length)) {
    await cleanup();
  }
});

async function tempFile(content: string): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), "idsplit-affixes-"));
  cleanups.push(() => rm(dir, { recursive: true, force: true }));
  const filePath = join(dir, "affixes.json");
  await writeFile(filePath, content);
  return filePath;
}

describe("default affix tables", () => {
  it("loads the bundled prefix and suffix lists", () => {
    const tables = getDefaultAffixTables();
    expect(tables.prefixes).toHaveLength(88);
    expect(tables.suffixes).toHaveLength(330);
  });

  it("matches prefixes and suffixes case-insensitively", () => {
    const tables = getDefaultAffixTables();
    expect(tables.isPrefix("un")).toBe(true);
    expect(tables.isPrefix("UN")).toBe(true);
    expect(tables.isPrefix("re")).toBe(true);
    expect(tables.isSuffix("ing")).toBe(true);
    expect(tables.isSuffix("Tion")).toBe(true);
  });

  it("requires an exact match", () => {
    const tables = getDefaultAffixTables();
    expect(tables.isPrefix("unx")).toBe(false);
    expect(tables.isPrefix("u")).toBe(false);
    expect(tables.isSuffix("xing")).toBe(false);
  });

  it("never treats the empty string as an affix", () => {
    const tables = getDefaultAffixTables();
    expect(tables.isPrefix("")).toBe(false);
    expect(tables.isSuffix("")).toBe(false);
  });

  it("has no entry containing whitespace", () => {
    const tables = getDefaultAffixTables();
    expect(tables.suffixes.some((entry) => /\s/.test(entry))).toBe(false);
    expect(tables.isSuffix("ick")).toBe(false);
  });

  it("caches the default tables until cleared", () => {
    const first = getDefaultAffixTables();
    expect(getDefaultAffixTables()).toBe(first);
    clearAffixCache();
    expect(getDefaultAffixTables()).not.toBe(first);
  });
});

describe("AffixTables.extend", () => {
  it("adds entries without touching the original", () => {
    const base = new AffixTables({ prefixes: ["un"], suffixes: ["ing"] });
    const extended = base.extend({ prefixes: ["Auto"], suffixes: ["able"] });

    expect(extended.isPrefix("auto")).toBe(true);
    expect(extended.isPrefix("un")).toBe(true);
    expect(extended.isSuffix("able")).toBe(true);
    expect(base.isPrefix("auto")).toBe(false);
    expect(base.isSuffix("able")).toBe(false);
  });
});

describe("loadAffixTables", () => {
  it("reads a custom file", async () => {
    const filePath = await tempFile(JSON.stringify({ prefixes: ["Pre"], suffixes: ["ful"] }));
    const tables = loadAffixTables(filePath);
    expect(tables.isPrefix("pre")).toBe(true);
    expect(tables.isSuffix("FUL")).toBe(true);
  });

  it("rejects a file that does not match the schema", async () => {
    const filePath = await tempFile(JSON.stringify({ prefixes: ["ok"], suffixes: [""] }));
    expect(() => loadAffixTables(filePath)).toThrow(/Invalid affix table/);
  });

  it("rejects a missing file", () => {
    expect(() => loadAffixTables(join(tmpdir(), "idsplit-missing", "affixes.json"))).toThrow(
      /Affix table not found/
    );
  });
});
