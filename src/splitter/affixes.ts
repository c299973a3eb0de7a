/**
 * Affix Tables
 *
 * Known Latin/Greek prefixes and suffixes. A same-case cut whose left piece
 * is a prefix or whose right piece is a suffix would strand a bound
 * morpheme ("un" + "directed"), so the splitter suppresses it.
 *
 * The lists come from the Samurai identifier splitter (Enslen, Hill,
 * Pollock & Vijay-Shanker, MSR 2009) and ship as data/affixes.json.
 */

import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

import { z } from "zod";

// ============================================================
// Schema
// ============================================================

const AffixListSchema = z.array(z.string().trim().min(1));

const AffixFileSchema = z.object({
  prefixes: AffixListSchema,
  suffixes: AffixListSchema,
});

export interface AffixLists {
  prefixes?: readonly string[];
  suffixes?: readonly string[];
}

// ============================================================
// AffixTables
// ============================================================

export class AffixTables {
  private readonly prefixSet: ReadonlySet<string>;
  private readonly suffixSet: ReadonlySet<string>;

  constructor(lists: AffixLists = {}) {
    this.prefixSet = new Set((lists.prefixes ?? []).map((entry) => entry.toLowerCase()));
    this.suffixSet = new Set((lists.suffixes ?? []).map((entry) => entry.toLowerCase()));
  }

  /**
   * Exact, case-insensitive membership (not a substring match).
   */
  isPrefix(token: string): boolean {
    return token.length > 0 && this.prefixSet.has(token.toLowerCase());
  }

  isSuffix(token: string): boolean {
    return token.length > 0 && this.suffixSet.has(token.toLowerCase());
  }

  /**
   * Returns a new table holding this table's entries plus `extra`.
   */
  extend(extra: AffixLists): AffixTables {
    return new AffixTables({
      prefixes: [...this.prefixSet, ...(extra.prefixes ?? [])],
      suffixes: [...this.suffixSet, ...(extra.suffixes ?? [])],
    });
  }

  get prefixes(): readonly string[] {
    return Array.from(this.prefixSet);
  }

  get suffixes(): readonly string[] {
    return Array.from(this.suffixSet);
  }
}

// ============================================================
// Loader
// ============================================================

function defaultAffixPath(): string {
  const currentDir = path.dirname(fileURLToPath(import.meta.url));
  // src/splitter and dist/splitter both sit two levels below the package root
  return path.join(currentDir, "../../data/affixes.json");
}

export function loadAffixTables(filePath: string = defaultAffixPath()): AffixTables {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Affix table not found at ${filePath} → reinstall the package or pass a valid path`);
  }
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
  const result = AffixFileSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join(", ");
    throw new Error(`Invalid affix table in ${filePath}: ${details}`);
  }
  return new AffixTables(result.data);
}

let cachedTables: AffixTables | null = null;

/**
 * Process-wide default tables, loaded on first use.
 */
export function getDefaultAffixTables(): AffixTables {
  if (!cachedTables) {
    cachedTables = loadAffixTables();
  }
  return cachedTables;
}

/**
 * Test hook: forget the cached default tables.
 */
export function clearAffixCache(): void {
  cachedTables = null;
}
