/**
 * Corpus frequency table
 *
 * In-memory FrequencyModel backed by a Map keyed on the lower-cased token.
 * Tables are read from plain text files, one `token count` pair per line
 * (tab, comma or spaces between the two fields).
 */

import fs from "node:fs";

import type { FrequencyModel } from "../splitter/types.js";

const LINE_PATTERN = /^(\S+?)\s*[\t, ]\s*(\S+)$/;

export class FrequencyTable implements FrequencyModel {
  private readonly counts = new Map<string, number>();

  /**
   * Case variants of the same token are summed.
   */
  add(token: string, count: number): void {
    const key = token.toLowerCase();
    if (key.length === 0) {
      return;
    }
    this.counts.set(key, (this.counts.get(key) ?? 0) + count);
  }

  frequency(token: string): number {
    if (!token) {
      return 0;
    }
    return this.counts.get(token.toLowerCase()) ?? 0;
  }

  get size(): number {
    return this.counts.size;
  }

  static fromEntries(entries: Record<string, number>): FrequencyTable {
    const table = new FrequencyTable();
    for (const [token, count] of Object.entries(entries)) {
      table.add(token, count);
    }
    return table;
  }
}

export function parseFrequencyText(text: string, source = "<inline>"): FrequencyTable {
  const table = new FrequencyTable();
  const lines = text.split(/\r?\n/);

  lines.forEach((rawLine, index) => {
    const line = rawLine.trim();
    if (line.length === 0 || line.startsWith("#")) {
      return;
    }
    const match = LINE_PATTERN.exec(line);
    const token = match?.[1];
    const rawCount = match?.[2];
    if (token === undefined || rawCount === undefined) {
      throw new Error(
        `Invalid frequency entry at ${source}:${index + 1}: "${line}" → expected "<token> <count>"`
      );
    }
    const count = Number(rawCount);
    if (!Number.isFinite(count) || count < 0) {
      throw new Error(
        `Invalid frequency count at ${source}:${index + 1}: "${rawCount}" → expected a non-negative number`
      );
    }
    table.add(token, count);
  });

  return table;
}

export function loadFrequencyTable(filePath: string): FrequencyTable {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Frequency table not found at ${filePath} → check the path or configuration`);
  }
  return parseFrequencyText(fs.readFileSync(filePath, "utf8"), filePath);
}
