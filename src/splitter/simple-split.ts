import type { SimpleSplitter } from "./types.js";

export interface DelimiterSplitterOptions {
  /** Keep digit runs as their own segments (default true); drop them otherwise */
  keepDigits?: boolean;
}

const DELIMITER_PATTERN = /[^\p{L}\p{N}]+/u;

/**
 * Splits only where the boundary is unambiguous:
 *
 * - hard delimiters (anything that is not a letter or digit) are dropped
 * - letter/digit boundaries
 * - lower-case → upper-case transitions
 *
 * 例: usage_getdata → ["usage", "getdata"]
 * 例: getMAX2json → ["get", "MAX", "2", "json"]
 *
 * Upper → lower transitions (`GPSmodule`, `ASTVisitor`) are ambiguous and
 * left to the case-transition stage.
 */
export class DelimiterSplitter implements SimpleSplitter {
  private readonly keepDigits: boolean;

  constructor(options: DelimiterSplitterOptions = {}) {
    this.keepDigits = options.keepDigits ?? true;
  }

  split(identifier: string): string[] {
    const segments: string[] = [];
    for (const chunk of identifier.split(DELIMITER_PATTERN)) {
      if (chunk.length === 0) {
        continue;
      }
      for (const segment of splitChunk(chunk)) {
        if (!this.keepDigits && isDigit(segment.charAt(0))) {
          continue;
        }
        segments.push(segment);
      }
    }
    return segments;
  }
}

function splitChunk(value: string): string[] {
  const chars = Array.from(value);
  const segments: string[] = [];
  let current = chars[0] ?? "";

  for (let index = 1; index < chars.length; index += 1) {
    const char = chars[index] ?? "";
    const previous = chars[index - 1] ?? "";

    if (shouldSplit(previous, char)) {
      segments.push(current);
      current = char;
    } else {
      current += char;
    }
  }

  if (current.length > 0) {
    segments.push(current);
  }
  return segments;
}

function shouldSplit(previous: string, current: string): boolean {
  if (isLower(previous) && isUpper(current)) {
    return true;
  }
  if (isLetter(previous) && isDigit(current)) {
    return true;
  }
  if (isDigit(previous) && isLetter(current)) {
    return true;
  }
  return false;
}

function isLetter(char: string): boolean {
  return /\p{L}/u.test(char);
}

function isLower(char: string): boolean {
  return /\p{Ll}/u.test(char);
}

function isUpper(char: string): boolean {
  return /\p{Lu}/u.test(char);
}

function isDigit(char: string): boolean {
  return /\p{N}/u.test(char);
}
