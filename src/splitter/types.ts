/**
 * Collaborator interfaces consumed by the splitter core.
 *
 * All three are read-only lookups. Implementations must never throw for a
 * string input; an unknown token yields the neutral value (0 / false).
 */

/**
 * Corpus frequency lookup (case-insensitive).
 */
export interface FrequencyModel {
  frequency(token: string): number;
}

/**
 * Natural-language dictionary membership test (case-insensitive).
 */
export interface DictionaryOracle {
  isWord(token: string): boolean;
}

/**
 * First-level splitter for unambiguous boundaries (delimiters, digits,
 * lower-to-upper case changes). Output order is preserved by the caller.
 */
export interface SimpleSplitter {
  split(identifier: string): string[];
}
