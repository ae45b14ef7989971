import { readFile } from "node:fs/promises";

/** Keys shorter than this only match whole names or `_`-delimited parts. */
const SHORT_KEY_LENGTH = 3;

const NUMERIC_KEY = /^\d+$/;

/**
 * Read-only mapping from domain terms (and well-known literal values) to
 * human-readable descriptions.
 */
export class TermDictionary {
  private readonly terms: ReadonlyMap<string, string>;
  /** Non-numeric keys, longest first; equal lengths keep insertion order. */
  private readonly nameKeys: readonly string[];

  constructor(terms: Iterable<[string, string]> = []) {
    this.terms = new Map(terms);
    this.nameKeys = [...this.terms.keys()]
      .filter((key) => !NUMERIC_KEY.test(key))
      .sort((a, b) => b.length - a.length);
  }

  get size(): number {
    return this.terms.size;
  }

  /** Exact lookup of an initializer value, ignoring surrounding whitespace. */
  lookupValue(value: string): string | null {
    return this.terms.get(value.trim()) ?? null;
  }

  /**
   * Find the longest term mentioned in a variable name (compared in lower
   * case). Short terms must equal the name or appear as `_term` / `term_`.
   */
  lookupName(name: string): string | null {
    const lower = name.toLowerCase();
    for (const key of this.nameKeys) {
      const matches =
        key.length < SHORT_KEY_LENGTH
          ? key === lower || lower.includes(`_${key}`) || lower.includes(`${key}_`)
          : lower.includes(key);
      if (matches) return this.terms.get(key) ?? null;
    }
    return null;
  }

  /** Build a dictionary from parsed JSON; non-string values are skipped. */
  static fromJson(data: unknown): TermDictionary {
    if (typeof data !== "object" || data === null || Array.isArray(data)) {
      throw new Error("Dictionary must be a JSON object of term -> description");
    }
    const terms: Array<[string, string]> = [];
    for (const [key, value] of Object.entries(data)) {
      if (typeof value === "string") terms.push([key, value]);
    }
    return new TermDictionary(terms);
  }
}

/**
 * Load a dictionary file. A missing path yields an empty dictionary; an
 * unreadable or malformed file is reported and also yields an empty one.
 */
export async function loadDictionary(path: string | null): Promise<TermDictionary> {
  if (path === null) return new TermDictionary();
  try {
    const raw = await readFile(path, "utf-8");
    return TermDictionary.fromJson(JSON.parse(raw));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[declscan] Error loading dictionary ${path}: ${message}. Proceeding without domain terms.`);
    return new TermDictionary();
  }
}
