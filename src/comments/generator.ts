import type { Declaration, Suggestion } from "../types.js";
import type { TermDictionary } from "./dictionary.js";

/** Source of learned per-type variable comments. */
export interface PatternLookup {
  mostCommonComment(type: string): string | null;
}

/** Operators looked for in initializers, in priority order. */
export const OPERATOR_DESCRIPTIONS: ReadonlyMap<string, string> = new Map([
  ["&", "Bitwise MASK"],
  ["|", "Bitwise MERGE"],
  ["<<", "Bitwise SHIFT LEFT"],
  [">>", "Bitwise SHIFT RIGHT"],
  ["%", "Modulo / Wrap Around"],
]);

/**
 * Suggests a one-line comment for an extracted declaration.
 *
 * Sources are tried in order: the term dictionary (initializer value, then
 * name), learned comments for the declared type, then naming and operator
 * heuristics.
 */
export class CommentGenerator {
  constructor(
    private readonly dictionary: TermDictionary,
    private readonly patterns: PatternLookup | null = null,
  ) {}

  suggest(declaration: Declaration): string | null {
    const { name, type, initializer } = declaration;

    if (initializer) {
      const described = this.dictionary.lookupValue(initializer);
      if (described !== null) return `// ${described}`;
    }

    const term = this.dictionary.lookupName(name);
    if (term !== null) return `// ${term} (${name})`;

    const learned = this.patterns?.mostCommonComment(type) ?? null;
    if (learned !== null) return `// ${learned} (Suggested)`;

    const lower = name.toLowerCase();
    if (lower.includes("flags") || lower.includes("mask")) {
      return "// Bitmask configuration";
    }

    if (type.startsWith("uint") && type.includes("[")) {
      return `// Buffer for ${name}`;
    }

    if (initializer) {
      for (const [op, description] of OPERATOR_DESCRIPTIONS) {
        if (initializer.includes(op)) return `// ${description} operation`;
      }
    }

    return null;
  }

  /** Suggestions for every declaration that gets a comment, in input order. */
  suggestAll(declarations: Iterable<Declaration>): Suggestion[] {
    const suggestions: Suggestion[] = [];
    for (const declaration of declarations) {
      const comment = this.suggest(declaration);
      if (comment === null) continue;
      suggestions.push({
        line: declaration.line,
        type: declaration.type,
        name: declaration.name,
        initializer: declaration.initializer,
        comment,
      });
    }
    return suggestions;
  }
}
