import type { Declaration, ExtractionResult } from "../types.js";
import { tokenize } from "./lexer.js";
import { extract, extractScopes } from "./extractor.js";

export { tokenize } from "./lexer.js";
export { extract, extractScopes } from "./extractor.js";
export { KEYWORDS, OPERATOR_CHARS, DECLARATION_MODIFIERS } from "./keywords.js";

/**
 * Tokenize and extract variable declarations from one source text.
 *
 * Best effort: malformed input yields fewer declarations, never an error.
 * Each call is independent, so files may be analyzed concurrently.
 */
export function analyzeSource(source: string): Declaration[] {
  return extract(tokenize(source));
}

/** Like {@link analyzeSource}, also returning the scope tree of the pass. */
export function analyzeSourceWithScopes(source: string): ExtractionResult {
  return extractScopes(tokenize(source));
}
