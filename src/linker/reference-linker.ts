import type { LinkResult, SymbolLocation } from "../types.js";

/** Names shorter than this are too likely to be ordinary words. */
const MIN_LINKED_NAME_LENGTH = 4;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Rewrite prose so that mentions of known type names link to their
 * definitions, e.g. `Renderer` -> `[Renderer](src/render.h#L12)`.
 *
 * A name is skipped when it is not mentioned at all or when the exact link
 * is already present. Otherwise every whole-word mention not directly
 * preceded by `[` is replaced. Symbols are applied in map order.
 */
export function linkReferences(
  text: string,
  symbols: ReadonlyMap<string, SymbolLocation>,
): LinkResult {
  let result = text;
  const linked: string[] = [];

  for (const [name, location] of symbols) {
    if (name.length < MIN_LINKED_NAME_LENGTH) continue;

    const link = `[${name}](${location.path}#L${location.line})`;
    if (!result.includes(name) || result.includes(link)) continue;

    const pattern = new RegExp(`(?<!\\[)\\b${escapeRegExp(name)}\\b`, "g");
    const replaced = result.replace(pattern, () => link);
    if (replaced !== result) {
      result = replaced;
      linked.push(name);
    }
  }

  return { text: result, linked };
}

/**
 * Build a name -> location map from definitions listed in path/line order.
 * A name defined more than once resolves to its last definition.
 */
export function buildSymbolMap(
  definitions: Iterable<{ name: string; path: string; line: number }>,
): Map<string, SymbolLocation> {
  const map = new Map<string, SymbolLocation>();
  for (const def of definitions) {
    map.set(def.name, { path: def.path, line: def.line });
  }
  return map;
}
