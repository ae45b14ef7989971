import type { TypeDefinition, TypeDefinitionKind } from "../types.js";

const TYPE_DEFINITION_LINE = /^\s*(class|struct|enum)\s+(\w+)/;

function isTypeDefinitionKind(value: string): value is TypeDefinitionKind {
  return value === "class" || value === "struct" || value === "enum";
}

/**
 * Find lines that open a `class`, `struct` or `enum` with a name.
 *
 * This is a line-oriented scan and does not use the declaration extractor:
 * forward declarations count, and `enum class Foo` reports the name `class`.
 */
export function scanTypeDefinitions(source: string): TypeDefinition[] {
  const definitions: TypeDefinition[] = [];
  const lines = source.split("\n");

  for (let i = 0; i < lines.length; i++) {
    const match = TYPE_DEFINITION_LINE.exec(lines[i]);
    if (!match) continue;
    const [, kind, name] = match;
    if (isTypeDefinitionKind(kind)) {
      definitions.push({ kind, name, line: i + 1 });
    }
  }

  return definitions;
}
