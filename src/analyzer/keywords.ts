/**
 * Reserved words recognised by the lexer. The set is closed: anything not
 * listed here lexes as an identifier, including standard-library type names
 * such as `size_t`.
 */
export const KEYWORDS: ReadonlySet<string> = new Set([
  // types
  "int",
  "float",
  "double",
  "char",
  "void",
  "bool",
  "auto",
  "uint8_t",
  "uint16_t",
  "uint32_t",
  "uint64_t",
  // storage / qualifiers
  "const",
  "static",
  "unsigned",
  "signed",
  // class-like
  "class",
  "struct",
  "enum",
  "namespace",
  "template",
  // control flow
  "if",
  "else",
  "for",
  "while",
  "switch",
  "case",
  "return",
  "break",
  // access / inheritance
  "public",
  "private",
  "protected",
  "virtual",
  "override",
]);

/** Single-character punctuation emitted as operator tokens. */
export const OPERATOR_CHARS: ReadonlySet<string> = new Set(
  "{}[]()=<>!+-*/%&|^~?:.,;",
);

/** Modifiers the declaration matcher consumes ahead of the base type. */
export const DECLARATION_MODIFIERS: ReadonlySet<string> = new Set([
  "static",
  "const",
  "unsigned",
  "signed",
]);
