import type { Token, TokenKind } from "../types.js";
import { KEYWORDS, OPERATOR_CHARS } from "./keywords.js";

const WHITESPACE = /\s/;

function isDigit(ch: string): boolean {
  return ch >= "0" && ch <= "9";
}

function isLetter(ch: string): boolean {
  return (ch >= "a" && ch <= "z") || (ch >= "A" && ch <= "Z");
}

function isIdentifierStart(ch: string): boolean {
  return isLetter(ch) || ch === "_";
}

function isIdentifierPart(ch: string): boolean {
  return isIdentifierStart(ch) || isDigit(ch);
}

/** Numeric literals take any run of letters, digits and dots: `0x1F`, `1e-`, `1.2.3abc`. */
function isNumberPart(ch: string): boolean {
  return isLetter(ch) || isDigit(ch) || ch === ".";
}

/**
 * Split C-family source text into classified tokens.
 *
 * Whitespace and comments never become tokens. Characters that fit no rule
 * (`#`, `@`, backslashes outside literals, non-ASCII letters) are skipped.
 * String and comment runs that are never closed extend to the end of the
 * input. The function never throws and visits each character once.
 */
export function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  const len = source.length;
  let pos = 0;
  let line = 1;
  let column = 1;

  function advance(): void {
    if (source[pos] === "\n") {
      line++;
      column = 1;
    } else {
      column++;
    }
    pos++;
  }

  function emit(kind: TokenKind, start: number, startLine: number, startColumn: number): void {
    tokens.push({
      kind,
      text: source.slice(start, pos),
      line: startLine,
      column: startColumn,
      offset: start,
    });
  }

  while (pos < len) {
    const ch = source[pos];
    const start = pos;
    const startLine = line;
    const startColumn = column;

    if (WHITESPACE.test(ch)) {
      advance();
      continue;
    }

    if (isIdentifierStart(ch)) {
      advance();
      while (pos < len && isIdentifierPart(source[pos])) advance();
      const kind = KEYWORDS.has(source.slice(start, pos)) ? "keyword" : "identifier";
      emit(kind, start, startLine, startColumn);
      continue;
    }

    if (isDigit(ch)) {
      advance();
      while (pos < len && isNumberPart(source[pos])) advance();
      emit("literal", start, startLine, startColumn);
      continue;
    }

    if (ch === '"' || ch === "'") {
      advance();
      while (pos < len) {
        const current = source[pos];
        if (current === "\\") {
          advance();
          if (pos < len) advance();
          continue;
        }
        advance();
        if (current === ch) break;
      }
      emit("literal", start, startLine, startColumn);
      continue;
    }

    if (ch === "/" && source[pos + 1] === "/") {
      while (pos < len && source[pos] !== "\n") advance();
      continue;
    }

    if (ch === "/" && source[pos + 1] === "*") {
      advance();
      advance();
      while (pos < len && !(source[pos] === "*" && source[pos + 1] === "/")) advance();
      if (pos < len) {
        advance();
        advance();
      }
      continue;
    }

    if (OPERATOR_CHARS.has(ch)) {
      advance();
      emit("operator", start, startLine, startColumn);
      continue;
    }

    advance();
  }

  return tokens;
}
