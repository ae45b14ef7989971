import type { Declaration, ExtractionResult, Scope, Token } from "../types.js";
import { DECLARATION_MODIFIERS, KEYWORDS } from "./keywords.js";

/**
 * For every index `i`, the index of the first token at or after `i` whose
 * text is in `texts`, or `tokens.length` when there is none.
 */
function nextOccurrenceTable(tokens: readonly Token[], texts: ReadonlySet<string>): Int32Array {
  const table = new Int32Array(tokens.length + 1);
  let next = tokens.length;
  table[tokens.length] = next;
  for (let i = tokens.length - 1; i >= 0; i--) {
    if (texts.has(tokens[i].text)) next = i;
    table[i] = next;
  }
  return table;
}

const TERMINATORS: ReadonlySet<string> = new Set([";", ","]);
const CLOSE_BRACKET: ReadonlySet<string> = new Set(["]"]);
const SIGILS: ReadonlySet<string> = new Set(["*", "&"]);

/**
 * Single-pass, single-use walker over a token sequence. Keeps a stack of
 * brace scopes and tries a speculative declaration match at every
 * identifier or keyword.
 */
class DeclarationExtractor {
  private pos = 0;
  private readonly stack: Scope[];
  private readonly scopes: Scope[];
  private readonly declarations: Declaration[] = [];
  private readonly nextTerminator: Int32Array;
  private readonly nextCloseBracket: Int32Array;
  /** Modifiers consumed by the most recent failed attempt. */
  private failedModifierRun = 0;

  constructor(private readonly tokens: readonly Token[]) {
    const global: Scope = {
      kind: "global",
      depth: 0,
      startLine: 1,
      endLine: null,
      declarations: [],
    };
    this.stack = [global];
    this.scopes = [global];
    this.nextTerminator = nextOccurrenceTable(tokens, TERMINATORS);
    this.nextCloseBracket = nextOccurrenceTable(tokens, CLOSE_BRACKET);
  }

  run(): ExtractionResult {
    const { tokens } = this;

    while (this.pos < tokens.length) {
      const token = tokens[this.pos];

      if (token.kind === "operator" && token.text === "{") {
        this.enterScope(token);
      } else if (token.kind === "operator" && token.text === "}") {
        this.exitScope(token);
      } else if (token.kind === "identifier" || token.kind === "keyword") {
        if (!this.tryDeclaration() && this.failedModifierRun > 1) {
          // An attempt from any later modifier in the same run would read
          // the same tokens and fail the same way.
          this.pos += this.failedModifierRun - 1;
        }
      }

      this.pos++;
    }

    return { declarations: this.declarations, scopes: this.scopes };
  }

  private enterScope(token: Token): void {
    const scope: Scope = {
      kind: "block",
      depth: this.stack.length,
      startLine: token.line,
      endLine: null,
      declarations: [],
    };
    this.stack.push(scope);
    this.scopes.push(scope);
  }

  /** Pop the innermost scope; a stray `}` at global level is ignored. */
  private exitScope(token: Token): void {
    if (this.stack.length <= 1) return;
    const scope = this.stack.pop();
    if (scope) scope.endLine = token.line;
  }

  private textAt(index: number): string | null {
    return index < this.tokens.length ? this.tokens[index].text : null;
  }

  private rewind(start: number, modifierRun: number): false {
    this.pos = start;
    this.failedModifierRun = modifierRun;
    return false;
  }

  /**
   * Match `modifiers* type (*|&)* name ([...])? (= ...)? (;|,)` at the
   * cursor. On success the declaration is recorded and the cursor rests on
   * the token before the terminator; on failure the cursor is restored and
   * nothing is recorded.
   */
  private tryDeclaration(): boolean {
    const { tokens } = this;
    const start = this.pos;
    let isStatic = false;
    let isConst = false;
    let sign: string | null = null;

    while (this.pos < tokens.length && DECLARATION_MODIFIERS.has(tokens[this.pos].text)) {
      const text = tokens[this.pos].text;
      if (text === "static") {
        isStatic = true;
      } else if (text === "const") {
        isConst = true;
      } else {
        sign = text;
      }
      this.pos++;
    }
    const modifierRun = this.pos - start;

    if (this.pos >= tokens.length) return this.rewind(start, modifierRun);
    const typeToken = tokens[this.pos];
    if (
      typeToken.kind !== "identifier" &&
      typeToken.kind !== "keyword" &&
      !KEYWORDS.has(typeToken.text)
    ) {
      return this.rewind(start, modifierRun);
    }
    let type = sign === null ? typeToken.text : `${sign} ${typeToken.text}`;
    this.pos++;

    while (this.pos < tokens.length && SIGILS.has(tokens[this.pos].text)) {
      type += tokens[this.pos].text;
      this.pos++;
    }

    if (this.pos >= tokens.length || tokens[this.pos].kind !== "identifier") {
      return this.rewind(start, modifierRun);
    }
    const nameToken = tokens[this.pos];
    this.pos++;

    // Array suffix: skip to the first `]`; the size expression is dropped.
    if (this.textAt(this.pos) === "[") {
      const close = this.nextCloseBracket[this.pos];
      if (close < tokens.length) {
        this.pos = close + 1;
        type += "[]";
      }
    }

    let initializer = "";
    if (this.textAt(this.pos) === "=") {
      this.pos++;
      const end = this.nextTerminator[this.pos];
      if (end >= tokens.length) return this.rewind(start, modifierRun);
      initializer = tokens
        .slice(this.pos, end)
        .map((token) => token.text)
        .join(" ");
      this.pos = end;
    }

    const terminator = this.textAt(this.pos);
    if (terminator !== ";" && terminator !== ",") {
      return this.rewind(start, modifierRun);
    }

    const declaration: Declaration = {
      name: nameToken.text,
      type,
      initializer,
      line: nameToken.line,
      isStatic,
      isConst,
    };
    this.stack[this.stack.length - 1].declarations.push(declaration);
    this.declarations.push(declaration);

    // The main loop's advance lands on the terminator.
    this.pos--;
    return true;
  }
}

/**
 * Extract declarations together with every scope opened during the pass.
 * Scopes are listed global first, then in the order their `{` appeared.
 */
export function extractScopes(tokens: readonly Token[]): ExtractionResult {
  return new DeclarationExtractor(tokens).run();
}

/** Extract the flat, source-ordered list of declarations. */
export function extract(tokens: readonly Token[]): Declaration[] {
  return extractScopes(tokens).declarations;
}
