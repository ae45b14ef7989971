import type { LearnedFile, PatternEntry } from "../types.js";

const FUNCTION_START = /^([\w:]+)\s+(\w+)\s*\([^)]*\)\s*\{/;
const VARIABLE_DECLARATION =
  /^\s*(static\s+|const\s+)?([\w:<>*&]+)\s+(\w+)(\[[^\]]+\])?(?:\s*=\s*[^;]+)?;/;
const CONTROL_FLOW = /^\s*(if|for|while|switch|else)\s*\(?/;
const TYPE_DEFINITION = /^\s*(struct|class|enum)\s+(\w+)/;

/** Block comments ending before this 0-based line index count as file headers. */
const HEADER_LINE_LIMIT = 10;

/**
 * First code line in `lines[from, to)`, skipping blanks and comment lines.
 * Returns "" when none is found.
 */
function nextCodeLine(
  lines: readonly string[],
  from: number,
  to: number,
  skipBlockOpeners: boolean,
): string {
  const end = Math.min(lines.length, to);
  for (let j = from; j < end; j++) {
    const clean = lines[j].trim();
    if (!clean || clean.startsWith("//")) continue;
    if (skipBlockOpeners && clean.startsWith("/*")) continue;
    return clean;
  }
  return "";
}

function classifyBlockComment(
  block: readonly string[],
  lines: readonly string[],
  nextIndex: number,
  entries: PatternEntry[],
): void {
  const fullText = block.join("\n");
  const next = nextCodeLine(lines, nextIndex, nextIndex + 5, true);

  if (fullText.includes("@file") || nextIndex < HEADER_LINE_LIMIT) {
    entries.push({ category: "header", key: null, comment: fullText, context: null });
  } else if (FUNCTION_START.test(next)) {
    entries.push({ category: "function", key: null, comment: fullText, context: next });
  } else if (TYPE_DEFINITION.test(next)) {
    entries.push({ category: "data_structure", key: null, comment: fullText, context: next });
  } else {
    entries.push({ category: "general", key: null, comment: fullText, context: null });
  }
}

function classifyLineComment(
  line: string,
  lines: readonly string[],
  index: number,
  entries: PatternEntry[],
): void {
  const split = line.indexOf("//");
  const code = line.slice(0, split).trim();
  const comment = line.slice(split + 2).trim();
  if (!comment) return;

  // Comment on its own line: describes the code that follows.
  if (!code) {
    const next = nextCodeLine(lines, index + 1, index + 5, false);
    const control = CONTROL_FLOW.exec(next);
    if (control) {
      entries.push({ category: "control_flow", key: control[1], comment, context: next });
    } else if (FUNCTION_START.test(next)) {
      entries.push({ category: "function", key: null, comment, context: next });
    } else {
      entries.push({ category: "general", key: null, comment, context: null });
    }
    return;
  }

  // End-of-line comment: describes the code on the same line.
  const variable = VARIABLE_DECLARATION.exec(code);
  if (variable) {
    entries.push({ category: "variable", key: variable[2], comment, context: code });
    return;
  }
  const control = CONTROL_FLOW.exec(code);
  if (control) {
    entries.push({ category: "control_flow", key: control[1], comment, context: code });
  } else {
    entries.push({ category: "general", key: null, comment, context: null });
  }
}

/**
 * Collect the comments of one source file and classify them by what they
 * are attached to: file headers, functions, variables (keyed by declared
 * type), control flow (keyed by keyword), data structures, or general notes.
 *
 * Works on raw lines with regular expressions; a `//` inside a string
 * literal is taken as a comment.
 */
export function learnPatterns(source: string): LearnedFile {
  const lines = source.split(/\r?\n/);
  const entries: PatternEntry[] = [];
  let commentsFound = 0;

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();

    if (line.startsWith("/*")) {
      const block: string[] = [];
      while (i < lines.length) {
        const current = lines[i].trim();
        block.push(current);
        if (current.includes("*/")) break;
        i++;
      }
      commentsFound++;
      classifyBlockComment(block, lines, i + 1, entries);
    } else if (line.includes("//")) {
      commentsFound++;
      classifyLineComment(line, lines, i, entries);
    }
  }

  return { entries, commentsFound };
}
