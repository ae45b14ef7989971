import type { Suggestion, SuggestionReport } from "../types.js";

/** `Line 12: uint8_t[] buffer;  // Buffer for buffer` */
export function formatSuggestion(suggestion: Suggestion): string {
  const value = suggestion.initializer ? ` = ${suggestion.initializer}` : "";
  return `Line ${suggestion.line}: ${suggestion.type} ${suggestion.name}${value};  ${suggestion.comment}`;
}

/** Render a suggestion report as Markdown, one section per file. */
export function renderReport(report: SuggestionReport): string {
  const lines = ["# Comment Suggestions Report", ""];
  for (const file of report.files) {
    if (file.suggestions.length === 0) continue;
    lines.push(`## File: \`${file.path}\``);
    for (const suggestion of file.suggestions) {
      lines.push(formatSuggestion(suggestion));
    }
    lines.push("");
  }
  return lines.join("\n");
}
