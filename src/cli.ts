#!/usr/bin/env node
/**
 * declscan: unified CLI entry point
 *
 * Subcommands:
 *   (none)                      Start MCP server on stdio (editor integration)
 *   analyze <file> [--scopes]   Print the declarations of one source file
 *   index [path]                Index or re-index a repository
 *   status [path]               Show index status for a repository
 *   suggest [path]              Suggest comments for indexed declarations
 *   link <markdown> [path]      Link type names in a Markdown file
 *   help                        Show usage information
 */

import { resolve, dirname } from 'node:path';
import { readFile, writeFile } from 'node:fs/promises';
import { Database } from './storage/database.js';
import { resolveDbPath, parseExcludes } from './config.js';
import { renderReport } from './comments/report.js';
import {
  analyzeFile,
  repoStatus,
  repoIndex,
  suggestComments,
  linkRepoReferences,
} from './tools/index.js';
import type { Declaration, Scope } from './types.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function printUsage(): void {
  console.log(`
declscan: declaration extractor and comment assistant for C and C++ code

Usage:
  declscan                                Start MCP server (stdio) for editor integration
  declscan analyze <file> [--scopes]      Print the declarations found in a file
  declscan index [path] [options]         Index or re-index a repository
  declscan status [path]                  Show index status for a repository
  declscan suggest [path] [options]       Suggest comments for indexed declarations
  declscan link <markdown-file> [path]    Link class/struct/enum names in a Markdown file
  declscan help                           Show this help message

Options for 'index':
  --full                          Force full re-index (default: auto-detect)
  --incremental                   Force incremental index
  --exclude=a,b                   Directory names to skip (default: third-party,vendor,build,scripts)

Options for 'suggest':
  --output=<file>                 Write the Markdown report to a file instead of stdout
  --dictionary=<file>             JSON term dictionary (default: $DECLSCAN_DICTIONARY or .declscan/dictionary.json)

Path defaults to the current working directory if not specified.

Examples:
  declscan analyze src/main.c     Show declarations in one file
  declscan index .                Index the current directory
  declscan index --full           Force full re-index of current directory
  declscan suggest --output=COMMENTS.md
  declscan link docs/design.md
`.trim());
}

function openDatabase(): Database {
  return new Database(resolveDbPath());
}

/** Split arguments into positionals and `--key[=value]` options. */
function parseArgs(args: string[], known: readonly string[]): {
  positional: string[];
  options: Map<string, string>;
} {
  const positional: string[] = [];
  const options = new Map<string, string>();

  for (const arg of args) {
    if (!arg.startsWith('-')) {
      positional.push(arg);
      continue;
    }
    const eq = arg.indexOf('=');
    const key = eq === -1 ? arg : arg.slice(0, eq);
    if (!known.includes(key)) {
      console.error(`Unknown option: ${arg}`);
      process.exit(1);
    }
    options.set(key, eq === -1 ? '' : arg.slice(eq + 1));
  }

  return { positional, options };
}

function describeDeclaration(d: Declaration): string {
  const flags = [d.isStatic ? 'static' : '', d.isConst ? 'const' : '']
    .filter((f) => f.length > 0)
    .join(' ');
  const init = d.initializer ? ` = ${d.initializer}` : '';
  return `  Line ${d.line}: ${d.type} ${d.name}${init}${flags ? `  [${flags}]` : ''}`;
}

function describeScope(s: Scope): string {
  const end = s.endLine === null ? 'EOF' : String(s.endLine);
  const indent = '  '.repeat(s.depth + 1);
  return `${indent}${s.kind} (depth ${s.depth}) lines ${s.startLine}-${end}: ${s.declarations.length} declaration(s)`;
}

// ---------------------------------------------------------------------------
// CLI Handlers
// ---------------------------------------------------------------------------

async function handleAnalyze(args: string[]): Promise<void> {
  const { positional, options } = parseArgs(args, ['--scopes']);
  const filePath = positional[0];
  if (!filePath) {
    console.error('Usage: declscan analyze <file> [--scopes]');
    process.exit(1);
  }

  const analysis = await analyzeFile(filePath, options.has('--scopes'));
  console.log(`${analysis.path} (${analysis.encoding})`);
  console.log(`Declarations: ${analysis.declarations.length}`);
  for (const d of analysis.declarations) {
    console.log(describeDeclaration(d));
  }

  if (analysis.scopes) {
    console.log(`Scopes: ${analysis.scopes.length}`);
    for (const s of analysis.scopes) {
      console.log(describeScope(s));
    }
  }
}

async function handleStatus(args: string[]): Promise<void> {
  const { positional } = parseArgs(args, []);
  const repoPath = resolve(positional[0] ?? process.cwd());
  const db = openDatabase();

  try {
    const status = await repoStatus(db, repoPath);

    if (status.status === 'not_indexed') {
      console.log(`Not indexed: ${repoPath}`);
      console.log(`Run "declscan index" to index this repository.`);
      return;
    }

    console.log(`Indexed: ${status.rootPath}`);
    console.log(`  Last indexed:  ${status.lastIndexedAt}`);
    console.log(`  Files:         ${status.fileCounts.total}`);

    const langs = Object.entries(status.fileCounts.byLang).sort((a, b) => b[1] - a[1]);
    if (langs.length > 0) {
      const langStr = langs.map(([lang, count]) => `${lang}(${count})`).join(', ');
      console.log(`  Languages:     ${langStr}`);
    }

    console.log(`  Declarations:  ${status.declarationCount}`);
    console.log(`  Types:         ${status.symbolCount}`);
    console.log(`  Comments:      ${status.patternCount}`);

    const categories = Object.entries(status.patternsByCategory).sort((a, b) => b[1] - a[1]);
    if (categories.length > 0) {
      const categoryStr = categories.map(([category, count]) => `${category}(${count})`).join(', ');
      console.log(`  Comment kinds: ${categoryStr}`);
    }
  } finally {
    db.close();
  }
}

async function handleIndex(args: string[]): Promise<void> {
  const { positional, options } = parseArgs(args, ['--full', '--incremental', '--exclude']);

  let mode: string | undefined;
  if (options.has('--full')) mode = 'full';
  if (options.has('--incremental')) mode = 'incremental';

  const excludeValue = options.get('--exclude');
  const excludes = excludeValue === undefined ? undefined : parseExcludes(excludeValue);

  const repoPath = resolve(positional[0] ?? process.cwd());
  const db = openDatabase();

  try {
    console.log(`Indexing: ${repoPath}`);
    const summary = await repoIndex(db, repoPath, mode, excludes);

    console.log(`  Mode:          ${summary.mode}`);
    console.log(`  Files indexed: ${summary.filesIndexed}`);
    console.log(`  Files skipped: ${summary.filesSkipped}`);
    if (summary.filesDeleted > 0) {
      console.log(`  Files deleted: ${summary.filesDeleted}`);
    }
    console.log(`  Declarations:  ${summary.declarationCount}`);
    console.log(`  Types:         ${summary.symbolCount}`);
    console.log(`  Comments:      ${summary.patternCount}`);
    console.log(`  Duration:      ${summary.durationMs}ms`);

    if (summary.warnings.length > 0) {
      console.log(`  Warnings:`);
      for (const w of summary.warnings) {
        console.log(`    - ${w}`);
      }
    }
  } finally {
    db.close();
  }
}

async function handleSuggest(args: string[]): Promise<void> {
  const { positional, options } = parseArgs(args, ['--output', '--dictionary']);
  const repoPath = resolve(positional[0] ?? process.cwd());
  const dictionary = options.get('--dictionary') || undefined;
  const output = options.get('--output') || undefined;
  const db = openDatabase();

  try {
    const report = await suggestComments(db, repoPath, dictionary);
    const markdown = renderReport(report);

    if (output) {
      await writeFile(output, markdown, 'utf-8');
      console.log(`Wrote ${report.total} suggestion(s) to ${output}`);
    } else {
      console.log(markdown);
    }
  } finally {
    db.close();
  }
}

async function handleLink(args: string[]): Promise<void> {
  const { positional } = parseArgs(args, []);
  const markdownPath = positional[0];
  if (!markdownPath) {
    console.error('Usage: declscan link <markdown-file> [path]');
    process.exit(1);
  }

  const absoluteMarkdown = resolve(markdownPath);
  const repoPath = resolve(positional[1] ?? process.cwd());
  const db = openDatabase();

  try {
    const text = await readFile(absoluteMarkdown, 'utf-8');
    const result = await linkRepoReferences(db, repoPath, text, dirname(absoluteMarkdown));

    if (result.linked.length === 0) {
      console.log(`No references to link in ${markdownPath}`);
      return;
    }

    await writeFile(absoluteMarkdown, result.text, 'utf-8');
    console.log(`Linked ${result.linked.length} name(s) in ${markdownPath}: ${result.linked.join(', ')}`);
  } finally {
    db.close();
  }
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const subcommand = args[0];

  if (!subcommand) {
    const { startServer } = await import('./server.js');
    await startServer();
    return;
  }

  switch (subcommand) {
    case 'help':
    case '--help':
    case '-h':
      printUsage();
      break;

    case 'analyze':
      await handleAnalyze(args.slice(1));
      break;

    case 'status':
      await handleStatus(args.slice(1));
      break;

    case 'index':
      await handleIndex(args.slice(1));
      break;

    case 'suggest':
      await handleSuggest(args.slice(1));
      break;

    case 'link':
      await handleLink(args.slice(1));
      break;

    default:
      console.error(`Unknown command: ${subcommand}\n`);
      printUsage();
      process.exit(1);
  }
}

main().catch((error) => {
  console.error('[declscan] Fatal error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
