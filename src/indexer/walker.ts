import { readFile, stat } from "node:fs/promises";
import { join, extname } from "node:path";
import fg from "fast-glob";
import ignore from "ignore";
import type { DiscoveredFile, Language } from "../types.js";
import { DEFAULT_EXCLUDES } from "../config.js";

/** Patterns always excluded regardless of the caller's exclude list. */
const ALWAYS_IGNORED: string[] = [
  "node_modules",
  ".git",
  "*.min.*",
  "*.orig",
];

/** Map file extensions to supported languages. Returns null for unsupported. */
export function detectLanguage(filePath: string): Language | null {
  const ext = extname(filePath).toLowerCase();
  switch (ext) {
    case ".c":
    case ".h":
      return "c";
    case ".cpp":
    case ".cc":
    case ".cxx":
    case ".hpp":
    case ".hxx":
    case ".hh":
      return "cpp";
    default:
      return null;
  }
}

/**
 * Build an `ignore` instance preloaded with the fixed patterns, the excluded
 * directory names and the repo's root .gitignore.
 */
async function buildIgnoreFilter(
  repoRoot: string,
  excludes: readonly string[],
): Promise<ReturnType<typeof ignore>> {
  const ig = ignore();
  ig.add(ALWAYS_IGNORED);
  ig.add(excludes.map((name) => `${name}/`));

  try {
    const content = await readFile(join(repoRoot, ".gitignore"), "utf-8");
    ig.add(content);
  } catch (error) {
    // A missing .gitignore is normal; anything else is worth a note.
    if (!isMissingFile(error)) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[declscan] Ignoring unreadable .gitignore in ${repoRoot}: ${message}`);
    }
  }

  return ig;
}

function isMissingFile(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ENOENT"
  );
}

/**
 * Walk a repository directory, discovering C and C++ sources and headers.
 *
 * Hidden entries are never visited. Directories whose name appears in
 * `excludes` are skipped at any depth, and root .gitignore rules apply.
 * Results are sorted by relative path.
 */
export async function walkSources(
  repoRoot: string,
  excludes: readonly string[] = DEFAULT_EXCLUDES,
): Promise<DiscoveredFile[]> {
  const ig = await buildIgnoreFilter(repoRoot, excludes);

  const allFiles = await fg("**/*", {
    cwd: repoRoot,
    dot: false,
    onlyFiles: true,
    followSymbolicLinks: false,
    ignore: ["**/node_modules/**", ...excludes.map((name) => `**/${name}/**`)],
  });

  const discovered: DiscoveredFile[] = [];

  for (const relPath of allFiles.sort()) {
    if (ig.ignores(relPath)) {
      continue;
    }

    const lang = detectLanguage(relPath);
    if (lang === null) {
      continue;
    }

    const absolutePath = join(repoRoot, relPath);

    try {
      const fileStat = await stat(absolutePath);
      discovered.push({
        path: relPath,
        absolutePath,
        lang,
        mtime: fileStat.mtimeMs,
        size: fileStat.size,
      });
    } catch (error) {
      // File disappeared between glob and stat
      if (!isMissingFile(error)) throw error;
    }
  }

  return discovered;
}
