import { existsSync, statSync } from 'node:fs';
import { resolve, normalize, isAbsolute } from 'node:path';

/**
 * Validate that a repository path exists and is a directory.
 * Returns the resolved absolute path on success.
 */
export function validateRepoPath(
  repoPath: string,
): { valid: true; absolutePath: string } | { valid: false; error: string } {
  const abs = isAbsolute(repoPath) ? repoPath : resolve(repoPath);
  if (!existsSync(abs)) {
    return { valid: false, error: `Path does not exist: ${abs}` };
  }
  if (!statSync(abs).isDirectory()) {
    return { valid: false, error: `Path is not a directory: ${abs}` };
  }
  return { valid: true, absolutePath: abs };
}

/**
 * Validate that a source file exists and is a regular file.
 * Relative paths resolve against the working directory.
 */
export function validateFilePath(
  filePath: string,
): { valid: true; absolutePath: string } | { valid: false; error: string } {
  const abs = normalize(isAbsolute(filePath) ? filePath : resolve(filePath));
  if (!existsSync(abs)) {
    return { valid: false, error: `File not found: ${filePath}` };
  }
  if (!statSync(abs).isFile()) {
    return { valid: false, error: `Not a file: ${filePath}` };
  }
  return { valid: true, absolutePath: abs };
}

/** Tool call arguments as received from an MCP client. */
export type ToolArgs = Record<string, unknown> | undefined;

/** Read a required string argument, throwing when it is missing or mistyped. */
export function readStringArg(args: ToolArgs, key: string): string {
  const value = args?.[key];
  if (typeof value !== 'string') {
    throw new Error(`Missing or invalid argument: ${key} (expected string)`);
  }
  return value;
}

/** Read an optional string argument. */
export function readOptionalStringArg(args: ToolArgs, key: string): string | undefined {
  const value = args?.[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw new Error(`Invalid argument: ${key} (expected string)`);
  }
  return value;
}

/** Read an optional boolean argument, defaulting to false. */
export function readFlagArg(args: ToolArgs, key: string): boolean {
  const value = args?.[key];
  if (value === undefined) return false;
  if (typeof value !== 'boolean') {
    throw new Error(`Invalid argument: ${key} (expected boolean)`);
  }
  return value;
}

/** Read an optional array of strings. */
export function readOptionalStringListArg(
  args: ToolArgs,
  key: string,
): string[] | undefined {
  const value = args?.[key];
  if (value === undefined) return undefined;
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
    throw new Error(`Invalid argument: ${key} (expected array of strings)`);
  }
  return value;
}
