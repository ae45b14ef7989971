import { createHash } from 'node:crypto';
import { readFile } from 'node:fs/promises';

export async function hashFile(filePath: string): Promise<string> {
  const content = await readFile(filePath);
  return hashBytes(content);
}

export function hashBytes(content: Uint8Array | string): string {
  return createHash('sha256').update(content).digest('hex');
}
