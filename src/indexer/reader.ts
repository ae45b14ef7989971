import { readFile } from "node:fs/promises";
import type { DecodedSource } from "../types.js";

const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Decode raw file bytes as UTF-8, falling back to Latin-1 when the bytes
 * are not valid UTF-8. Latin-1 maps every byte, so decoding always succeeds.
 */
export function decodeSource(bytes: Uint8Array): DecodedSource {
  try {
    return { text: utf8.decode(bytes), encoding: "utf-8" };
  } catch (error) {
    if (!(error instanceof TypeError)) throw error;
    return { text: Buffer.from(bytes).toString("latin1"), encoding: "latin1" };
  }
}

/** Read and decode a source file. I/O errors propagate to the caller. */
export async function readSource(filePath: string): Promise<DecodedSource> {
  const bytes = await readFile(filePath);
  return decodeSource(bytes);
}
