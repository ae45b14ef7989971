import { describe, it, expect } from 'vitest';
import { resolve } from 'node:path';
import { decodeSource, readSource } from '../../src/indexer/reader.js';

describe('decodeSource', () => {
  it('decodes valid UTF-8', () => {
    expect(decodeSource(Buffer.from('int café = 1;', 'utf-8'))).toEqual({
      text: 'int café = 1;',
      encoding: 'utf-8',
    });
  });

  it('falls back to Latin-1 for invalid UTF-8', () => {
    const bytes = Uint8Array.from([0x69, 0x6e, 0x74, 0x20, 0xe9, 0x3b]);
    expect(decodeSource(bytes)).toEqual({ text: 'int é;', encoding: 'latin1' });
  });
});

describe('readSource', () => {
  it('reads a fixture file as UTF-8', async () => {
    const decoded = await readSource(resolve('fixtures/sample-repo/src/render/renderer.hpp'));
    expect(decoded.encoding).toBe('utf-8');
    expect(decoded.text.split('\n')[0]).toBe('/* Renderer front end */');
  });

  it('propagates missing-file errors', async () => {
    await expect(readSource(resolve('fixtures/sample-repo/missing.c'))).rejects.toThrow('ENOENT');
  });
});
