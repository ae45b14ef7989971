import { describe, it, expect } from 'vitest';
import { CommentGenerator } from '../../src/comments/generator.js';
import { TermDictionary } from '../../src/comments/dictionary.js';
import { analyzeSource } from '../../src/analyzer/index.js';
import type { PatternLookup } from '../../src/comments/generator.js';
import type { Declaration } from '../../src/types.js';

function decl(overrides: Partial<Declaration>): Declaration {
  return {
    name: 'value',
    type: 'int',
    initializer: '',
    line: 1,
    isStatic: false,
    isConst: false,
    ...overrides,
  };
}

const dictionary = new TermDictionary([
  ['0x80', 'High bit'],
  ['speed', 'Speed'],
]);

const patterns: PatternLookup = {
  mostCommonComment: (type) => (type === 'int' ? 'Loop counter' : null),
};

describe('CommentGenerator', () => {
  it('describes a known initializer value first', () => {
    const generator = new CommentGenerator(dictionary, patterns);
    expect(generator.suggest(decl({ name: 'speed', initializer: '0x80' }))).toBe('// High bit');
  });

  it('falls back to a term found in the name', () => {
    const generator = new CommentGenerator(dictionary, patterns);
    expect(generator.suggest(decl({ name: 'max_speed' }))).toBe('// Speed (max_speed)');
  });

  it('uses a learned comment for the declared type', () => {
    const generator = new CommentGenerator(dictionary, patterns);
    expect(generator.suggest(decl({ name: 'n' }))).toBe('// Loop counter (Suggested)');
    expect(generator.suggest(decl({ name: 'renderFlags' }))).toBe('// Loop counter (Suggested)');
  });

  it('recognises flag and mask names', () => {
    const generator = new CommentGenerator(new TermDictionary());
    expect(generator.suggest(decl({ name: 'renderFlags' }))).toBe('// Bitmask configuration');
    expect(generator.suggest(decl({ name: 'IRQ_MASK', initializer: '1 | 2' }))).toBe(
      '// Bitmask configuration',
    );
  });

  it('recognises unsigned buffers', () => {
    const generator = new CommentGenerator(new TermDictionary());
    expect(generator.suggest(decl({ name: 'rx', type: 'uint8_t[]' }))).toBe('// Buffer for rx');
    expect(generator.suggest(decl({ name: 'rx', type: 'uint32_t*' }))).toBeNull();
  });

  it('describes the first operator found in the initializer', () => {
    const generator = new CommentGenerator(new TermDictionary());
    expect(generator.suggest(decl({ initializer: 'a & b | c' }))).toBe('// Bitwise MASK operation');
    expect(generator.suggest(decl({ initializer: 'a | b' }))).toBe('// Bitwise MERGE operation');
    expect(generator.suggest(decl({ initializer: '1 << 3' }))).toBe('// Bitwise SHIFT LEFT operation');
    expect(generator.suggest(decl({ initializer: 'n % 8' }))).toBe(
      '// Modulo / Wrap Around operation',
    );
  });

  it('does not see shifts in extracted initializers', () => {
    const generator = new CommentGenerator(new TermDictionary());
    const [shift] = analyzeSource('int s = 1 << 3;');
    expect(shift.initializer).toBe('1 < < 3');
    expect(generator.suggest(shift)).toBeNull();
  });

  it('returns null when nothing applies', () => {
    const generator = new CommentGenerator(new TermDictionary());
    expect(generator.suggest(decl({ name: 'position', type: 'Vec2' }))).toBeNull();
  });

  it('suggestAll keeps only declarations with a comment, in order', () => {
    const generator = new CommentGenerator(dictionary);
    const suggestions = generator.suggestAll([
      decl({ name: 'speed', line: 3 }),
      decl({ name: 'plain', line: 4 }),
      decl({ name: 'buf', type: 'uint8_t[]', line: 5 }),
    ]);

    expect(suggestions).toEqual([
      { line: 3, type: 'int', name: 'speed', initializer: '', comment: '// Speed (speed)' },
      { line: 5, type: 'uint8_t[]', name: 'buf', initializer: '', comment: '// Buffer for buf' },
    ]);
  });
});
