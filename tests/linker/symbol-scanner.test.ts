import { describe, it, expect } from 'vitest';
import { scanTypeDefinitions } from '../../src/linker/symbol-scanner.js';

describe('scanTypeDefinitions', () => {
  it('finds class, struct and enum lines with their names', () => {
    const source = [
      'struct Vec2 {',
      '  class Inner;',
      'enum class Mode {',
      '// struct Commented',
      'typedef struct { int a; } Anon;',
      'enumerate x;',
    ].join('\n');

    expect(scanTypeDefinitions(source)).toEqual([
      { kind: 'struct', name: 'Vec2', line: 1 },
      { kind: 'class', name: 'Inner', line: 2 },
      { kind: 'enum', name: 'class', line: 3 },
    ]);
  });

  it('returns nothing for source without type definitions', () => {
    expect(scanTypeDefinitions('int main() { return 0; }')).toEqual([]);
  });
});
