import { describe, it, expect } from 'vitest';
import { buildSymbolMap, linkReferences } from '../../src/linker/reference-linker.js';

describe('buildSymbolMap', () => {
  it('keeps the last definition of a name in first-seen order', () => {
    const map = buildSymbolMap([
      { name: 'RigidBody', path: 'src/a.cpp', line: 15 },
      { name: 'Vec2', path: 'src/b.h', line: 4 },
      { name: 'RigidBody', path: 'src/b.h', line: 9 },
    ]);

    expect([...map.entries()]).toEqual([
      ['RigidBody', { path: 'src/b.h', line: 9 }],
      ['Vec2', { path: 'src/b.h', line: 4 }],
    ]);
  });
});

describe('linkReferences', () => {
  const symbols = buildSymbolMap([
    { name: 'RigidBody', path: 'src/engine/physics.h', line: 9 },
    { name: 'Vec2', path: 'src/engine/physics.h', line: 4 },
    { name: 'BodyKind', path: 'src/engine/physics.h', line: 11 },
    { name: 'Renderer', path: 'src/render/renderer.hpp', line: 2 },
  ]);

  it('links whole-word mentions that are not already link text', () => {
    const result = linkReferences(
      'The Renderer draws each RigidBody. See [Vec2](old) and Vec2.',
      symbols,
    );

    expect(result.text).toBe(
      'The [Renderer](src/render/renderer.hpp#L2) draws each [RigidBody](src/engine/physics.h#L9). ' +
        'See [Vec2](old) and [Vec2](src/engine/physics.h#L4).',
    );
    expect(result.linked).toEqual(['RigidBody', 'Vec2', 'Renderer']);
  });

  it('does not link inside longer words', () => {
    const result = linkReferences('Vec2D is not Vec2', symbols);
    expect(result.text).toBe('Vec2D is not [Vec2](src/engine/physics.h#L4)');
  });

  it('skips a name whose exact link is already present', () => {
    const text = 'Uses [Renderer](src/render/renderer.hpp#L2) and Renderer.';
    expect(linkReferences(text, symbols)).toEqual({ text, linked: [] });
  });

  it('ignores names shorter than four characters', () => {
    const short = buildSymbolMap([{ name: 'Foo', path: 'foo.h', line: 1 }]);
    expect(linkReferences('Foo bar', short)).toEqual({ text: 'Foo bar', linked: [] });
  });
});
